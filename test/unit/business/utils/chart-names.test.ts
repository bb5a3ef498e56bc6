// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {describe, it} from 'mocha';

import {parseChartNames} from '../../../../src/business/utils/chart-names.js';
import {IllegalArgumentError} from '../../../../src/core/errors/illegal-argument-error.js';

describe('parseChartNames', () => {
  it('should split on commas in the given order', () => {
    expect(parseChartNames('redis,ingress,postgres')).to.deep.equal(['redis', 'ingress', 'postgres']);
  });

  it('should return a single name unchanged', () => {
    expect(parseChartNames('ingress')).to.deep.equal(['ingress']);
  });

  it('should not trim whitespace around names', () => {
    expect(parseChartNames('redis, ingress')).to.deep.equal(['redis', ' ingress']);
  });

  it('should keep empty names between consecutive commas', () => {
    expect(parseChartNames('redis,,ingress')).to.deep.equal(['redis', '', 'ingress']);
  });

  it('should reject an empty list', () => {
    expect(() => parseChartNames('')).to.throw(IllegalArgumentError, 'At least one chart name is required');
  });
});
