// SPDX-License-Identifier: Apache-2.0

import sinon from 'sinon';
import {expect} from 'chai';
import {describe, it, afterEach} from 'mocha';

import {ShowFileRequest} from '../../../../../src/integration/git/request/show-file-request.js';
import {GitExecutionBuilder} from '../../../../../src/integration/git/execution/git-execution-builder.js';
import {WinstonChartPickLogger} from '../../../../../src/core/logging/winston-chart-pick-logger.js';

describe('ShowFileRequest', () => {
  afterEach(() => sinon.restore());

  it('should reject an empty revision', () => {
    expect(() => new ShowFileRequest('', 'build.json')).to.throw(Error, 'revision must not be null');
  });

  it('should reject a blank revision', () => {
    expect(() => new ShowFileRequest('   ', 'build.json')).to.throw(Error, 'revision must not be blank');
  });

  it('should reject a revision that git would read as an option', () => {
    expect(() => new ShowFileRequest('--output=/tmp/out', 'build.json')).to.throw(
      Error,
      "revision must not start with '-': --output=/tmp/out",
    );
  });

  it('should reject an empty path', () => {
    expect(() => new ShowFileRequest('main', '')).to.throw(Error, 'path must not be null');
  });

  it('should apply git show with the revision and path joined by a colon', () => {
    const builder = new GitExecutionBuilder('git', sinon.createStubInstance(WinstonChartPickLogger));

    new ShowFileRequest('release/1.2', 'deploy/build.json').apply(builder);

    expect(builder.buildCommand()).to.deep.equal(['git', 'show', 'release/1.2:deploy/build.json']);
  });
});
