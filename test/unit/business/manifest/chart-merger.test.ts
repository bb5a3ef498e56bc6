// SPDX-License-Identifier: Apache-2.0

import sinon, {type SinonStubbedInstance} from 'sinon';
import {expect} from 'chai';
import {describe, it, beforeEach, afterEach} from 'mocha';

import {ChartMerger} from '../../../../src/business/manifest/chart-merger.js';
import {type BuildManifest, ManifestRole} from '../../../../src/business/manifest/build-manifest.js';
import {ChartLookupError} from '../../../../src/business/errors/chart-lookup-error.js';
import {WinstonChartPickLogger} from '../../../../src/core/logging/winston-chart-pick-logger.js';

describe('ChartMerger', () => {
  let logger: SinonStubbedInstance<WinstonChartPickLogger>;
  let merger: ChartMerger;

  const target = (): BuildManifest => ({
    helmCharts: {
      ingress: {repo: 'https://charts.example.com', version: '1.0.0'},
      redis: {repo: 'https://charts.example.com', version: '2.0.0'},
    },
    gitRevision: 'abc123',
  });

  const source = (): BuildManifest => ({
    helmCharts: {
      ingress: {repo: 'https://charts.example.com', version: '1.1.0'},
      redis: {repo: 'https://charts.example.com', version: '2.0.0'},
      postgres: {repo: 'https://charts.example.com', version: '3.0.0'},
    },
    gitRevision: 'def456',
  });

  beforeEach(() => {
    logger = sinon.createStubInstance(WinstonChartPickLogger);
    merger = new ChartMerger(logger);
  });

  afterEach(() => sinon.restore());

  it('should return the target unchanged when no chart is requested', () => {
    expect(merger.merge(target(), source(), [])).to.deep.equal(target());
  });

  it('should not require a chart mapping when no chart is requested', () => {
    expect(merger.merge({name: 'bare'}, {}, [])).to.deep.equal({name: 'bare'});
  });

  it('should replace the requested charts and keep the others', () => {
    const merged = merger.merge(target(), source(), ['ingress']);

    expect(merged).to.deep.equal({
      helmCharts: {
        ingress: {repo: 'https://charts.example.com', version: '1.1.0'},
        redis: {repo: 'https://charts.example.com', version: '2.0.0'},
      },
      gitRevision: 'abc123',
    });
  });

  it('should append charts missing from the target', () => {
    const merged = merger.merge(target(), source(), ['postgres']);

    expect(Object.keys(merged.helmCharts ?? {})).to.deep.equal(['ingress', 'redis', 'postgres']);
    expect(logger.warn).to.have.been.calledOnce;
    expect(logger.warn).to.have.been.calledWith("Chart 'postgres' is not present in the target manifest, adding it");
  });

  it('should keep the position of every top level key', () => {
    const merged = merger.merge(target(), source(), ['redis']);
    expect(Object.keys(merged)).to.deep.equal(['helmCharts', 'gitRevision']);
  });

  it('should give the same result whatever the order of the names', () => {
    const forward = merger.merge(target(), source(), ['ingress', 'postgres']);
    const backward = merger.merge(target(), source(), ['postgres', 'ingress']);

    expect(forward).to.deep.equal(backward);
  });

  it('should leave its arguments unmodified', () => {
    const original = target();
    const from = source();
    merger.merge(original, from, ['ingress', 'postgres']);

    expect(original).to.deep.equal(target());
    expect(from).to.deep.equal(source());
  });

  it('should merge the documented scenario', () => {
    const merged = merger.merge(
      {helmCharts: {a: {v: 1}, b: {v: 2}}},
      {helmCharts: {a: {v: 9}, b: {v: 2}, c: {v: 3}}},
      ['a', 'c'],
    );

    expect(JSON.stringify(merged)).to.equal('{"helmCharts":{"a":{"v":9},"b":{"v":2},"c":{"v":3}}}');
  });

  it('should fail when the source lacks a requested chart', () => {
    expect(() => merger.merge(target(), source(), ['ingress', 'mongodb']))
      .to.throw(ChartLookupError, "Chart 'mongodb' not found in the helmCharts of the source manifest")
      .with.property('meta')
      .that.deep.equals({key: 'mongodb', role: ManifestRole.SOURCE});
  });

  it('should fail when neither manifest has the requested chart', () => {
    expect(() => merger.merge({helmCharts: {a: {v: 1}}}, {helmCharts: {a: {v: 9}}}, ['d'])).to.throw(
      ChartLookupError,
      "Chart 'd' not found",
    );
  });

  it('should fail when the target has no chart mapping', () => {
    expect(() => merger.merge({gitRevision: 'abc123'}, source(), ['ingress']))
      .to.throw(ChartLookupError, 'The target manifest has no helmCharts mapping')
      .with.property('meta')
      .that.deep.equals({key: 'helmCharts', role: ManifestRole.TARGET});
  });

  it('should fail when the source chart mapping is not an object', () => {
    expect(() => merger.merge(target(), {helmCharts: ['ingress']}, ['ingress'])).to.throw(
      ChartLookupError,
      'The source manifest has no helmCharts mapping',
    );
  });

  it('should keep a chart named __proto__ as a plain key', () => {
    const from: BuildManifest = JSON.parse('{"helmCharts":{"__proto__":{"version":"1.0.0"}}}');
    const merged = merger.merge({helmCharts: {}}, from, ['__proto__']);

    expect(JSON.stringify(merged)).to.equal('{"helmCharts":{"__proto__":{"version":"1.0.0"}}}');
  });

  it('should summarize version changes of the requested charts', () => {
    const before = target();
    const merged = merger.merge(before, source(), ['ingress', 'postgres', 'ingress']);

    expect(merger.summarizeChanges(before, merged, ['ingress', 'postgres', 'ingress'])).to.deep.equal([
      {chart: 'ingress', before: '1.0.0', after: '1.1.0', added: false},
      {chart: 'postgres', before: undefined, after: '3.0.0', added: true},
    ]);
  });
});
