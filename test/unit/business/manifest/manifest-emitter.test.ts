// SPDX-License-Identifier: Apache-2.0

import {Writable} from 'node:stream';
import {expect} from 'chai';
import {describe, it, beforeEach} from 'mocha';
import {LosslessNumber} from 'lossless-json';

import {ManifestEmitter} from '../../../../src/business/manifest/manifest-emitter.js';
import {type BuildManifest} from '../../../../src/business/manifest/build-manifest.js';
import {ManifestWriteError} from '../../../../src/business/errors/manifest-write-error.js';
import {CaptureStream} from '../../fixtures/capture-stream.fixture.js';

describe('ManifestEmitter', () => {
  const manifest: BuildManifest = {
    helmCharts: {ingress: {version: '1.1.0', values: {replicas: 2, tls: true, hosts: ['a.example.com']}}},
    gitRevision: null,
  };

  let output: CaptureStream;
  let emitter: ManifestEmitter;

  beforeEach(() => {
    output = new CaptureStream();
    emitter = new ManifestEmitter(output);
  });

  it('should write compact JSON followed by a newline', async () => {
    await emitter.emit(manifest);

    expect(output.text()).to.equal(
      '{"helmCharts":{"ingress":{"version":"1.1.0","values":{"replicas":2,"tls":true,"hosts":["a.example.com"]}}},' +
        '"gitRevision":null}\n',
    );
  });

  it('should indent nested values when asked to', async () => {
    await emitter.emit({helmCharts: {redis: {version: '2.0.0'}}}, 2);

    expect(output.text()).to.equal(
      ['{', '  "helmCharts": {', '    "redis": {', '      "version": "2.0.0"', '    }', '  }', '}', ''].join('\n'),
    );
  });

  it('should produce text that parses back to the same manifest', () => {
    expect(JSON.parse(emitter.serialize(manifest, 4))).to.deep.equal(manifest);
  });

  it('should write numbers with the digits they were read with', () => {
    const numbers: BuildManifest = {
      buildId: new LosslessNumber('12345678901234567891'),
      ratio: new LosslessNumber('1.50'),
      small: 3,
    };

    expect(emitter.serialize(numbers)).to.equal('{"buildId":12345678901234567891,"ratio":1.50,"small":3}');
  });

  it('should reject when the output stream fails', async () => {
    const closed = new Writable({
      write(_chunk: unknown, _encoding: BufferEncoding, callback: (error?: Error | null) => void) {
        callback(new Error('write EPIPE'));
      },
    });

    await expect(new ManifestEmitter(closed).emit(manifest)).to.be.rejectedWith(
      ManifestWriteError,
      'Failed to write the merged manifest: write EPIPE',
    );
  });
});
