// SPDX-License-Identifier: Apache-2.0

import {type Writable} from 'node:stream';
import {inject, injectable} from 'tsyringe-neo';
import {stringify} from 'lossless-json';
import {InjectTokens} from '../../core/dependency-injection/inject-tokens.js';
import {patchInject} from '../../core/dependency-injection/container-helper.js';
import {ManifestWriteError} from '../errors/manifest-write-error.js';
import {type BuildManifest} from './build-manifest.js';

/**
 * Writes a build manifest as JSON, followed by a newline, to the output stream (standard output by default).
 */
@injectable()
export class ManifestEmitter {
  private readonly output: Writable;

  public constructor(@inject(InjectTokens.OutputStream) output?: Writable) {
    this.output = patchInject(output, InjectTokens.OutputStream, this.constructor.name);
  }

  /**
   * @param manifest - the manifest to write
   * @param indent - number of spaces to indent nested values with, 0 writes compact JSON
   * @returns a promise that resolves once the stream has accepted the text
   * @throws ManifestWriteError if the stream fails, e.g. with EPIPE on a closed standard output
   */
  public emit(manifest: BuildManifest, indent: number = 0): Promise<void> {
    const text = this.serialize(manifest, indent) + '\n';

    return new Promise<void>((resolve, reject) => {
      // a failed write reaches both the callback and an 'error' event
      const onError = (error: Error): void => reject(new ManifestWriteError(error));
      this.output.once('error', onError);

      this.output.write(text, error => {
        if (error) {
          onError(error);
          return;
        }
        this.output.off('error', onError);
        resolve();
      });
    });
  }

  public serialize(manifest: BuildManifest, indent: number = 0): string {
    return stringify(manifest, undefined, indent > 0 ? indent : undefined) ?? '';
  }
}
