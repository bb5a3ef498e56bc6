// SPDX-License-Identifier: Apache-2.0

import {ChartPickError} from '../../core/errors/chart-pick-error.js';

export class ManifestWriteError extends ChartPickError {
  /**
   * Create a custom error for a merged manifest that could not be written to the output stream
   *
   * @param cause - the stream error
   */
  public constructor(cause: Error) {
    super(`Failed to write the merged manifest: ${cause.message}`, cause);
  }
}
