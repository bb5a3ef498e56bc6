// SPDX-License-Identifier: Apache-2.0

import {ChartPickError} from '../../core/errors/chart-pick-error.js';

export class ManifestParseError extends ChartPickError {
  /**
   * Create a custom error for a build manifest whose content is not a JSON object
   *
   * error metadata will include `revision` and `path`
   *
   * @param revision - the revision the manifest was read at
   * @param path - the manifest path inside the repository
   * @param reason - the parser diagnostic
   * @param cause - source error (if any)
   */
  public constructor(revision: string, path: string, reason: string, cause?: unknown) {
    super(`Failed to parse ${path} at revision ${revision}: ${reason}`, cause, {revision, path});
  }
}
