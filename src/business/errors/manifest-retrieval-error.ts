// SPDX-License-Identifier: Apache-2.0

import {ChartPickError} from '../../core/errors/chart-pick-error.js';

export class ManifestRetrievalError extends ChartPickError {
  /**
   * Create a custom error for a build manifest that could not be read from version control
   *
   * error metadata will include `revision`, `path` and the `diagnostic` printed by git
   *
   * @param revision - the revision the manifest was requested at
   * @param path - the manifest path inside the repository
   * @param diagnostic - the standard error text of the failed read
   * @param cause - source error (if any)
   */
  public constructor(
    public readonly revision: string,
    public readonly path: string,
    public readonly diagnostic: string,
    cause?: unknown,
  ) {
    super(`Failed to get ${path} at revision ${revision}: ${diagnostic}`, cause, {revision, path, diagnostic});
  }
}
