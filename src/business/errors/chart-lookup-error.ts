// SPDX-License-Identifier: Apache-2.0

import {ChartPickError} from '../../core/errors/chart-pick-error.js';
import {type ManifestRole} from '../manifest/build-manifest.js';

export class ChartLookupError extends ChartPickError {
  /**
   * Create a custom error for a chart or chart mapping missing from a manifest
   *
   * error metadata will include `key` and `role`
   *
   * @param message - error message
   * @param key - the chart name or mapping key that was not found
   * @param role - the manifest the lookup was made in
   */
  public constructor(message: string, key: string, role: ManifestRole) {
    super(message, undefined, {key, role});
  }
}
