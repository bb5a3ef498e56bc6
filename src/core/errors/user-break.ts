// SPDX-License-Identifier: Apache-2.0

import {ChartPickError} from './chart-pick-error.js';

export class UserBreak extends ChartPickError {
  /**
   * Create a custom error for user break scenarios
   *
   * @param message - break message
   */
  public constructor(message: string) {
    super(message);
  }
}
