// SPDX-License-Identifier: Apache-2.0

import {IllegalArgumentError} from '../../core/errors/illegal-argument-error.js';
import * as constants from '../../core/constants.js';

/**
 * Splits a comma separated chart list. Names are taken verbatim: no whitespace is trimmed and commas cannot be
 * escaped.
 *
 * @param value - e.g. `ingress,redis`
 * @throws IllegalArgumentError if the list is empty
 */
export function parseChartNames(value: string): string[] {
  if (value === '') {
    throw new IllegalArgumentError('At least one chart name is required', value);
  }

  return value.split(constants.CHART_NAME_SEPARATOR);
}
