// SPDX-License-Identifier: Apache-2.0

export interface CommandFlag {
  name: string;
  definition: Definition;
}

export interface Definition {
  describe: string;
  defaultValue?: boolean | string | number;
  alias?: string;
  type: 'boolean' | 'string' | 'number';
}
