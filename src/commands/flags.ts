// SPDX-License-Identifier: Apache-2.0

import {type Argv} from 'yargs';
import * as constants from '../core/constants.js';
import {type CommandFlag} from '../types/flag-types.js';
import {IllegalArgumentError} from '../core/errors/illegal-argument-error.js';

export type ArgvValues = Record<string, unknown>;

export class Flags {
  /**
   * Set flag from the flag option
   * @param y instance of yargs
   * @param commandFlags a set of command flags
   */
  public static setOptionalCommandFlags(y: Argv, ...commandFlags: CommandFlag[]): void {
    for (const flag of commandFlags) {
      const {defaultValue, ...definition} = flag.definition;
      y.option(flag.name, {
        ...definition,
        default: defaultValue === '' ? undefined : defaultValue,
      });
    }
  }

  public static readonly devMode: CommandFlag = {
    name: 'dev',
    definition: {
      describe: 'Enable developer mode',
      defaultValue: false,
      type: 'boolean',
    },
  };

  public static readonly manifestPath: CommandFlag = {
    name: 'manifest-path',
    definition: {
      describe: 'Path of the build manifest inside the repository',
      defaultValue: constants.DEFAULT_MANIFEST_PATH,
      type: 'string',
    },
  };

  public static readonly repository: CommandFlag = {
    name: 'repository',
    definition: {
      describe: 'Directory of the git repository to read the manifests from, defaults to the current directory',
      defaultValue: '',
      alias: 'C',
      type: 'string',
    },
  };

  public static readonly indent: CommandFlag = {
    name: 'indent',
    definition: {
      describe: 'Number of spaces to indent the merged manifest with, 0 prints compact JSON',
      defaultValue: 0,
      type: 'number',
    },
  };

  public static readonly allFlags: CommandFlag[] = [
    Flags.devMode,
    Flags.manifestPath,
    Flags.repository,
    Flags.indent,
  ];

  /**
   * Reads a string flag, returning undefined when it was not given and has no default
   * @throws IllegalArgumentError if the value is not a string
   */
  public static stringValue(argv: ArgvValues, flag: CommandFlag): string | undefined {
    const value = argv[flag.name];
    if (value === undefined) {
      return undefined;
    }
    if (typeof value !== 'string') {
      throw new IllegalArgumentError(`--${flag.name} must be a string`, value);
    }
    return value;
  }

  /**
   * Reads a non-negative integer flag
   * @throws IllegalArgumentError if the value is not a non-negative integer
   */
  public static integerValue(argv: ArgvValues, flag: CommandFlag): number {
    const value = argv[flag.name] ?? flag.definition.defaultValue;
    if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
      throw new IllegalArgumentError(`--${flag.name} must be a non-negative integer`, value);
    }
    return value;
  }

  public static booleanValue(argv: ArgvValues, flag: CommandFlag): boolean {
    return argv[flag.name] === true;
  }
}
