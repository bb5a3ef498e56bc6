// SPDX-License-Identifier: Apache-2.0

import {GitExecution} from './git-execution.js';
import {inject, injectable} from 'tsyringe-neo';
import {InjectTokens} from '../../../core/dependency-injection/inject-tokens.js';
import {patchInject} from '../../../core/dependency-injection/container-helper.js';
import {type ChartPickLogger} from '../../../core/logging/chart-pick-logger.js';

@injectable()
/**
 * A builder for creating a git command execution.
 */
export class GitExecutionBuilder {
  private static readonly NAME_MUST_NOT_BE_NULL = 'name must not be null';
  private static readonly VALUE_MUST_NOT_BE_NULL = 'value must not be null';

  /**
   * The path to the git executable.
   */
  private readonly gitExecutable: string;

  private readonly logger: ChartPickLogger;

  /**
   * The list of subcommands to be used when execute the git command.
   */
  private readonly _subcommands: string[] = [];

  /**
   * The positional arguments to be passed to the git command.
   */
  private readonly _positionals: string[] = [];

  /**
   * The environment variables to be set when executing the git command.
   */
  private readonly _environmentVariables: Map<string, string> = new Map();

  /**
   * The working directory to be used when executing the git command.
   */
  private _workingDirectory: string;

  public constructor(
    @inject(InjectTokens.GitExecutable) gitExecutable?: string,
    @inject(InjectTokens.ChartPickLogger) logger?: ChartPickLogger,
  ) {
    this.gitExecutable = patchInject(gitExecutable, InjectTokens.GitExecutable, this.constructor.name);
    this.logger = patchInject(logger, InjectTokens.ChartPickLogger, this.constructor.name);
    this._workingDirectory = process.cwd();
  }

  /**
   * Adds the list of subcommands to the git execution.
   * @param commands the list of subcommands to be added
   * @returns this builder
   */
  public subcommands(...commands: string[]): GitExecutionBuilder {
    if (commands.length === 0) {
      throw new Error('commands must not be empty');
    }
    this._subcommands.push(...commands);
    return this;
  }

  /**
   * Adds a positional argument to the git execution.
   * @param value the value of the positional argument
   * @returns this builder
   */
  public positional(value: string): GitExecutionBuilder {
    if (!value) {
      throw new Error(GitExecutionBuilder.VALUE_MUST_NOT_BE_NULL);
    }
    this._positionals.push(value);
    return this;
  }

  /**
   * Adds an environment variable to the git execution.
   * @param name the name of the environment variable
   * @param value the value of the environment variable
   * @returns this builder
   */
  public environmentVariable(name: string, value: string): GitExecutionBuilder {
    if (!name) {
      throw new Error(GitExecutionBuilder.NAME_MUST_NOT_BE_NULL);
    }
    if (!value) {
      throw new Error(GitExecutionBuilder.VALUE_MUST_NOT_BE_NULL);
    }
    this._environmentVariables.set(name, value);
    return this;
  }

  /**
   * Sets the working directory for the git execution.
   * @param workingDirectoryPath the path to the working directory
   * @returns this builder
   */
  public workingDirectory(workingDirectoryPath: string): GitExecutionBuilder {
    if (!workingDirectoryPath) {
      throw new Error('workingDirectoryPath must not be null');
    }
    this._workingDirectory = workingDirectoryPath;
    return this;
  }

  /**
   * Builds the GitExecution instance, which starts the git process.
   */
  public build(): GitExecution {
    const environment: Record<string, string> = {};
    for (const [key, value] of this._environmentVariables.entries()) {
      environment[key] = value;
    }

    return new GitExecution(this.buildCommand(), this._workingDirectory, environment);
  }

  /**
   * Builds the command array for the git execution.
   * @returns the command array
   */
  public buildCommand(): string[] {
    const command: string[] = [];
    command.push(this.gitExecutable);
    command.push(...this._subcommands);
    command.push(...this._positionals);

    this.logger.debug(`Git command: git ${command.slice(1).join(' ')}`, {workingDirectory: this._workingDirectory});

    return command;
  }
}
