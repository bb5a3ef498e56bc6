// SPDX-License-Identifier: Apache-2.0

/**
 * Exception thrown when the execution of the git executable fails.
 */
export class GitExecutionException extends Error {
  /**
   * The default message to use when no message is provided
   */
  private static readonly DEFAULT_MESSAGE = 'Execution of the git command failed with exit code: %d';

  /**
   * The non-zero system exit code returned by the git executable or the operating system
   */
  private readonly exitCode: number;

  /**
   * The standard output of the git executable
   */
  private readonly stdOut: string;

  /**
   * The standard error of the git executable
   */
  private readonly stdErr: string;

  /**
   * Constructs a new exception instance with the specified exit code, standard output and standard error.
   * @param exitCode The exit code returned by the git executable or the operating system
   * @param stdOut The standard output of the git executable
   * @param stdError The standard error of the git executable
   */
  public constructor(exitCode: number, stdOut: string, stdError: string);
  /**
   * Constructs a new exception instance with the specified exit code and cause using the default message.
   * @param exitCode The exit code returned by the git executable or the operating system
   * @param cause The cause
   */
  public constructor(exitCode: number, cause: Error);

  public constructor(exitCode: number, stdOutOrCause: string | Error, stdError: string = '') {
    super(GitExecutionException.DEFAULT_MESSAGE.replace('%d', exitCode.toString()));
    this.name = 'GitExecutionException';
    this.exitCode = exitCode;
    if (stdOutOrCause instanceof Error) {
      this.cause = stdOutOrCause;
      this.stdOut = '';
      this.stdErr = stdOutOrCause.message;
    } else {
      this.stdOut = stdOutOrCause;
      this.stdErr = stdError;
    }
  }

  /**
   * Returns the exit code returned by the git executable or the operating system.
   */
  public getExitCode(): number {
    return this.exitCode;
  }

  public getStdOut(): string {
    return this.stdOut;
  }

  public getStdErr(): string {
    return this.stdErr;
  }
}
