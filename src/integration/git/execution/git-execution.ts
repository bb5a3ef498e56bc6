// SPDX-License-Identifier: Apache-2.0

import {spawn, type ChildProcessWithoutNullStreams} from 'node:child_process';
import {GitExecutionException} from '../git-execution-exception.js';
import {GitOutputEncodingException} from '../git-output-encoding-exception.js';

type Completion = {exitCode: number | null} | {spawnError: Error};

/**
 * Represents the execution of a git command and collects what it prints.
 *
 * The process is started on construction. Output is kept as raw bytes so that file content read through
 * `git show` reaches the caller exactly as committed.
 */
export class GitExecution {
  private readonly process: ChildProcessWithoutNullStreams;

  private readonly output: Buffer[] = [];
  private readonly errOutput: Buffer[] = [];
  private readonly completion: Promise<Completion>;
  private exitCodeValue: number | null = null;

  /**
   * Creates a new GitExecution instance.
   * @param command The command array to execute, starting with the executable
   * @param workingDirectory The working directory for the process
   * @param environmentVariables The environment variables to set
   */
  public constructor(
    public readonly command: string[],
    workingDirectory: string,
    environmentVariables: Record<string, string>,
  ) {
    const [executable, ...arguments_] = command;
    this.process = spawn(executable, arguments_, {
      cwd: workingDirectory,
      env: {...process.env, ...environmentVariables},
    });

    this.process.stdout.on('data', (d: Buffer) => this.output.push(d));
    this.process.stderr.on('data', (d: Buffer) => this.errOutput.push(d));

    this.completion = new Promise<Completion>(resolve => {
      this.process.on('error', spawnError => resolve({spawnError}));
      this.process.on('close', exitCode => resolve({exitCode}));
    });
  }

  /**
   * Waits for the process to complete.
   * @returns A promise that resolves when the process exits with code 0
   */
  public async waitFor(): Promise<void> {
    const completion = await this.completion;
    if ('spawnError' in completion) {
      this.exitCodeValue = 127;
      throw new GitExecutionException(this.exitCodeValue, completion.spawnError);
    }

    // a null exit code means the process was terminated by a signal
    this.exitCodeValue = completion.exitCode ?? 1;
    if (this.exitCodeValue !== 0) {
      // diagnostic only, invalid bytes become U+FFFD
      const output = Buffer.concat(this.output).toString('utf8');
      throw new GitExecutionException(this.exitCodeValue, output, this.standardError());
    }
  }

  /**
   * Gets the exit code of the process.
   * @returns The exit code or null if the process hasn't completed
   */
  public exitCode(): number | null {
    return this.exitCodeValue;
  }

  /**
   * Gets the standard output of the process, decoded as UTF-8. A byte order mark is kept.
   * @throws GitOutputEncodingException if the output is not valid UTF-8
   */
  public standardOutput(): string {
    const decoder = new TextDecoder('utf-8', {fatal: true, ignoreBOM: true});
    try {
      return decoder.decode(Buffer.concat(this.output));
    } catch (error) {
      throw new GitOutputEncodingException(error instanceof Error ? error : new Error(String(error)));
    }
  }

  /**
   * Gets the standard error of the process with surrounding whitespace removed.
   */
  public standardError(): string {
    return Buffer.concat(this.errOutput).toString('utf8').trim();
  }

  /**
   * Waits for the process and returns its standard output verbatim.
   * @throws GitOutputEncodingException if the output is not valid UTF-8
   */
  public async responseAsText(): Promise<string> {
    await this.waitFor();
    return this.standardOutput();
  }
}
