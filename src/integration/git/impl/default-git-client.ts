// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {type GitClient} from '../git-client.js';
import {GitExecutionBuilder} from '../execution/git-execution-builder.js';
import {type GitRequest} from '../request/git-request.js';
import {ShowFileRequest} from '../request/show-file-request.js';
import {InjectTokens} from '../../../core/dependency-injection/inject-tokens.js';
import {patchInject} from '../../../core/dependency-injection/container-helper.js';
import {type ChartPickLogger} from '../../../core/logging/chart-pick-logger.js';

@injectable()
/**
 * The default implementation of the GitClient interface, backed by the git executable.
 */
export class DefaultGitClient implements GitClient {
  private readonly gitExecutable: string;
  private readonly logger: ChartPickLogger;

  public constructor(
    @inject(InjectTokens.GitExecutable) gitExecutable?: string,
    @inject(InjectTokens.ChartPickLogger) logger?: ChartPickLogger,
  ) {
    this.gitExecutable = patchInject(gitExecutable, InjectTokens.GitExecutable, this.constructor.name);
    this.logger = patchInject(logger, InjectTokens.ChartPickLogger, this.constructor.name);
  }

  public async showFile(revision: string, path: string, workingDirectory?: string): Promise<string> {
    const builder = this.createBuilder(workingDirectory);
    return this.executeAsText(new ShowFileRequest(revision, path), builder);
  }

  /**
   * Creates a builder with the options every git invocation shares.
   * @param workingDirectory - the directory git runs in, if not the current one
   */
  protected createBuilder(workingDirectory?: string): GitExecutionBuilder {
    const builder = new GitExecutionBuilder(this.gitExecutable, this.logger);
    // disable credential prompts
    builder.environmentVariable('GIT_TERMINAL_PROMPT', '0');
    if (workingDirectory) {
      builder.workingDirectory(workingDirectory);
    }
    return builder;
  }

  private async executeAsText(request: GitRequest, builder: GitExecutionBuilder): Promise<string> {
    request.apply(builder);
    const execution = builder.build();
    try {
      return await execution.responseAsText();
    } finally {
      this.logger.debug(`git exited with code ${execution.exitCode()}`);
    }
  }
}
