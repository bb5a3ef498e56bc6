// SPDX-License-Identifier: Apache-2.0

import {type GitExecutionBuilder} from '../execution/git-execution-builder.js';
import {type GitRequest} from './git-request.js';

/**
 * A request to print the content of a file as committed at a revision (`git show <revision>:<path>`).
 */
export class ShowFileRequest implements GitRequest {
  public constructor(
    public readonly revision: string,
    public readonly path: string,
  ) {
    if (!revision) {
      throw new Error('revision must not be null');
    }
    if (revision.trim() === '') {
      throw new Error('revision must not be blank');
    }
    // git would read it as an option
    if (revision.startsWith('-')) {
      throw new Error(`revision must not start with '-': ${revision}`);
    }
    if (!path) {
      throw new Error('path must not be null');
    }
  }

  public apply(builder: GitExecutionBuilder): void {
    builder.subcommands('show').positional(`${this.revision}:${this.path}`);
  }
}
