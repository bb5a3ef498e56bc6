// SPDX-License-Identifier: Apache-2.0

/**
 * The version-control operations chart-pick depends on.
 */
export interface GitClient {
  /**
   * Reads the content of a file as it was committed at a revision.
   *
   * @param revision - any revision git understands (commit, tag, branch, `HEAD~1`, ...)
   * @param path - path of the file relative to the repository root
   * @param workingDirectory - a directory inside the repository, defaults to the current directory
   * @returns the file content, unmodified
   * @throws GitExecutionException if git exits with a non-zero code or cannot be started
   * @throws GitOutputEncodingException if the file content is not valid UTF-8
   */
  showFile(revision: string, path: string, workingDirectory?: string): Promise<string>;
}
