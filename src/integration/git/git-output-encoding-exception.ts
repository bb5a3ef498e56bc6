// SPDX-License-Identifier: Apache-2.0

/**
 * Exception thrown when the standard output of the git executable is not valid UTF-8.
 */
export class GitOutputEncodingException extends Error {
  public constructor(cause: Error) {
    super(`The output of the git command is not valid UTF-8: ${cause.message}`, {cause});
    this.name = 'GitOutputEncodingException';
  }
}
