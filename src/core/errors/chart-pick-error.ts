// SPDX-License-Identifier: Apache-2.0

export type ErrorMeta = Record<string, unknown>;

export class ChartPickError extends Error {
  /**
   * Create a custom error object
   *
   * error metadata will include the `cause`
   *
   * @param message error message
   * @param cause source error (if any)
   * @param meta additional metadata (if any)
   */
  public constructor(
    message: string,
    cause?: unknown,
    public readonly meta: ErrorMeta = {},
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
    if (cause !== undefined) {
      this.cause = cause;
      if (cause instanceof Error) {
        this.stack += `\nCaused by: ${cause.stack}`;
      }
    }
  }
}
