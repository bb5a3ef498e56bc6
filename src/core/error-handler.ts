// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {InjectTokens} from './dependency-injection/inject-tokens.js';
import {patchInject} from './dependency-injection/container-helper.js';
import {type ChartPickLogger} from './logging/chart-pick-logger.js';
import {UserBreak} from './errors/user-break.js';

@injectable()
export class ErrorHandler {
  private readonly logger: ChartPickLogger;

  public constructor(@inject(InjectTokens.ChartPickLogger) logger?: ChartPickLogger) {
    this.logger = patchInject(logger, InjectTokens.ChartPickLogger, this.constructor.name);
  }

  public handle(error: unknown): void {
    const userBreak = this.extractBreak(error);
    if (userBreak) {
      this.handleUserBreak(userBreak);
    } else {
      this.handleError(error);
    }
  }

  private handleUserBreak(userBreak: UserBreak): void {
    this.logger.info(userBreak.message);
  }

  private handleError(error: unknown): void {
    this.logger.showUserError(error);
    process.exitCode = 1;
  }

  /**
   * Recursively checks if an error is or is caused by a UserBreak
   * Returns the UserBreak if found, otherwise false
   * @param error
   */
  private extractBreak(error: unknown): UserBreak | false {
    if (error instanceof UserBreak) {
      return error;
    }
    if (error instanceof Error && error.cause !== undefined) {
      return this.extractBreak(error.cause);
    }
    return false;
  }
}
