// SPDX-License-Identifier: Apache-2.0

import {container, Lifecycle} from 'tsyringe-neo';
import {type ChartPickLogger} from '../logging/chart-pick-logger.js';
import {WinstonChartPickLogger} from '../logging/winston-chart-pick-logger.js';
import * as constants from '../constants.js';
import {InjectTokens} from './inject-tokens.js';
import {ErrorHandler} from '../error-handler.js';
import {DefaultGitClient} from '../../integration/git/impl/default-git-client.js';
import {ManifestFetcher} from '../../business/manifest/manifest-fetcher.js';
import {ChartMerger} from '../../business/manifest/chart-merger.js';
import {ManifestEmitter} from '../../business/manifest/manifest-emitter.js';
import {CherryPickCommand} from '../../commands/cherry-pick.js';

/**
 * Container class to manage the dependency injection container
 */
export class Container {
  private static instance?: Container;
  private static isInitialized = false;

  private constructor() {}

  /**
   * Get the singleton instance of the container
   */
  public static getInstance(): Container {
    if (!Container.instance) {
      Container.instance = new Container();
    }

    return Container.instance;
  }

  /**
   * Initialize the container with the default dependencies
   * @param logsDirectory - the directory to write chart-pick.log to, defaults to constants.CHART_PICK_LOGS_DIR
   * @param logLevel - the log level to use, defaults to constants.CHART_PICK_LOG_LEVEL
   * @param developmentMode - if true, show full stack traces in error messages
   * @param testLogger - a test logger to use, if provided
   */
  public init(
    logsDirectory: string = constants.CHART_PICK_LOGS_DIR,
    logLevel: string = constants.CHART_PICK_LOG_LEVEL,
    developmentMode: boolean = false,
    testLogger?: ChartPickLogger,
  ): void {
    if (Container.isInitialized) {
      container.resolve<ChartPickLogger>(InjectTokens.ChartPickLogger).debug('Container already initialized');
      return;
    }

    // ChartPickLogger
    container.register(InjectTokens.LogLevel, {useValue: logLevel});
    container.register(InjectTokens.DevelopmentMode, {useValue: developmentMode});
    container.register(InjectTokens.LogsDirectory, {useValue: logsDirectory});
    if (testLogger) {
      container.registerInstance(InjectTokens.ChartPickLogger, testLogger);
      container.resolve<ChartPickLogger>(InjectTokens.ChartPickLogger).debug('Using test logger');
    } else {
      container.register(
        InjectTokens.ChartPickLogger,
        {useClass: WinstonChartPickLogger},
        {lifecycle: Lifecycle.Singleton},
      );
      container.resolve<ChartPickLogger>(InjectTokens.ChartPickLogger).debug('Using default logger');
    }

    container.register(InjectTokens.ErrorHandler, {useClass: ErrorHandler}, {lifecycle: Lifecycle.Singleton});

    // Git
    container.register(InjectTokens.GitExecutable, {useValue: constants.GIT});
    container.register(InjectTokens.GitClient, {useClass: DefaultGitClient}, {lifecycle: Lifecycle.Singleton});

    // Build manifest
    container.register(InjectTokens.ManifestFetcher, {useClass: ManifestFetcher}, {lifecycle: Lifecycle.Singleton});
    container.register(InjectTokens.ChartMerger, {useClass: ChartMerger}, {lifecycle: Lifecycle.Singleton});
    container.register(InjectTokens.OutputStream, {useValue: process.stdout});
    container.register(InjectTokens.ManifestEmitter, {useClass: ManifestEmitter}, {lifecycle: Lifecycle.Singleton});

    // Commands
    container.register(
      InjectTokens.CherryPickCommand,
      {useClass: CherryPickCommand},
      {lifecycle: Lifecycle.Singleton},
    );

    Container.isInitialized = true;
  }

  /**
   * clears the container registries and re-initializes the container, useful for testing
   * @param logsDirectory - the directory to write chart-pick.log to
   * @param logLevel - the log level to use
   * @param developmentMode - if true, show full stack traces in error messages
   * @param testLogger - a test logger to use, if provided
   */
  public reset(logsDirectory?: string, logLevel?: string, developmentMode?: boolean, testLogger?: ChartPickLogger): void {
    if (Container.instance && Container.isInitialized) {
      container.resolve<ChartPickLogger>(InjectTokens.ChartPickLogger).debug('Resetting container');
      container.reset();
      Container.isInitialized = false;
    }
    Container.getInstance().init(logsDirectory, logLevel, developmentMode, testLogger);
  }
}
