#!/usr/bin/env node
// SPDX-License-Identifier: Apache-2.0

import sourceMapSupport from 'source-map-support';
sourceMapSupport.install(); // Enable source maps for error stack traces
import * as chartPick from './src/index.js';
import {type ChartPickLogger} from './src/core/logging/chart-pick-logger.js';
import {InjectTokens} from './src/core/dependency-injection/inject-tokens.js';
import {container} from 'tsyringe-neo';
import {type ErrorHandler} from './src/core/error-handler.js';

const context: {logger?: ChartPickLogger} = {};
await chartPick
  .main(process.argv, context)
  .then(() => {
    context.logger?.info('chart-pick completed, via entrypoint');
  })
  .catch((error: unknown) => {
    const errorHandler: ErrorHandler = container.resolve(InjectTokens.ErrorHandler);
    errorHandler.handle(error);
  });
