// SPDX-License-Identifier: Apache-2.0

/**
 * Dependency injection tokens
 */
export const InjectTokens = {
  LogLevel: Symbol.for('LogLevel'),
  DevelopmentMode: Symbol.for('DevelopmentMode'),
  LogsDirectory: Symbol.for('LogsDirectory'),
  ChartPickLogger: Symbol.for('ChartPickLogger'),
  ErrorHandler: Symbol.for('ErrorHandler'),
  GitExecutable: Symbol.for('GitExecutable'),
  GitClient: Symbol.for('GitClient'),
  ManifestFetcher: Symbol.for('ManifestFetcher'),
  ChartMerger: Symbol.for('ChartMerger'),
  ManifestEmitter: Symbol.for('ManifestEmitter'),
  OutputStream: Symbol.for('OutputStream'),
  CherryPickCommand: Symbol.for('CherryPickCommand'),
};
