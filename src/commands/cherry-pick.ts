// SPDX-License-Identifier: Apache-2.0

import {type ArgumentsCamelCase, type Argv, type CommandModule} from 'yargs';
import {inject, injectable} from 'tsyringe-neo';
import {stringify} from 'lossless-json';
import {InjectTokens} from '../core/dependency-injection/inject-tokens.js';
import {patchInject} from '../core/dependency-injection/container-helper.js';
import {type ChartPickLogger} from '../core/logging/chart-pick-logger.js';
import {IllegalArgumentError} from '../core/errors/illegal-argument-error.js';
import {type ManifestFetcher} from '../business/manifest/manifest-fetcher.js';
import {type ChartMerger} from '../business/manifest/chart-merger.js';
import {type ManifestEmitter} from '../business/manifest/manifest-emitter.js';
import {type BuildManifest, type JsonValue, type ManifestLocation} from '../business/manifest/build-manifest.js';
import {parseChartNames} from '../business/utils/chart-names.js';
import {type ArgvValues, Flags} from './flags.js';
import * as constants from '../core/constants.js';

export interface CherryPickOptions {
  targetRevision: string;
  sourceRevision: string;
  charts: string[];
  location: ManifestLocation;
  indent: number;
}

/**
 * Copies the named helm charts of the source revision's build manifest into the target revision's manifest and
 * prints the result.
 */
@injectable()
export class CherryPickCommand {
  public static readonly COMMAND = '$0 <target> <source> <charts>';

  private readonly fetcher: ManifestFetcher;
  private readonly merger: ChartMerger;
  private readonly emitter: ManifestEmitter;
  private readonly logger: ChartPickLogger;

  public constructor(
    @inject(InjectTokens.ManifestFetcher) fetcher?: ManifestFetcher,
    @inject(InjectTokens.ChartMerger) merger?: ChartMerger,
    @inject(InjectTokens.ManifestEmitter) emitter?: ManifestEmitter,
    @inject(InjectTokens.ChartPickLogger) logger?: ChartPickLogger,
  ) {
    this.fetcher = patchInject(fetcher, InjectTokens.ManifestFetcher, this.constructor.name);
    this.merger = patchInject(merger, InjectTokens.ChartMerger, this.constructor.name);
    this.emitter = patchInject(emitter, InjectTokens.ManifestEmitter, this.constructor.name);
    this.logger = patchInject(logger, InjectTokens.ChartPickLogger, this.constructor.name);
  }

  public getCommandDefinition(): CommandModule {
    return {
      command: CherryPickCommand.COMMAND,
      describe: 'Replace helm charts in the target revision build manifest with those of the source revision',
      builder: (y: Argv): Argv => {
        y.positional('target', {describe: 'Revision whose build manifest is printed', type: 'string'});
        y.positional('source', {describe: 'Revision to take the charts from', type: 'string'});
        y.positional('charts', {describe: 'Comma separated chart names, e.g. ingress,redis', type: 'string'});
        Flags.setOptionalCommandFlags(y, ...Flags.allFlags);
        return y;
      },
      handler: async (argv: ArgumentsCamelCase) => {
        await this.handle(argv);
      },
    };
  }

  public async handle(argv: ArgvValues): Promise<void> {
    this.logger.setDevMode(Flags.booleanValue(argv, Flags.devMode));

    const repository = Flags.stringValue(argv, Flags.repository);
    const options: CherryPickOptions = {
      targetRevision: this.positional(argv, 'target'),
      sourceRevision: this.positional(argv, 'source'),
      charts: parseChartNames(this.positional(argv, 'charts')),
      location: {
        path: Flags.stringValue(argv, Flags.manifestPath) ?? constants.DEFAULT_MANIFEST_PATH,
        repository: repository || undefined,
      },
      indent: Flags.integerValue(argv, Flags.indent),
    };

    await this.cherryPick(options);
  }

  /**
   * Fetches both manifests one after the other, merges them and emits the result. Nothing is emitted when any step
   * fails.
   */
  public async cherryPick(options: CherryPickOptions): Promise<BuildManifest> {
    const {targetRevision, sourceRevision, charts, location, indent} = options;
    this.logger.info(`==== Cherry-picking [${charts.join(', ')}] from ${sourceRevision} into ${targetRevision} ====`);

    const target = await this.fetcher.fetch(targetRevision, location);
    const source = await this.fetcher.fetch(sourceRevision, location);
    const merged = this.merger.merge(target, source, charts);

    for (const change of this.merger.summarizeChanges(target, merged, charts)) {
      const action = change.added ? 'added' : 'replaced';
      const before = this.formatVersion(change.before);
      const after = this.formatVersion(change.after);
      this.logger.info(`Chart '${change.chart}' ${action}, version ${before} -> ${after}`);
    }

    await this.emitter.emit(merged, indent);
    this.logger.info(`==== Finished cherry-picking into ${targetRevision} ====`);
    return merged;
  }

  private formatVersion(version: JsonValue | undefined): string {
    return version === undefined ? '<none>' : (stringify(version) ?? '<none>');
  }

  private positional(argv: ArgvValues, name: string): string {
    const value = argv[name];
    if (typeof value !== 'string') {
      throw new IllegalArgumentError(`<${name}> is required`, value);
    }
    return value;
  }
}
