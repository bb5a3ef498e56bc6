// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {parse} from 'lossless-json';
import {InjectTokens} from '../../core/dependency-injection/inject-tokens.js';
import {patchInject} from '../../core/dependency-injection/container-helper.js';
import {type ChartPickLogger} from '../../core/logging/chart-pick-logger.js';
import {type GitClient} from '../../integration/git/git-client.js';
import {GitExecutionException} from '../../integration/git/git-execution-exception.js';
import {GitOutputEncodingException} from '../../integration/git/git-output-encoding-exception.js';
import {ManifestRetrievalError} from '../errors/manifest-retrieval-error.js';
import {ManifestParseError} from '../errors/manifest-parse-error.js';
import {type BuildManifest, isJsonObject, isJsonValue, type ManifestLocation} from './build-manifest.js';
import * as constants from '../../core/constants.js';

/**
 * Reads the build manifest as it was committed at a revision.
 */
@injectable()
export class ManifestFetcher {
  public static readonly DEFAULT_LOCATION: ManifestLocation = {path: constants.DEFAULT_MANIFEST_PATH};

  private readonly gitClient: GitClient;
  private readonly logger: ChartPickLogger;

  public constructor(
    @inject(InjectTokens.GitClient) gitClient?: GitClient,
    @inject(InjectTokens.ChartPickLogger) logger?: ChartPickLogger,
  ) {
    this.gitClient = patchInject(gitClient, InjectTokens.GitClient, this.constructor.name);
    this.logger = patchInject(logger, InjectTokens.ChartPickLogger, this.constructor.name);
  }

  /**
   * @param revision - the revision to read the manifest at, passed to git as is
   * @param location - the manifest path and repository, defaults to `build.json` in the current directory
   * @throws ManifestRetrievalError if git cannot read the file at that revision
   * @throws ManifestParseError if the content is not valid UTF-8 or not a JSON object
   */
  public async fetch(
    revision: string,
    location: ManifestLocation = ManifestFetcher.DEFAULT_LOCATION,
  ): Promise<BuildManifest> {
    this.logger.debug(`Fetching ${location.path} at revision ${revision}`, {repository: location.repository});

    let content: string;
    try {
      content = await this.gitClient.showFile(revision, location.path, location.repository);
    } catch (error) {
      if (error instanceof GitOutputEncodingException) {
        throw new ManifestParseError(revision, location.path, 'the content is not valid UTF-8', error);
      }
      const diagnostic = error instanceof GitExecutionException ? error.getStdErr() : String(error);
      throw new ManifestRetrievalError(revision, location.path, diagnostic, error);
    }

    return this.parse(revision, location.path, content);
  }

  private parse(revision: string, path: string, content: string): BuildManifest {
    let parsed: unknown;
    try {
      // numbers stay LosslessNumbers so they are written back with their original digits
      parsed = parse(content);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ManifestParseError(revision, path, reason, error);
    }

    if (!isJsonValue(parsed) || !isJsonObject(parsed)) {
      throw new ManifestParseError(revision, path, 'the document root is not a JSON object');
    }

    this.logger.debug(`Parsed ${path} at revision ${revision}`, {keys: Object.keys(parsed)});
    return parsed;
  }
}
