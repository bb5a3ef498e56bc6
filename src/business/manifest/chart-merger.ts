// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {InjectTokens} from '../../core/dependency-injection/inject-tokens.js';
import {patchInject} from '../../core/dependency-injection/container-helper.js';
import {type ChartPickLogger} from '../../core/logging/chart-pick-logger.js';
import {ChartLookupError} from '../errors/chart-lookup-error.js';
import {type BuildManifest, isJsonObject, type JsonObject, type JsonValue, ManifestRole} from './build-manifest.js';
import * as constants from '../../core/constants.js';

export interface ChartChange {
  chart: string;
  /** the chart's `version` in the target manifest, undefined when absent */
  before?: JsonValue;
  /** the chart's `version` in the merged manifest */
  after?: JsonValue;
  added: boolean;
}

/**
 * Copies selected `helmCharts` entries from one build manifest into another.
 */
@injectable()
export class ChartMerger {
  private readonly logger: ChartPickLogger;

  public constructor(@inject(InjectTokens.ChartPickLogger) logger?: ChartPickLogger) {
    this.logger = patchInject(logger, InjectTokens.ChartPickLogger, this.constructor.name);
  }

  /**
   * Returns a copy of `target` whose `helmCharts` entries named in `names` are replaced by the entries of `source`.
   * Charts missing from the target are appended, all other keys keep their value and position.
   *
   * `target` and `source` are left unmodified. Chart values are shared with `source`, not cloned.
   *
   * @param target - the manifest to merge into
   * @param source - the manifest to take the named charts from
   * @param names - the chart names to replace, applied in order
   * @throws ChartLookupError if a requested chart is missing from the source, or a manifest has no chart mapping
   */
  public merge(target: BuildManifest, source: BuildManifest, names: readonly string[]): BuildManifest {
    if (names.length === 0) {
      return {...target};
    }

    const targetCharts = this.chartsOf(target, ManifestRole.TARGET);
    const sourceCharts = this.chartsOf(source, ManifestRole.SOURCE);

    const merged = new Map<string, JsonValue>(Object.entries(targetCharts));
    for (const name of names) {
      if (!Object.hasOwn(sourceCharts, name)) {
        throw new ChartLookupError(
          `Chart '${name}' not found in the ${constants.HELM_CHARTS_KEY} of the ${ManifestRole.SOURCE} manifest`,
          name,
          ManifestRole.SOURCE,
        );
      }
      if (!merged.has(name)) {
        this.logger.warn(`Chart '${name}' is not present in the ${ManifestRole.TARGET} manifest, adding it`);
      }
      merged.set(name, sourceCharts[name]);
    }

    // Object.fromEntries defines own properties, so a chart named `__proto__` stays a plain key
    return {...target, [constants.HELM_CHARTS_KEY]: Object.fromEntries(merged)};
  }

  /**
   * Describes what {@link merge} changed for each requested chart, using the chart's `version` field when it has one.
   */
  public summarizeChanges(target: BuildManifest, merged: BuildManifest, names: readonly string[]): ChartChange[] {
    const targetCharts = target[constants.HELM_CHARTS_KEY];
    const mergedCharts = merged[constants.HELM_CHARTS_KEY];
    const before = isJsonObject(targetCharts) ? targetCharts : {};
    const after = isJsonObject(mergedCharts) ? mergedCharts : {};

    return [...new Set(names)].map(chart => ({
      chart,
      before: this.versionOf(before, chart),
      after: this.versionOf(after, chart),
      added: !Object.hasOwn(before, chart),
    }));
  }

  private chartsOf(manifest: BuildManifest, role: ManifestRole): JsonObject {
    const charts = Object.hasOwn(manifest, constants.HELM_CHARTS_KEY) ? manifest[constants.HELM_CHARTS_KEY] : undefined;
    if (!isJsonObject(charts)) {
      throw new ChartLookupError(
        `The ${role} manifest has no ${constants.HELM_CHARTS_KEY} mapping`,
        constants.HELM_CHARTS_KEY,
        role,
      );
    }
    return charts;
  }

  private versionOf(charts: JsonObject, chart: string): JsonValue | undefined {
    if (!Object.hasOwn(charts, chart)) {
      return undefined;
    }
    const definition = charts[chart];
    return isJsonObject(definition) && Object.hasOwn(definition, constants.CHART_VERSION_KEY)
      ? definition[constants.CHART_VERSION_KEY]
      : undefined;
  }
}
