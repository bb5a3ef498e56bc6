// SPDX-License-Identifier: Apache-2.0

import {isLosslessNumber, type LosslessNumber} from 'lossless-json';

export type JsonPrimitive = string | number | boolean | null;

/**
 * Numbers read from a manifest are kept as {@link LosslessNumber}s holding their source text, so integers beyond
 * 2^53 and other numeric spellings are written back unchanged.
 */
export type JsonValue = JsonPrimitive | LosslessNumber | JsonValue[] | JsonObject;

export interface JsonObject {
  [key: string]: JsonValue;
}

/**
 * A build manifest as read from `build.json`. Only the `helmCharts` mapping is ever inspected, every other key is
 * carried through untouched.
 */
export type BuildManifest = JsonObject;

/**
 * Where the build manifest lives: its path inside the repository and the repository's working directory.
 */
export interface ManifestLocation {
  path: string;
  repository?: string;
}

/**
 * Which of the two manifests a value was read from.
 */
export enum ManifestRole {
  TARGET = 'target',
  SOURCE = 'source',
}

export function isJsonObject(value: JsonValue | undefined): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !isLosslessNumber(value);
}

export function isJsonValue(value: unknown): value is JsonValue {
  if (value === null || isLosslessNumber(value)) {
    return true;
  }
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return true;
  }
  if (Array.isArray(value)) {
    return value.every(isJsonValue);
  }
  return typeof value === 'object' && value !== null && Object.values(value).every(isJsonValue);
}
