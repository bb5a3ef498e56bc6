// SPDX-License-Identifier: Apache-2.0

import {fileURLToPath} from 'node:url';
import path from 'node:path';
import fs from 'node:fs';
import {PathEx} from './src/business/utils/path-ex.js';

/**
 * Returns the chart-pick version from the npm environment, or from package.json next to this file.
 */
export function getChartPickVersion(): string {
  if (process.env.npm_package_version) {
    return process.env.npm_package_version;
  }

  const __filename: string = fileURLToPath(import.meta.url);
  const __dirname: string = path.dirname(__filename);

  // package.json sits beside this file in the sources and one level up in dist/
  for (const candidate of ['./package.json', '../package.json']) {
    const packageJsonPath: string = PathEx.resolve(__dirname, candidate);
    if (fs.existsSync(packageJsonPath)) {
      const packageJson: {version?: unknown} = JSON.parse(fs.readFileSync(packageJsonPath, 'utf8'));
      if (typeof packageJson.version === 'string') {
        return packageJson.version;
      }
    }
  }

  return 'unknown';
}
