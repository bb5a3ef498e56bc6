// SPDX-License-Identifier: Apache-2.0

import os from 'node:os';
import {PathEx} from '../business/utils/path-ex.js';

// -------------------- chart-pick related constants ---------------------------------------------------------------
export const CHART_PICK_HOME_DIR = process.env.CHART_PICK_HOME || PathEx.join(os.homedir(), '.chart-pick');
export const CHART_PICK_LOGS_DIR = PathEx.join(CHART_PICK_HOME_DIR, 'logs');
export const CHART_PICK_LOG_FILE = 'chart-pick.log';
export const CHART_PICK_LOG_LEVEL = process.env.CHART_PICK_LOG_LEVEL || 'debug';

// -------------------- git related constants ----------------------------------------------------------------------
export const GIT = process.env.CHART_PICK_GIT || 'git';

// -------------------- build manifest related constants -----------------------------------------------------------
export const DEFAULT_MANIFEST_PATH = process.env.CHART_PICK_MANIFEST_PATH || 'build.json';
export const HELM_CHARTS_KEY = 'helmCharts';
export const CHART_VERSION_KEY = 'version';
export const CHART_NAME_SEPARATOR = ',';
