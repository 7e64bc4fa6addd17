/**
 * Default configuration values
 */

import { DEFAULT_GATE_LOG_PATH } from '../gate/log-sink.js';
import type { Config } from './schema.js';

/**
 * Default configuration object
 */
export const DEFAULT_CONFIG: Config = {
  repository: {},
  release: {
    on_existing: 'fail',
    targets: ['windows', 'macos-x86_64', 'macos-arm64'],
    artifacts_dir: 'artifacts',
  },
  build: {
    steps: {},
    output_dir: 'dist-release',
  },
  gate: {
    log_path: DEFAULT_GATE_LOG_PATH,
    dialog: true,
  },
  model: {
    retries: 2,
  },
  output: {
    verbose: false,
  },
};

/**
 * Configuration file names to search for
 */
export const CONFIG_FILE_NAMES = [
  'freescribe-release.config.yaml',
  'freescribe-release.config.yml',
  '.freescribe-releaserc.yaml',
  '.freescribe-releaserc.yml',
  '.freescribe-releaserc',
];

/**
 * Environment variable names
 */
export const ENV_VARS = {
  ON_EXISTING: 'FREESCRIBE_RELEASE_ON_EXISTING',
  GATE_LOG: 'FREESCRIBE_GATE_LOG',
  MODEL_URL: 'FREESCRIBE_MODEL_URL',
  MODEL_PATH: 'FREESCRIBE_MODEL_PATH',
  LOG_LEVEL: 'FREESCRIBE_LOG_LEVEL',
  REPOSITORY: 'GITHUB_REPOSITORY',
  TOKEN: 'GITHUB_TOKEN',
  OUTPUT: 'GITHUB_OUTPUT',
} as const;
