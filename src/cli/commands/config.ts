/**
 * Config command
 * Inspect the effective configuration
 */

import { Command } from 'commander';

import { DEFAULT_CONFIG, findConfigPath, getConfigValue, loadConfig } from '../../config/index.js';
import {
  printError,
  printFailure,
  printHeader,
  printInfo,
  printJson,
  printKeyValue,
  printSection,
  setVerbose,
} from '../output.js';

/**
 * Create the config command
 */
export function createConfigCommand(): Command {
  const config = new Command('config').description('Inspect release configuration');

  // Show current config
  config
    .command('show')
    .description('Show the effective configuration (defaults, file and environment merged)')
    .argument('[key]', 'Only show one value, e.g. release.on_existing')
    .option('--json', 'Output as JSON')
    .action(async (key: string | undefined, options: { json?: boolean }) => {
      try {
        const loadedConfig = await loadConfig();
        setVerbose(loadedConfig.output.verbose);

        if (key) {
          const value = getConfigValue(loadedConfig, key);
          if (value === undefined) {
            printError(`Configuration key not found: ${key}`);
            process.exit(1);
          }
          console.log(typeof value === 'object' ? JSON.stringify(value, null, 2) : String(value));
          return;
        }

        if (options.json) {
          printJson(loadedConfig);
          return;
        }

        printHeader('Current Configuration');
        const configPath = await findConfigPath();
        printInfo(configPath ? `Config file: ${configPath}` : 'Using default configuration');
        printConfigSections(loadedConfig);
      } catch (error) {
        printFailure(error);
        process.exit(1);
      }
    });

  // Show defaults
  config
    .command('defaults')
    .description('Show default configuration values')
    .option('--json', 'Output as JSON')
    .action((options: { json?: boolean }) => {
      if (options.json) {
        printJson(DEFAULT_CONFIG);
        return;
      }

      printHeader('Default Configuration');
      printConfigSections(DEFAULT_CONFIG);
    });

  return config;
}

function printConfigSections(config: typeof DEFAULT_CONFIG): void {
  for (const [section, values] of Object.entries(config)) {
    printSection(section);
    printConfigValues(values);
  }
}

function printConfigValues(values: object, prefix = ''): void {
  const entries: Array<[string, unknown]> = Object.entries(values);
  if (entries.length === 0 && !prefix) {
    printInfo('(not set)');
  }
  for (const [key, value] of entries) {
    const label = prefix ? `${prefix}.${key}` : key;
    if (Array.isArray(value)) {
      const items = value.map((item: unknown) => (typeof item === 'object' ? JSON.stringify(item) : String(item)));
      printKeyValue(label, items.join(', ') || '(none)');
    } else if (typeof value === 'object' && value !== null) {
      printConfigValues(value, label);
    } else {
      printKeyValue(label, String(value));
    }
  }
}
