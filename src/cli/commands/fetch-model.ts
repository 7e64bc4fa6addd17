/**
 * Fetch-model command
 * Makes sure the bundled model file is present before packaging
 */

import { Command } from 'commander';

import { ENV_VARS, loadConfig } from '../../config/index.js';
import { errorMessage, ReleaseError } from '../../errors.js';
import { describeFetchResult, fetchModel, resolveModelDestination } from '../../model/fetch-model.js';
import {
  failSpinner,
  printFailure,
  printJson,
  printWarning,
  setVerbose,
  startSpinner,
  succeedSpinner,
} from '../output.js';

interface FetchModelCommandOptions {
  url?: string;
  output?: string;
  json?: boolean;
}

/**
 * Create the fetch-model command
 */
export function createFetchModelCommand(): Command {
  return new Command('fetch-model')
    .description('Download the model file unless it is already present')
    .option('--url <url>', 'Model URL (overrides model.url)')
    .option('-o, --output <path>', 'Destination file (overrides model.path)')
    .option('--json', 'Output the result as JSON')
    .action(async (options: FetchModelCommandOptions) => {
      try {
        const config = await loadConfig();
        setVerbose(config.output.verbose);
        const url = options.url ?? config.model.url;
        if (!url) {
          throw new ReleaseError(`No model URL configured. Set model.url or ${ENV_VARS.MODEL_URL}`, {
            operation: 'fetchModel',
          });
        }
        const destination = resolveModelDestination(url, options.output ?? config.model.path);

        if (!options.json) startSpinner(`Checking ${destination}`);
        const result = await fetchModel({
          url,
          destination,
          sha256: config.model.sha256,
          retries: config.model.retries,
          onAttemptFailed: (attempt, error, delayMs) => {
            if (!options.json) {
              printWarning(`Attempt ${attempt} failed: ${errorMessage(error)}. Retrying in ${delayMs}ms`);
            }
          },
        });

        if (options.json) {
          printJson(result);
        } else {
          succeedSpinner(describeFetchResult(result));
        }
      } catch (error) {
        failSpinner();
        printFailure(error);
        process.exit(1);
      }
    });
}
