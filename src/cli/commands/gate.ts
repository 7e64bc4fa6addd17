/**
 * Gate command
 * Installer pre-install check; the process exit code is the gate's decision
 */

import { Command } from 'commander';

import { loadConfig } from '../../config/index.js';
import { ReleaseError } from '../../errors.js';
import { createArchitectureProbe } from '../../gate/architecture.js';
import { FileLogSink } from '../../gate/log-sink.js';
import { createNotifier } from '../../gate/notifier.js';
import { runPlatformGate } from '../../gate/platform-gate.js';
import { ArchitectureSchema } from '../../types/release.js';
import {
  printError,
  printFailure,
  printJson,
  printSuccess,
  setVerbose,
} from '../output.js';

interface GateOptions {
  expect: string;
  log?: string;
  dialog: boolean;
  arch?: string;
  translated?: boolean;
  json?: boolean;
}

/**
 * Create the gate command
 */
export function createGateCommand(): Command {
  return new Command('gate')
    .description('Refuse to install on a Mac of the wrong architecture')
    .requiredOption('-e, --expect <arch>', 'Architecture this installer was built for (x86_64 or arm64)')
    .option('--log <path>', 'Diagnostic log to append to')
    .option('--no-dialog', 'Print the error instead of showing a dialog')
    .option('--arch <raw>', 'Use this machine architecture instead of detecting it')
    .option('--translated', 'Treat the process as running under translation (with --arch)')
    .option('--json', 'Output the decision as JSON')
    .action(async (options: GateOptions) => {
      try {
        const expected = ArchitectureSchema.safeParse(options.expect);
        if (!expected.success) {
          throw new ReleaseError(`Unknown architecture "${options.expect}". Expected x86_64 or arm64`, {
            operation: 'gate',
          });
        }

        const config = await loadConfig();

        setVerbose(config.output.verbose);
        const machine =
          options.arch !== undefined
            ? { raw: options.arch, translated: options.translated ?? false }
            : await createArchitectureProbe().detect();

        const result = await runPlatformGate(
          { reportedArchitecture: machine.raw, translated: machine.translated, expected: expected.data },
          {
            sink: new FileLogSink(options.log ?? config.gate.log_path),
            notifier: createNotifier(options.dialog && config.gate.dialog, printError),
          },
        );

        if (options.json) {
          printJson(result);
        } else if (result.decision === 'proceed') {
          printSuccess(result.message);
        }
        process.exit(result.exitCode);
      } catch (error) {
        printFailure(error);
        process.exit(1);
      }
    });
}
