#!/usr/bin/env node

/**
 * Developer CLI: `check-config` and `simulate` subcommands.
 */

import { Command, InvalidArgumentError } from 'commander';
import { readFileSync } from 'fs';
import { executeCheckConfigCommand } from './commands/checkConfig';
import { executeSimulateCommand } from './commands/simulate';
import { createErrorHandler } from './errors/handler';
import { resolvePackagePath } from './utils/packageRoot';
import { ui } from './utils/ui';

function readVersion(): string {
  const parsed: unknown = JSON.parse(readFileSync(resolvePackagePath('package.json'), 'utf8'));
  if (typeof parsed === 'object' && parsed !== null && 'version' in parsed && typeof parsed.version === 'string') {
    return parsed.version;
  }
  return '0.0.0';
}

function parseEventCount(value: string): number {
  const count = Number(value);
  if (!Number.isInteger(count) || count < 0) {
    throw new InvalidArgumentError('Must be a non-negative integer.');
  }
  return count;
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('telemetry-orchestrator')
    .description('Inspect and exercise the telemetry pipeline')
    .version(readVersion(), '-v, --version', 'Show version')
    .option('--verbose', 'Enable verbose output', false)
    .hook('preAction', (thisCommand) => {
      if (thisCommand.opts<{ verbose?: boolean }>().verbose) {
        process.env['TELEMETRY_VERBOSE'] = '1';
      }
    });

  program
    .command('check-config')
    .description('Validate a configuration file and print the effective settings')
    .argument('[file]', 'YAML configuration file (default: $TELEMETRY_CONFIG)')
    .option('--json', 'Print settings as JSON', false)
    .action((file: string | undefined, opts: { json: boolean }) => {
      executeCheckConfigCommand({ ...(file !== undefined ? { file } : {}), json: opts.json });
    });

  program
    .command('simulate')
    .description('Record synthetic events against in-memory storage and report the pings produced')
    .option('--events <n>', 'Number of events to record', parseEventCount, 10)
    .option('--config <file>', 'YAML configuration file')
    .option('--json', 'Print the summary as JSON', false)
    .action(async (opts: { events: number; config?: string; json: boolean }) => {
      await executeSimulateCommand({
        events: opts.events,
        json: opts.json,
        ...(opts.config !== undefined ? { config: opts.config } : {}),
      });
    });

  return program;
}

export async function executeCli(argv: string[] = process.argv): Promise<void> {
  await createProgram().parseAsync(argv);
}

if (require.main === module) {
  executeCli().catch((error: unknown) => {
    const handler = createErrorHandler({ logErrors: false, includeStack: false });
    ui.error(handler.formatError(handler.normalizeError(error)).message);
    process.exit(1);
  });
}
