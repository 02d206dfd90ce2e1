/**
 * Console output for the CLI commands.
 *
 * - Uses yoctocolors-cjs for portable colors in CommonJS
 * - Gates debug output behind TELEMETRY_VERBOSE=1 or --verbose
 */
import * as colors from 'yoctocolors-cjs';

const isVerbose = (): boolean => process.env['TELEMETRY_VERBOSE'] === '1';

export const ui = {
  info: (msg = ''): void => {
    process.stdout.write(msg + '\n');
  },
  success: (msg = ''): void => {
    process.stdout.write(colors.bold(colors.green(msg)) + '\n');
  },
  warn: (msg = ''): void => {
    process.stdout.write(colors.yellow(msg) + '\n');
  },
  error: (msg = ''): void => {
    process.stderr.write(colors.red(msg) + '\n');
  },
  debug: (msg = ''): void => {
    if (isVerbose()) {
      process.stdout.write(colors.gray(msg) + '\n');
    }
  },
};
