import { AppError } from '../lib/errors.js';
import { logger } from '../lib/logger.js';
import { commands } from './commands/index.js';
import { readPackageVersion } from './version.js';
import type { CliContext } from './types.js';

export const USAGE_EXIT_CODE = 2;

export function renderUsage(): string {
  const width = Math.max(...commands.map(command => command.name.length)) + 2;
  return [
    'Usage: paisa-guide <command> [options]',
    '',
    'Financial literacy for India: concepts, budgets, government schemes, investments and UPI.',
    '',
    'Commands:',
    ...commands.map(command => `  ${command.name.padEnd(width)}${command.summary}`),
    '',
    'Options:',
    '  -h, --help     Show help (also after a command)',
    '  -v, --version  Show version',
  ].join('\n');
}

/**
 * Runs one CLI invocation and returns the exit code. Errors never escape:
 * application errors map to their exit code, anything else to 1.
 */
export function runCli(argv: string[], ctx: CliContext): number {
  const [name, ...rest] = argv;

  if (name === undefined || name === '--help' || name === '-h') {
    ctx.io.stdout(renderUsage());
    return name === undefined ? USAGE_EXIT_CODE : 0;
  }

  if (name === '--version' || name === '-v') {
    ctx.io.stdout(readPackageVersion());
    return 0;
  }

  const command = commands.find(candidate => candidate.name === name);
  if (!command) {
    ctx.io.stderr(`Error: Unknown command "${name}"\n\n${renderUsage()}`);
    return USAGE_EXIT_CODE;
  }

  try {
    return command.run(rest, ctx);
  } catch (error) {
    if (error instanceof AppError) {
      logger.debug({ command: name, code: error.errorCode, details: error.details }, 'Command failed');
      ctx.io.stderr(`Error: ${error.message}`);
      return error.exitCode;
    }

    logger.error({ err: error, command: name }, 'Unexpected command failure');
    ctx.io.stderr(`Error: ${error instanceof Error ? error.message : String(error)}`);
    return 1;
  }
}
