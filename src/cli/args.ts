import { parseArgs, type ParseArgsConfig } from 'util';
import { ValidationError } from '../lib/errors.js';
import { DISCLAIMER } from './format.js';
import type { CliContext, Command } from './types.js';

export type FlagConfig = NonNullable<ParseArgsConfig['options']>;

export const HELP_FLAG: FlagConfig = {
  help: { type: 'boolean', short: 'h' },
};

export const JSON_FLAG: FlagConfig = {
  'json-output': { type: 'boolean' },
};

function isParseArgsError(error: unknown): error is TypeError & { code: string } {
  return error instanceof TypeError &&
    'code' in error &&
    typeof error.code === 'string' &&
    error.code.startsWith('ERR_PARSE_ARGS');
}

/** Parses `--flag value` pairs; unknown flags and stray positionals become ValidationErrors. */
export function parseFlags(args: string[], options: FlagConfig): Record<string, unknown> {
  try {
    const { values } = parseArgs({ args, options, strict: true, allowPositionals: false });
    return values;
  } catch (error) {
    if (isParseArgsError(error)) {
      throw new ValidationError(error.message);
    }
    throw error;
  }
}

export function writeLines(ctx: CliContext, lines: string[]): void {
  ctx.io.stdout(lines.join('\n'));
}

export function writeDisclaimer(ctx: CliContext): void {
  if (ctx.showDisclaimer) {
    ctx.io.stdout(`\n${DISCLAIMER}\n`);
  }
}

export function showHelp(command: Command, ctx: CliContext): number {
  ctx.io.stdout([
    `Usage: paisa-guide ${command.name} [options]`,
    '',
    command.summary,
    '',
    'Options:',
    ...command.usage.map(line => `  ${line}`),
    '  -h, --help      Show this message',
  ].join('\n'));
  return 0;
}
