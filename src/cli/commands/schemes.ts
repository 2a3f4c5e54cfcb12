import { NotFoundError } from '../../lib/errors.js';
import { SchemesOptions, parseInput } from '../../middleware/validation.js';
import { HELP_FLAG, JSON_FLAG, parseFlags, showHelp, writeDisclaimer, writeLines } from '../args.js';
import { renderScheme, renderSchemes, toJson } from '../format.js';
import type { CliContext, Command } from '../types.js';

export const schemesCommand: Command = {
  name: 'schemes',
  summary: 'Find eligible government financial schemes',
  usage: [
    '--age <years>        Your age',
    '--income <amount>    Annual income in INR',
    '--occupation <text>  Occupation (e.g. farmer, salaried, self-employed)',
    '--name <text>        Look up a single scheme by (partial) name',
    '--json-output        Output as JSON',
  ],

  run(args: string[], ctx: CliContext): number {
    const flags = parseFlags(args, {
      ...HELP_FLAG,
      ...JSON_FLAG,
      age: { type: 'string' },
      income: { type: 'string' },
      occupation: { type: 'string' },
      name: { type: 'string' },
    });
    if (flags.help) return showHelp(schemesCommand, ctx);

    const options = parseInput(SchemesOptions, {
      age: flags.age,
      income: flags.income,
      occupation: flags.occupation,
      name: flags.name,
      json: flags['json-output'],
    }, 'schemes options');

    const advisor = ctx.services.schemes;

    if (options.name !== undefined) {
      const scheme = advisor.getScheme(options.name);
      if (!scheme) {
        throw new NotFoundError(`No scheme matches "${options.name}"`);
      }
      if (options.json) {
        ctx.io.stdout(toJson(scheme));
        return 0;
      }
      writeLines(ctx, ['', ...renderScheme(scheme)]);
      writeDisclaimer(ctx);
      return 0;
    }

    const eligible = advisor.findEligible({
      age: options.age,
      income: options.income,
      occupation: options.occupation,
    });

    if (options.json) {
      ctx.io.stdout(toJson(eligible));
      return 0;
    }

    writeLines(ctx, renderSchemes(eligible));
    writeDisclaimer(ctx);
    return 0;
  },
};
