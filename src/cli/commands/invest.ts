import { sortForDisplay } from '../../lib/investmentBasics.js';
import { InvestOptions, parseInput } from '../../middleware/validation.js';
import type { InvestmentOption } from '../../types/content.js';
import { HELP_FLAG, JSON_FLAG, parseFlags, showHelp, writeDisclaimer, writeLines } from '../args.js';
import { renderInvestmentTable, toJson } from '../format.js';
import type { CliContext, Command } from '../types.js';

export const investCommand: Command = {
  name: 'invest',
  summary: 'Compare investment options',
  usage: [
    '--risk <level>  low | moderate | high',
    '--tax-saving    Show only tax-saving options',
    '--beginner      Show only low-risk options suited to beginners',
    '--json-output   Output as JSON',
  ],

  run(args: string[], ctx: CliContext): number {
    const flags = parseFlags(args, {
      ...HELP_FLAG,
      ...JSON_FLAG,
      risk: { type: 'string' },
      'tax-saving': { type: 'boolean' },
      beginner: { type: 'boolean' },
    });
    if (flags.help) return showHelp(investCommand, ctx);

    const options = parseInput(InvestOptions, {
      risk: flags.risk,
      taxSaving: flags['tax-saving'],
      beginner: flags.beginner,
      json: flags['json-output'],
    }, 'invest options');

    const basics = ctx.services.investments;
    let selected: InvestmentOption[];
    if (options.taxSaving) {
      selected = basics.taxSaving();
    } else if (options.beginner) {
      selected = basics.forBeginner();
    } else if (options.risk) {
      selected = basics.byRisk(options.risk);
    } else {
      selected = basics.compareAll();
    }

    if (options.json) {
      ctx.io.stdout(toJson(selected));
      return 0;
    }

    writeLines(ctx, renderInvestmentTable(sortForDisplay(selected)));
    writeDisclaimer(ctx);
    return 0;
  },
};
