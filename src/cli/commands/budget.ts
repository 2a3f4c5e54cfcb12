import { BudgetOptions, parseInput } from '../../middleware/validation.js';
import { HELP_FLAG, JSON_FLAG, parseFlags, showHelp, writeDisclaimer, writeLines } from '../args.js';
import { renderBudgetPlan, toJson } from '../format.js';
import type { CliContext, Command } from '../types.js';

export const budgetCommand: Command = {
  name: 'budget',
  summary: 'Generate a budget plan based on your monthly income',
  usage: [
    '--income <amount>  Monthly income in INR (required)',
    '--json-output      Output as JSON',
  ],

  run(args: string[], ctx: CliContext): number {
    const flags = parseFlags(args, {
      ...HELP_FLAG,
      ...JSON_FLAG,
      income: { type: 'string' },
    });
    if (flags.help) return showHelp(budgetCommand, ctx);

    const options = parseInput(BudgetOptions, {
      income: flags.income,
      json: flags['json-output'],
    }, 'budget options');

    const plan = ctx.services.budget.plan(options.income);

    if (options.json) {
      ctx.io.stdout(toJson(plan));
      return 0;
    }

    writeLines(ctx, renderBudgetPlan(plan));
    writeDisclaimer(ctx);
    return 0;
  },
};
