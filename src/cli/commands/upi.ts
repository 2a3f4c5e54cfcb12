import { NotFoundError } from '../../lib/errors.js';
import { UpiOptions, parseInput } from '../../middleware/validation.js';
import { HELP_FLAG, JSON_FLAG, parseFlags, showHelp, writeDisclaimer, writeLines } from '../args.js';
import { renderUpiGuide, toJson } from '../format.js';
import type { CliContext, Command } from '../types.js';

export const upiCommand: Command = {
  name: 'upi',
  summary: 'Get UPI guidance on setup, security, disputes, or limits',
  usage: [
    '--topic <topic>  setup | security | disputes | limits (required)',
    '--json-output    Output as JSON',
  ],

  run(args: string[], ctx: CliContext): number {
    const flags = parseFlags(args, {
      ...HELP_FLAG,
      ...JSON_FLAG,
      topic: { type: 'string' },
    });
    if (flags.help) return showHelp(upiCommand, ctx);

    const options = parseInput(UpiOptions, {
      topic: flags.topic,
      json: flags['json-output'],
    }, 'upi options');

    const guide = ctx.services.upi;
    const entry = guide.getGuide(options.topic);
    if (!entry) {
      // Only reachable when a custom content directory drops one of the guides.
      throw new NotFoundError(
        `Unknown topic: ${options.topic}. Available: ${guide.availableTopics().join(', ')}`
      );
    }

    if (options.json) {
      ctx.io.stdout(toJson(entry));
      return 0;
    }

    writeLines(ctx, renderUpiGuide(entry));
    writeDisclaimer(ctx);
    return 0;
  },
};
