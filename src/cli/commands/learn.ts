import { LearnOptions, parseInput } from '../../middleware/validation.js';
import type { Concept } from '../../types/content.js';
import { HELP_FLAG, JSON_FLAG, parseFlags, showHelp, writeDisclaimer, writeLines } from '../args.js';
import { renderConcepts, toJson } from '../format.js';
import type { CliContext, Command } from '../types.js';

export const learnCommand: Command = {
  name: 'learn',
  summary: 'Learn financial concepts by topic and level',
  usage: [
    '--topic <topic>   savings | insurance | investment | credit | taxation | digital_payments',
    '--level <level>   beginner | intermediate | advanced',
    '--search <query>  Search titles and explanations by keyword',
    '--json-output     Output as JSON',
  ],

  run(args: string[], ctx: CliContext): number {
    const flags = parseFlags(args, {
      ...HELP_FLAG,
      ...JSON_FLAG,
      topic: { type: 'string' },
      level: { type: 'string' },
      search: { type: 'string' },
    });
    if (flags.help) return showHelp(learnCommand, ctx);

    const options = parseInput(LearnOptions, {
      topic: flags.topic,
      level: flags.level,
      search: flags.search,
      json: flags['json-output'],
    }, 'learn options');

    const library = ctx.services.concepts;
    let concepts: Concept[];
    if (options.search) {
      concepts = library.search(options.search);
    } else if (options.topic && options.level) {
      concepts = library.byTopicAndLevel(options.topic, options.level);
    } else if (options.topic) {
      concepts = library.byTopic(options.topic);
    } else if (options.level) {
      concepts = library.byLevel(options.level);
    } else {
      concepts = library.all();
    }

    if (options.json) {
      ctx.io.stdout(toJson(concepts));
      return 0;
    }

    writeLines(ctx, renderConcepts(concepts));
    writeDisclaimer(ctx);
    return 0;
  },
};
