/**
 * Route Command
 *
 * Shows which agent a chat turn would be handed to, using the keyword
 * rules under [routing] in config.toml.
 *
 *   ragline route "I was charged twice this month"
 *   # billing (matched "charge")
 */

import { Command } from 'commander';
import chalk from 'chalk';
import type { CommandContext } from '../types.js';
import { KeywordRouter } from '../../agent/router.js';
import { loadCommandConfig } from '../utils/runtime.js';
import { parseInput, RouteArgsSchema } from '../validation.js';

/**
 * Create the route command.
 *
 * @param getContext - Factory to get command context with global options
 */
export function createRouteCommand(getContext: () => CommandContext): Command {
  return new Command('route')
    .argument('<text...>', 'Chat turn to classify')
    .description('Show which agent would handle a message')
    .action((words: string[]) => {
      const ctx = getContext();
      const { text } = parseInput(RouteArgsSchema, { text: words.join(' ') });

      const router = KeywordRouter.fromConfig(loadCommandConfig(ctx).routing);
      const decision = router.classify(text);

      if (ctx.options.json) {
        console.log(JSON.stringify({ text, ...decision }));
        return;
      }

      if (decision.matched && decision.keyword !== undefined) {
        ctx.log(`${chalk.cyan(decision.agent)} ${chalk.dim(`(matched "${decision.keyword}")`)}`);
      } else {
        ctx.log(`${chalk.cyan(decision.agent)} ${chalk.dim('(default)')}`);
      }
    });
}
