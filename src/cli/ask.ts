/**
 * Ask Command
 *
 * Answer one question and exit.
 */

import { Command } from 'commander';
import { errorMessage, getExitCodeForKind, isTypedError } from '../lib/errors.js';
import { createCliInfobot, type CommonOptions } from './context.js';
import { fatal } from './utils.js';

/** Ask command options */
interface AskOptions extends CommonOptions {
  json: boolean;
}

export const askCommand = new Command('ask')
  .description('Answer a single question and exit')
  .argument('<query...>', 'Question, e.g. who is the president of france')
  .option('-l, --lang <code>', 'Wikipedia language edition')
  .option('--json', 'Output as JSON', false)
  .option('-v, --verbose', 'Show debug logging', false)
  .action(async (words: string[], options: AskOptions) => {
    const { dispatcher } = await createCliInfobot(options);
    const query = words.join(' ');

    let answers: string[];
    try {
      answers = await dispatcher.ask(query);
    } catch (error) {
      fatal(errorMessage(error), isTypedError(error) ? getExitCodeForKind(error.kind) : 1);
    }

    if (options.json) {
      console.log(JSON.stringify({ query, answers }, null, 2));
      return;
    }

    for (const answer of answers) {
      console.log(answer);
    }
  });
