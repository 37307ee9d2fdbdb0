/**
 * REPL Command
 *
 * Interactive question loop: one query is answered (or fails) before the
 * next prompt is shown.
 */

import { Command } from 'commander';
import { createInterface } from 'node:readline';
import type { Readable, Writable } from 'node:stream';
import { FAREWELL_MESSAGE, PROMPT, WELCOME_MESSAGE } from '../lib/constants.js';
import { errorMessage, isTypedError } from '../lib/errors.js';
import { loggers } from '../lib/logger.js';
import { describeTemplates } from '../query/templates.js';
import type { QueryDispatcher } from '../query/dispatcher.js';
import { createCliInfobot, type CommonOptions } from './context.js';

/** Streams the loop reads from and writes to */
export interface ReplIO {
  input: Readable;
  output: Writable;
}

/**
 * Run the question loop until end of input, interrupt, or `quit`
 */
export async function runRepl(
  dispatcher: QueryDispatcher,
  io: ReplIO = { input: process.stdin, output: process.stdout }
): Promise<void> {
  const { input, output } = io;
  const rl = createInterface({ input, output });
  const lines = rl[Symbol.asyncIterator]();

  let closed = false;
  let interrupted = false;
  rl.on('close', () => {
    closed = true;
  });
  rl.on('SIGINT', () => {
    interrupted = true;
    rl.close();
  });
  rl.setPrompt(PROMPT);

  output.write(`${WELCOME_MESSAGE}\n\n`);

  try {
    for (;;) {
      output.write('\n');
      if (closed) {
        output.write(PROMPT);
      } else {
        rl.prompt();
      }

      const next = await lines.next();
      if (next.done) {
        break;
      }

      const line = next.value.trim().toLowerCase();
      if (line === 'quit' || line === 'exit') {
        break;
      }
      if (line === 'help') {
        output.write(`${describeTemplates().join('\n')}\n`);
        continue;
      }

      let reply: string[];
      try {
        reply = await dispatcher.ask(next.value);
      } catch (error) {
        loggers.cli.warn('Query failed', {
          query: next.value,
          kind: isTypedError(error) ? error.kind : 'UNKNOWN',
          error: error instanceof Error ? error : String(error),
        });
        reply = [`Error: ${errorMessage(error)}`];
      }

      // Interrupted while the query ran: drop its reply and end the session
      if (interrupted) {
        break;
      }
      for (const line of reply) {
        output.write(`${line}\n`);
      }
    }
  } finally {
    rl.close();
  }

  output.write(`\n${FAREWELL_MESSAGE}\n\n`);
}

export const replCommand = new Command('repl')
  .description('Ask questions interactively (default)')
  .option('-l, --lang <code>', 'Wikipedia language edition')
  .option('-v, --verbose', 'Show debug logging', false)
  .action(async (options: CommonOptions) => {
    const { dispatcher } = await createCliInfobot(options);
    await runRepl(dispatcher);
  });
