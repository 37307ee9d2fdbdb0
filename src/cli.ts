#!/usr/bin/env node
/**
 * infobot CLI
 *
 * Answer questions about a country's president from its Wikipedia infobox.
 */

import { Command } from 'commander';
import { askCommand, replCommand, templatesCommand } from './cli/index.js';

const program = new Command()
  .name('infobot')
  .description("Answer questions about a country's president from Wikipedia")
  .version('0.1.0');

// Register commands; the REPL runs when no command is given
program.addCommand(replCommand, { isDefault: true });
program.addCommand(askCommand);
program.addCommand(templatesCommand);

await program.parseAsync();
