/**
 * Templates Command
 *
 * List the questions infobot understands.
 */

import { Command } from 'commander';
import { QUERY_TEMPLATES, describeTemplates } from '../query/templates.js';
import { paint } from './utils.js';

export const templatesCommand = new Command('templates')
  .description('List recognized questions')
  .option('--json', 'Output as JSON', false)
  .action((options: { json: boolean }) => {
    if (options.json) {
      console.log(JSON.stringify(QUERY_TEMPLATES, null, 2));
      return;
    }

    console.log(`\n  ${paint('bold', 'Recognized questions')}\n`);
    describeTemplates().forEach((question, i) => {
      const field = QUERY_TEMPLATES[i]?.field ?? '';
      console.log(`    ${question}  ${paint('dim', `(${field})`)}`);
    });
    console.log('');
  });
