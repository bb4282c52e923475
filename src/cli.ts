#!/usr/bin/env node
import { program } from 'commander';
import { startServer } from './server/index.js';
import { loadSettings } from './config/settings.js';
import { createAssistant } from './workflow/runner.js';
import { renderResponse } from './synthesis/render.js';
import { VERSION } from './version.js';

program
  .name('kitchen-conductor')
  .description('Kitchen assistant coordinating recipe, pantry, shopping and nutrition agents')
  .version(VERSION)
  .option('-c, --config <path>', 'Path to app_settings.yaml');

program
  .command('serve', { isDefault: true })
  .description('Start the API server')
  .option('-p, --port <number>', 'Port to listen on', '8001')
  .action((options: { port: string }) => {
    const port = parseInt(options.port, 10);
    startServer(port, program.opts<{ config?: string }>().config);
  });

program
  .command('ask')
  .description('Answer a single query and print the response')
  .argument('<text...>', 'The query')
  .option('-s, --session <id>', 'Session id', 'cli')
  .option('--json', 'Print the raw FinalResponse as JSON')
  .action(async (words: string[], options: { session: string; json?: boolean }) => {
    const settings = loadSettings(program.opts<{ config?: string }>().config);
    const assistant = createAssistant(settings);
    const response = await assistant.submitQuery(words.join(' '), options.session);

    console.log(options.json ? JSON.stringify(response, null, 2) : renderResponse(response));
    process.exitCode = response.status === 'failed' ? 1 : 0;
  });

await program.parseAsync();
