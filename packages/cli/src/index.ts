#!/usr/bin/env -S node --import tsx

import { Command } from 'commander';
import { startCommand } from './commands/start.js';
import { initCommand } from './commands/init.js';
import { modelsCommand } from './commands/models.js';

const program = new Command()
  .name('chatbridge')
  .description('OpenAI-compatible gateway in front of vendor chat web apps')
  .version('0.1.0');

program.addCommand(startCommand);
program.addCommand(initCommand);
program.addCommand(modelsCommand);

// Default to start if no command given
program.action(async () => {
  await startCommand.parseAsync(process.argv.slice(2), { from: 'user' });
});

await program.parseAsync();
