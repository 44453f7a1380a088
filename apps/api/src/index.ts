#!/usr/bin/env node

import 'dotenv/config';
import { Command } from 'commander';

import { createServeCommand } from './commands/serve.js';
import { createOpenApiCommand } from './commands/openapi.js';
import { createStatsCommand } from './commands/stats.js';

const program = new Command()
  .name('todo-list-api')
  .description('REST API for a todo list')
  .version('1.0.0');

program.addCommand(createServeCommand(), { isDefault: true });
program.addCommand(createOpenApiCommand());
program.addCommand(createStatsCommand());

await program.parseAsync();
