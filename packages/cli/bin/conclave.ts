#!/usr/bin/env tsx

import { createRequire } from 'node:module';
import { Command } from 'commander';
import { config as loadEnv } from 'dotenv';
import { registerConfigCommand } from '../src/commands/config.js';
import { registerHistoryCommand } from '../src/commands/history.js';
import { registerModelsCommand } from '../src/commands/models.js';
import { registerRunCommand } from '../src/commands/run.js';

loadEnv();

const require = createRequire(import.meta.url);
const { version }: { version: string } = require('../package.json');

const program = new Command();

program
  .name('conclave')
  .description('Ask a council of LLMs, let them rank each other anonymously, and get one synthesized answer')
  .version(version);

registerRunCommand(program);
registerHistoryCommand(program);
registerConfigCommand(program);
registerModelsCommand(program);

await program.parseAsync();
