#!/usr/bin/env node
import { Command } from 'commander';
import { analyzeCommand } from './commands/analyze';
import { statusCommand } from './commands/status';
import { suggestionsCommand } from './commands/suggestions';
import { acceptCommand, ignoreCommand, rejectCommand } from './commands/respond';
import { statsCommand } from './commands/stats';

const program = new Command();

program
  .name('review')
  .description('CLI for the pull request review service')
  .version('0.1.0')
  .option('--api-url <url>', 'API base URL', 'http://localhost:3000/api');

program.addCommand(analyzeCommand);
program.addCommand(statusCommand);
program.addCommand(suggestionsCommand);
program.addCommand(acceptCommand);
program.addCommand(rejectCommand);
program.addCommand(ignoreCommand);
program.addCommand(statsCommand);

program.parse();
