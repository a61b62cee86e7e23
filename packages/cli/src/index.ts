/**
 * chatplate CLI - render and check chat templates
 */

import { Command } from 'commander';
import { checkCommand } from './commands/check.js';
import { renderCommand } from './commands/render.js';

const program = new Command();

program.name('chatplate').description('Render and check chat templates').version('0.1.0');

// Register commands
program.addCommand(renderCommand);
program.addCommand(checkCommand);

// Parse arguments
await program.parseAsync();
