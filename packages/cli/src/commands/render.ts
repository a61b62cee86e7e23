/**
 * chatplate render command
 */

import { createLogger } from '@chatplate/logger';
import { renderChatTemplate, type ChatMessage } from '@chatplate/templates';
import { Command } from 'commander';
import { loadConfig } from '../config.js';
import { buildRenderContext, collect, loadMessages, loadTemplateSource } from '../loaders.js';

interface RenderOptions {
  config?: boolean;
  messages?: string;
  var: string[];
  flag: string[];
  defaults: boolean;
}

export const renderCommand = new Command('render')
  .description('Render a chat template against a list of messages')
  .argument('<template>', 'Template file, or tokenizer_config.json with --config')
  .option('--config', 'Read the template and special tokens from a tokenizer config JSON')
  .option('--messages <file>', 'JSON file with an array of {role, content} messages')
  .option('--var <name=value>', 'Set a string variable (repeatable)', collect, [])
  .option('--flag <name[=bool]>', 'Set a boolean flag (repeatable)', collect, [])
  .option('--no-defaults', 'Do not bind eos_token and add_generation_prompt')
  .action(async (templatePath: string, options: RenderOptions) => {
    try {
      const config = loadConfig();
      const logger = createLogger({
        environment: config.environment,
        minLevel: config.logLevel,
      });

      const source = await loadTemplateSource(templatePath, options.config === true);
      const messages: ChatMessage[] = options.messages ? await loadMessages(options.messages) : [];
      const context = buildRenderContext({
        defaults: options.defaults,
        config,
        source,
        vars: options.var,
        flags: options.flag,
      });

      const output = renderChatTemplate(source.template, messages, context, {
        logger,
        failureLevel: 'debug',
      });
      process.stdout.write(output);
    } catch (error) {
      console.error('Error:', error instanceof Error ? error.message : error);
      process.exit(1);
    }
  });
