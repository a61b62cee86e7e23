/**
 * chatplate check command
 *
 * Parses template files and tokenizer configs without rendering them.
 */

import { isTemplateError, parse } from '@chatplate/templates';
import { Command } from 'commander';
import { glob } from 'glob';
import * as fs from 'node:fs';
import * as path from 'node:path';
import { loadTemplateSource } from '../loaders.js';
import { formatJson, formatPretty, type CheckFailure, type CheckResult } from '../reporter.js';

const TEMPLATE_PATTERN = '**/{*.jinja,*.j2,tokenizer_config.json}';

interface CheckOptions {
  format: string;
  color: boolean;
}

export const checkCommand = new Command('check')
  .description('Check chat templates for syntax errors')
  .argument('<paths...>', 'Files or directories to check')
  .option('--format <type>', 'Output format: pretty, json', 'pretty')
  .option('--no-color', 'Disable colored output')
  .action(async (paths: string[], options: CheckOptions) => {
    try {
      const files = await collectFiles(paths);

      if (files.length === 0) {
        console.log('No files found to check');
        return;
      }

      const results: CheckResult[] = [];
      for (const file of files) {
        results.push(await checkFile(file));
      }

      if (options.format === 'json') {
        console.log(formatJson(results));
      } else {
        console.log(formatPretty(results, { color: options.color }));
      }

      if (results.some((r) => r.error !== null)) {
        process.exitCode = 1;
      }
    } catch (error) {
      console.error('Error:', error instanceof Error ? error.message : error);
      process.exit(1);
    }
  });

/**
 * Expand the given paths into the files to check
 *
 * @throws {Error} When a path does not exist
 */
export async function collectFiles(paths: string[]): Promise<string[]> {
  const files: string[] = [];

  for (const p of paths) {
    const resolved = path.resolve(p);
    if (!fs.existsSync(resolved)) {
      throw new Error(`Path not found: ${p}`);
    }

    if (fs.statSync(resolved).isDirectory()) {
      const found = await glob(TEMPLATE_PATTERN, {
        cwd: resolved,
        absolute: true,
        ignore: ['**/node_modules/**', '**/dist/**'],
      });
      files.push(...found.sort());
    } else {
      files.push(resolved);
    }
  }

  return files;
}

/**
 * Load and parse a single file; `.json` files are read as tokenizer configs
 */
export async function checkFile(file: string): Promise<CheckResult> {
  try {
    const source = await loadTemplateSource(file, path.extname(file) === '.json');
    parse(source.template);
    return { path: file, error: null };
  } catch (error) {
    return { path: file, error: toFailure(error) };
  }
}

function toFailure(error: unknown): CheckFailure {
  if (isTemplateError(error)) {
    return {
      stage: error.stage,
      message: error.detail,
      line: error.line > 0 ? error.line : undefined,
      column: error.line > 0 ? error.column + 1 : undefined,
    };
  }
  return {
    stage: 'load',
    message: error instanceof Error ? error.message : String(error),
  };
}
