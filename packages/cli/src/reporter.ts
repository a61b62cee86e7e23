/**
 * Output formatting for `chatplate check`
 */

import chalk from 'chalk';

export type CheckStage = 'load' | 'lex' | 'parse' | 'render';

export interface CheckFailure {
  stage: CheckStage;
  message: string;
  /** 1-based line, when the error carries a position */
  line?: number;
  /** 1-based column, when the error carries a position */
  column?: number;
}

export interface CheckResult {
  path: string;
  error: CheckFailure | null;
}

interface Palette {
  red: (s: string) => string;
  green: (s: string) => string;
  gray: (s: string) => string;
}

const plain: Palette = {
  red: (s) => s,
  green: (s) => s,
  gray: (s) => s,
};

function plural(count: number, word: string): string {
  return `${count} ${word}${count !== 1 ? 's' : ''}`;
}

/**
 * Human-readable report, one block per file followed by a summary
 */
export function formatPretty(results: CheckResult[], options: { color?: boolean } = {}): string {
  const c: Palette = options.color === false ? plain : chalk;
  const lines: string[] = [];
  let failed = 0;

  for (const result of results) {
    lines.push('');
    lines.push(`  ${result.path}`);

    if (result.error === null) {
      lines.push(`    ${c.green('✓')} No issues`);
      continue;
    }

    failed++;
    const { stage, message, line } = result.error;
    const where = line !== undefined ? `Line ${line}: ` : '';
    lines.push(`    ${c.red('✗')} ${stage.padEnd(6)} ${where}${message}`);
  }

  lines.push('');

  if (failed === 0) {
    lines.push(c.green(`  ✓ All ${plural(results.length, 'file')} passed`));
  } else {
    lines.push(c.gray(`  Found ${plural(failed, 'error')} in ${plural(results.length, 'file')}`));
  }

  lines.push('');
  return lines.join('\n');
}

/**
 * Machine-readable report
 */
export function formatJson(results: CheckResult[]): string {
  const output = {
    files: results.map((r) => ({
      path: r.path,
      ok: r.error === null,
      error: r.error,
    })),
    summary: {
      files: results.length,
      errors: results.filter((r) => r.error !== null).length,
    },
  };

  return JSON.stringify(output, null, 2);
}
