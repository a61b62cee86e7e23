/**
 * Input loading for CLI commands: templates, tokenizer configs, messages
 * and --var / --flag assignments
 */

import * as fs from 'node:fs/promises';
import { RenderContext, type ChatMessage } from '@chatplate/templates';
import { z } from 'zod';
import type { ChatplateConfig } from './config.js';

/**
 * Special tokens appear either as plain strings or as `{ content: ... }` objects
 */
const specialTokenSchema = z
  .union([z.string(), z.object({ content: z.string() })])
  .transform((token) => (typeof token === 'string' ? token : token.content));

const namedTemplateSchema = z.object({
  name: z.string(),
  template: z.string(),
});

const tokenizerConfigSchema = z.object({
  chat_template: z.union([z.string(), z.array(namedTemplateSchema).nonempty()]),
  eos_token: specialTokenSchema.nullable().optional(),
  bos_token: specialTokenSchema.nullable().optional(),
});

const messagesSchema = z.array(
  z.object({
    role: z.string(),
    content: z.string(),
  }),
);

export interface TemplateSource {
  template: string;
  eosToken?: string;
  bosToken?: string;
}

/**
 * Parse JSON, naming the source in the error
 */
export function parseJson(content: string, source: string): unknown {
  try {
    return JSON.parse(content);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new Error(`${source}: invalid JSON (${reason})`);
  }
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

/**
 * Extract the chat template and special tokens from a tokenizer configuration document.
 * A list of named templates resolves to the one named "default", else the first.
 */
export function readTokenizerConfig(data: unknown, source: string): TemplateSource {
  const result = tokenizerConfigSchema.safeParse(data);
  if (!result.success) {
    throw new Error(`${source}: ${formatIssues(result.error)}`);
  }

  const { chat_template, eos_token, bos_token } = result.data;
  const template =
    typeof chat_template === 'string'
      ? chat_template
      : (chat_template.find((entry) => entry.name === 'default') ?? chat_template[0]).template;

  return {
    template,
    eosToken: eos_token ?? undefined,
    bosToken: bos_token ?? undefined,
  };
}

/**
 * Validate a decoded messages document
 */
export function readMessages(data: unknown, source: string): ChatMessage[] {
  const result = messagesSchema.safeParse(data);
  if (!result.success) {
    throw new Error(`${source}: ${formatIssues(result.error)}`);
  }
  return result.data;
}

/**
 * Load a template file, or a tokenizer configuration JSON when `fromConfig` is set
 */
export async function loadTemplateSource(
  filePath: string,
  fromConfig: boolean,
): Promise<TemplateSource> {
  const content = await fs.readFile(filePath, 'utf-8');
  if (!fromConfig) {
    return { template: content };
  }
  return readTokenizerConfig(parseJson(content, filePath), filePath);
}

export async function loadMessages(filePath: string): Promise<ChatMessage[]> {
  const content = await fs.readFile(filePath, 'utf-8');
  return readMessages(parseJson(content, filePath), filePath);
}

/**
 * Parse `name=value` from --var
 */
export function parseVarAssignment(raw: string): [string, string] {
  const eqIndex = raw.indexOf('=');
  if (eqIndex <= 0) {
    throw new Error(`Invalid --var '${raw}': expected name=value`);
  }
  return [raw.slice(0, eqIndex), raw.slice(eqIndex + 1)];
}

/**
 * Parse `name`, `name=true` or `name=false` from --flag
 */
export function parseFlagAssignment(raw: string): [string, boolean] {
  const eqIndex = raw.indexOf('=');
  if (eqIndex === -1) {
    if (raw.length === 0) {
      throw new Error('Invalid --flag: name is empty');
    }
    return [raw, true];
  }

  const name = raw.slice(0, eqIndex);
  const value = raw.slice(eqIndex + 1);
  if (name.length === 0) {
    throw new Error(`Invalid --flag '${raw}': name is empty`);
  }
  if (value !== 'true' && value !== 'false') {
    throw new Error(`Invalid --flag '${raw}': value must be true or false`);
  }
  return [name, value === 'true'];
}

/**
 * Commander accumulator for repeatable options
 */
export function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

export interface ContextInputs {
  defaults: boolean;
  config: ChatplateConfig;
  source: TemplateSource;
  vars: string[];
  flags: string[];
}

/**
 * Build the render context. Later layers win:
 * built-in defaults, then environment config, then the tokenizer config,
 * then --var / --flag
 */
export function buildRenderContext(inputs: ContextInputs): RenderContext {
  const context = inputs.defaults ? RenderContext.withDefaults() : new RenderContext();

  const eosToken = inputs.source.eosToken ?? inputs.config.eosToken;
  const bosToken = inputs.source.bosToken ?? inputs.config.bosToken;
  if (eosToken !== undefined) {
    context.setVar('eos_token', eosToken);
  }
  if (bosToken !== undefined) {
    context.setVar('bos_token', bosToken);
  }

  for (const raw of inputs.vars) {
    const [name, value] = parseVarAssignment(raw);
    context.setVar(name, value);
  }
  for (const raw of inputs.flags) {
    const [name, value] = parseFlagAssignment(raw);
    context.setFlag(name, value);
  }

  return context;
}
