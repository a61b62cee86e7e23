import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  buildRenderContext,
  collect,
  loadMessages,
  loadTemplateSource,
  parseFlagAssignment,
  parseJson,
  parseVarAssignment,
  readMessages,
  readTokenizerConfig,
} from '../src/loaders.js';

describe('loaders', () => {
  describe('readTokenizerConfig', () => {
    it('reads the template and string special tokens', () => {
      expect(
        readTokenizerConfig(
          { chat_template: '{{ x }}', eos_token: '</s>', bos_token: '<s>', model_max_length: 2048 },
          'cfg.json',
        ),
      ).toEqual({ template: '{{ x }}', eosToken: '</s>', bosToken: '<s>' });
    });

    it('reads special tokens given as objects', () => {
      const source = readTokenizerConfig(
        {
          chat_template: 'T',
          eos_token: { content: '<|im_end|>', lstrip: false, rstrip: false },
        },
        'cfg.json',
      );

      expect(source.eosToken).toBe('<|im_end|>');
      expect(source.bosToken).toBeUndefined();
    });

    it('treats null special tokens as absent', () => {
      expect(readTokenizerConfig({ chat_template: 'T', bos_token: null }, 'cfg.json')).toEqual({
        template: 'T',
      });
    });

    it('picks the default entry from a list of named templates', () => {
      const source = readTokenizerConfig(
        {
          chat_template: [
            { name: 'tool_use', template: 'A' },
            { name: 'default', template: 'B' },
          ],
        },
        'cfg.json',
      );

      expect(source.template).toBe('B');
    });

    it('falls back to the first named template', () => {
      const source = readTokenizerConfig(
        { chat_template: [{ name: 'rag', template: 'R' }] },
        'cfg.json',
      );

      expect(source.template).toBe('R');
    });

    it('requires chat_template', () => {
      expect(() => readTokenizerConfig({ eos_token: '</s>' }, 'cfg.json')).toThrow(
        /^cfg\.json: chat_template: /,
      );
    });
  });

  describe('readMessages', () => {
    it('accepts a list of role/content objects', () => {
      expect(readMessages([{ role: 'user', content: 'Hi', name: 'ignored' }], 'm.json')).toEqual([
        { role: 'user', content: 'Hi' },
      ]);
    });

    it('names the offending field', () => {
      expect(() => readMessages([{ role: 'user' }], 'm.json')).toThrow(/^m\.json: 0\.content: /);
    });

    it('rejects a non-list document', () => {
      expect(() => readMessages({ role: 'user', content: 'Hi' }, 'm.json')).toThrow(/^m\.json: /);
    });
  });

  describe('parseJson', () => {
    it('names the source on invalid JSON', () => {
      expect(() => parseJson('{nope', 'x.json')).toThrow(/^x\.json: invalid JSON \(/);
    });
  });

  describe('files', () => {
    let root: string;

    beforeEach(() => {
      root = fs.mkdtempSync(path.join(os.tmpdir(), 'chatplate-loaders-'));
    });

    afterEach(() => {
      fs.rmSync(root, { recursive: true, force: true });
    });

    it('loads a raw template file verbatim', async () => {
      const file = path.join(root, 'chat.jinja');
      fs.writeFileSync(file, '{{ x }}\n');

      await expect(loadTemplateSource(file, false)).resolves.toEqual({ template: '{{ x }}\n' });
    });

    it('loads a tokenizer config file', async () => {
      const file = path.join(root, 'tokenizer_config.json');
      fs.writeFileSync(file, JSON.stringify({ chat_template: 'T', eos_token: '</s>' }));

      await expect(loadTemplateSource(file, true)).resolves.toEqual({
        template: 'T',
        eosToken: '</s>',
      });
    });

    it('loads a messages file', async () => {
      const file = path.join(root, 'messages.json');
      fs.writeFileSync(file, JSON.stringify([{ role: 'system', content: 'Be brief.' }]));

      await expect(loadMessages(file)).resolves.toEqual([{ role: 'system', content: 'Be brief.' }]);
    });

    it('rejects a missing file', async () => {
      await expect(loadMessages(path.join(root, 'absent.json'))).rejects.toThrow(/ENOENT/);
    });
  });

  describe('assignments', () => {
    it('splits --var at the first =', () => {
      expect(parseVarAssignment('eos_token=</s>')).toEqual(['eos_token', '</s>']);
      expect(parseVarAssignment('a=b=c')).toEqual(['a', 'b=c']);
      expect(parseVarAssignment('empty=')).toEqual(['empty', '']);
    });

    it('rejects --var without a name or value', () => {
      expect(() => parseVarAssignment('noeq')).toThrow("Invalid --var 'noeq': expected name=value");
      expect(() => parseVarAssignment('=x')).toThrow("Invalid --var '=x': expected name=value");
    });

    it('treats a bare --flag as true', () => {
      expect(parseFlagAssignment('add_generation_prompt')).toEqual(['add_generation_prompt', true]);
    });

    it('reads explicit --flag values', () => {
      expect(parseFlagAssignment('x=true')).toEqual(['x', true]);
      expect(parseFlagAssignment('x=false')).toEqual(['x', false]);
    });

    it('rejects other --flag values', () => {
      expect(() => parseFlagAssignment('x=yes')).toThrow(
        "Invalid --flag 'x=yes': value must be true or false",
      );
      expect(() => parseFlagAssignment('=true')).toThrow("Invalid --flag '=true': name is empty");
      expect(() => parseFlagAssignment('')).toThrow('Invalid --flag: name is empty');
    });

    it('accumulates repeated options', () => {
      expect(collect('b', collect('a', []))).toEqual(['a', 'b']);
    });
  });

  describe('buildRenderContext', () => {
    it('starts from the defaults', () => {
      const context = buildRenderContext({
        defaults: true,
        config: {},
        source: { template: '' },
        vars: [],
        flags: [],
      });

      expect(context.getVar('eos_token')).toBe('</s>');
      expect(context.getFlag('add_generation_prompt')).toBe(true);
    });

    it('skips the defaults when asked', () => {
      const context = buildRenderContext({
        defaults: false,
        config: {},
        source: { template: '' },
        vars: [],
        flags: [],
      });

      expect(context.getVar('eos_token')).toBeUndefined();
      expect(context.getFlag('add_generation_prompt')).toBeUndefined();
    });

    it('layers environment, tokenizer config and command-line values', () => {
      const fromEnv = buildRenderContext({
        defaults: true,
        config: { eosToken: '<env>', bosToken: '<env-bos>' },
        source: { template: '' },
        vars: [],
        flags: [],
      });
      expect(fromEnv.getVar('eos_token')).toBe('<env>');
      expect(fromEnv.getVar('bos_token')).toBe('<env-bos>');

      const fromConfig = buildRenderContext({
        defaults: true,
        config: { eosToken: '<env>' },
        source: { template: '', eosToken: '<cfg>' },
        vars: [],
        flags: [],
      });
      expect(fromConfig.getVar('eos_token')).toBe('<cfg>');

      const fromCli = buildRenderContext({
        defaults: true,
        config: { eosToken: '<env>' },
        source: { template: '', eosToken: '<cfg>' },
        vars: ['eos_token=<cli>'],
        flags: ['add_generation_prompt=false'],
      });
      expect(fromCli.getVar('eos_token')).toBe('<cli>');
      expect(fromCli.getFlag('add_generation_prompt')).toBe(false);
    });
  });
});
