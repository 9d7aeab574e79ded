import { readFile, realpath, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { defaultSettings } from '@koboldgate/core';
import { cleanupTempDir, createTempDir } from '@koboldgate/test-utils';
import { runConfigInit, runConfigShow, runConfigValidate } from './config.js';

function capture() {
  const lines: string[] = [];
  const errors: string[] = [];
  return {
    lines,
    errors,
    output: { log: (line: string) => lines.push(line), error: (line: string) => errors.push(line) }
  };
}

describe('config commands', () => {
  let dir: string;
  let file: string;

  beforeEach(async () => {
    dir = await createTempDir();
    file = join(await realpath(dir), 'koboldgate.config.json');
  });

  afterEach(async () => {
    await cleanupTempDir(dir);
  });

  describe('init', () => {
    it('writes the defaults', async () => {
      const { lines, output } = capture();

      const code = await runConfigInit({ config: file }, { output, env: {} });

      expect(code).toBe(0);
      expect(lines[0]).toBe(`Created configuration file: ${file}`);
      expect(JSON.parse(await readFile(file, 'utf-8'))).toEqual(defaultSettings());
    });

    it('refuses to overwrite without --force', async () => {
      await writeFile(file, '{"server":{"port":9000}}');
      const { errors, output } = capture();

      const code = await runConfigInit({ config: file }, { output, env: {} });

      expect(code).toBe(1);
      expect(errors).toEqual([`Configuration file already exists: ${file}`, 'Use --force to replace it']);
      expect(await readFile(file, 'utf-8')).toBe('{"server":{"port":9000}}');
    });

    it('overwrites with --force', async () => {
      await writeFile(file, '{"server":{"port":9000}}');
      const { output } = capture();

      const code = await runConfigInit({ config: file, force: true }, { output, env: {} });

      expect(code).toBe(0);
      expect(JSON.parse(await readFile(file, 'utf-8'))).toEqual(defaultSettings());
    });
  });

  describe('validate', () => {
    it('passes a valid file', async () => {
      await writeFile(file, JSON.stringify({ backend: { url: 'http://gpu:5001' } }));
      const { lines, output } = capture();

      const code = await runConfigValidate({ config: file }, { output, env: {} });

      expect(code).toBe(0);
      expect(lines).toEqual([
        'Validating configuration...',
        `Settings file: ${file}`,
        '✓ Backend configuration is valid',
        '✓ Server configuration is valid',
        '✓ Security configuration is valid',
        'All configuration is valid'
      ]);
    });

    it('reports schema errors', async () => {
      await writeFile(file, JSON.stringify({ backend: { maxRetries: -1 } }));
      const { errors, output } = capture();

      const code = await runConfigValidate({ config: file }, { output, env: {} });

      expect(code).toBe(1);
      expect(errors).toEqual([
        'Configuration validation failed:\nbackend.maxRetries: Number must be greater than or equal to 0'
      ]);
    });
  });

  describe('show', () => {
    it('prints the effective settings with the token hidden', async () => {
      await writeFile(
        file,
        JSON.stringify({ security: { enableAuth: true, authToken: 'test-secret' } })
      );
      const { lines, output } = capture();

      const code = await runConfigShow({ config: file }, { output, env: {} });

      expect(code).toBe(0);
      expect(lines[0]).toBe(`Current configuration (${file}):`);
      const shown: unknown = JSON.parse(lines[1] ?? '{}');
      expect(shown).toMatchObject({
        security: { enableAuth: true, authToken: '********' },
        server: { port: 8765 }
      });
    });
  });
});
