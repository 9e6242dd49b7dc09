import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join, resolve } from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { DEFAULT_PROJECT_ROOT, loadToolContext, parseTimeout, SERVER_DIR } from './config';

const MANAGED_KEYS = [
  'OPENAI_API_KEY',
  'OPENAI_API_KEY_SECRET_ID',
  'OPENAI_IMAGE_MODEL',
  'OPENAI_IMAGE_MODEL_PARAMETER',
  'OPENAI_BASE_URL',
  'OPENAI_IMAGES_PROJECT_ROOT',
  'OPENAI_IMAGES_TIMEOUT_MS',
];

describe('config', () => {
  let projectRoot: string;
  let serverDir: string;
  let savedEnv: Map<string, string | undefined>;

  beforeEach(() => {
    savedEnv = new Map(MANAGED_KEYS.map((key) => [key, process.env[key]]));
    for (const key of MANAGED_KEYS) {
      delete process.env[key];
    }
    projectRoot = mkdtempSync(join(tmpdir(), 'openai-images-root-'));
    serverDir = mkdtempSync(join(tmpdir(), 'openai-images-server-'));
    process.env.OPENAI_IMAGES_PROJECT_ROOT = projectRoot;
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    for (const [key, value] of savedEnv) {
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }
    rmSync(projectRoot, { recursive: true, force: true });
    rmSync(serverDir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  describe('loadToolContext', () => {
    it('should fall back to defaults without any configuration', async () => {
      const context = await loadToolContext({ serverDir });

      expect(context.credentials).toEqual({});
      expect(context.defaultModel).toBe('dall-e-3');
      expect(context.apiBaseUrl).toBe('https://api.openai.com/v1');
      expect(context.timeoutMs).toBeUndefined();
      expect(context.projectRoot).toBe(resolve(projectRoot));
    });

    it('should default the project root to the repository, not the launch directory', async () => {
      delete process.env.OPENAI_IMAGES_PROJECT_ROOT;
      vi.spyOn(process, 'cwd').mockReturnValue('/');

      const context = await loadToolContext({ serverDir });

      expect(context.projectRoot).toBe(DEFAULT_PROJECT_ROOT);
      expect(DEFAULT_PROJECT_ROOT).toBe(resolve(SERVER_DIR, '../..'));
      expect(context.projectRoot).not.toBe('/');
    });

    it('should read the API key from the environment first', async () => {
      process.env.OPENAI_API_KEY = 'test-secret';
      writeFileSync(join(serverDir, 'credentials.json'), JSON.stringify({ api_key: 'file-secret' }));

      const context = await loadToolContext({ serverDir });

      expect(context.credentials).toEqual({ apiKey: 'test-secret', source: 'env' });
    });

    it('should fall back to credentials.json in the server directory', async () => {
      writeFileSync(join(serverDir, 'credentials.json'), JSON.stringify({ api_key: 'file-secret' }));

      const context = await loadToolContext({ serverDir });

      expect(context.credentials).toEqual({ apiKey: 'file-secret', source: 'credentials-file' });
    });

    it('should load the project .env before the server one', async () => {
      writeFileSync(
        join(projectRoot, '.env'),
        'OPENAI_API_KEY=project-secret\nOPENAI_IMAGE_MODEL=dall-e-2\n'
      );
      writeFileSync(join(serverDir, '.env'), 'OPENAI_API_KEY=server-secret\n');

      const context = await loadToolContext({ serverDir });

      expect(context.credentials).toEqual({ apiKey: 'project-secret', source: 'env' });
      expect(context.defaultModel).toBe('dall-e-2');
    });

    it('should use the server .env when the project has none', async () => {
      writeFileSync(join(serverDir, '.env'), 'OPENAI_API_KEY=server-secret\n');

      const context = await loadToolContext({ serverDir });

      expect(context.credentials).toEqual({ apiKey: 'server-secret', source: 'env' });
    });

    it('should apply model, base URL and timeout overrides', async () => {
      process.env.OPENAI_IMAGE_MODEL = 'dall-e-2';
      process.env.OPENAI_BASE_URL = 'http://localhost:8080/v1';
      process.env.OPENAI_IMAGES_TIMEOUT_MS = '30000';

      const context = await loadToolContext({ serverDir });

      expect(context.defaultModel).toBe('dall-e-2');
      expect(context.apiBaseUrl).toBe('http://localhost:8080/v1');
      expect(context.timeoutMs).toBe(30000);
    });

    it('should use the injected fetch', async () => {
      const fakeFetch = vi.fn<typeof fetch>();

      const context = await loadToolContext({ serverDir, fetch: fakeFetch });

      expect(context.fetch).toBe(fakeFetch);
    });

    it('should return a frozen context', async () => {
      const context = await loadToolContext({ serverDir });

      expect(Object.isFrozen(context)).toBe(true);
      expect(Object.isFrozen(context.credentials)).toBe(true);
      expect(context.now()).toBeInstanceOf(Date);
    });
  });

  describe('parseTimeout', () => {
    it('should accept a positive integer', () => {
      expect(parseTimeout('1500')).toBe(1500);
    });

    it('should treat an unset value as no timeout', () => {
      expect(parseTimeout(undefined)).toBeUndefined();
      expect(parseTimeout('')).toBeUndefined();
    });

    it('should accept the largest delay a timer takes', () => {
      expect(parseTimeout('2147483647')).toBe(2147483647);
    });

    it.each(['0', '-5', '2.5', 'soon', '2147483648', '3000000000', '5000000000'])(
      'should ignore %s',
      (value) => {
        expect(parseTimeout(value)).toBeUndefined();
        expect(console.error).toHaveBeenCalledWith(
          `Ignoring invalid OPENAI_IMAGES_TIMEOUT_MS: ${value}`
        );
      }
    );
  });
});
