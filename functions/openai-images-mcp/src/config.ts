import { join, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { ConfigManager, loadCredentials, loadEnvFile } from '@openai-images/config';
import type { ToolContext } from '@openai-images/mcp-tools';
import { OPENAI_API_BASE_URL } from '@openai-images/openai-api';

/**
 * Directory of this server package; holds the optional local .env and credentials.json
 */
export const SERVER_DIR = fileURLToPath(new URL('..', import.meta.url));

/**
 * Repository root, two levels above the server package. Used when OPENAI_IMAGES_PROJECT_ROOT is unset.
 */
export const DEFAULT_PROJECT_ROOT = resolve(SERVER_DIR, '../..');

/** Largest delay AbortSignal.timeout accepts */
export const MAX_TIMEOUT_MS = 2_147_483_647;

export interface LoadContextOptions {
  serverDir?: string;
  fetch?: typeof fetch;
}

function resolveProjectRoot(): string {
  return resolve(process.env.OPENAI_IMAGES_PROJECT_ROOT || DEFAULT_PROJECT_ROOT);
}

/**
 * Parse OPENAI_IMAGES_TIMEOUT_MS; anything but a positive integer up to
 * MAX_TIMEOUT_MS means no timeout
 */
export function parseTimeout(value: string | undefined): number | undefined {
  if (!value) {
    return undefined;
  }
  const timeoutMs = Number(value);
  if (!Number.isInteger(timeoutMs) || timeoutMs <= 0 || timeoutMs > MAX_TIMEOUT_MS) {
    console.error(`Ignoring invalid OPENAI_IMAGES_TIMEOUT_MS: ${value}`);
    return undefined;
  }
  return timeoutMs;
}

/**
 * Build the tool context once at startup.
 *
 * Loads the first .env found (project root, then this package), then resolves
 * credentials and settings through the ConfigManager. The result is frozen:
 * a rotated API key needs a restart.
 */
export async function loadToolContext(options: LoadContextOptions = {}): Promise<ToolContext> {
  const serverDir = options.serverDir ?? SERVER_DIR;

  const envFile = loadEnvFile([join(resolveProjectRoot(), '.env'), join(serverDir, '.env')]);
  if (envFile) {
    console.error(`Loaded environment from ${envFile}`);
  }

  const manager = new ConfigManager({ credentialsFile: join(serverDir, 'credentials.json') });

  const credentials = await loadCredentials(manager);
  if (credentials.apiKey) {
    console.error(`OpenAI API key loaded from ${credentials.source}`);
  } else {
    console.error('No OpenAI API key configured; generate_image will report missing credentials');
  }

  const defaultModel = (await manager.findKnownConfig('OPENAI_IMAGE_MODEL'))?.value ?? 'dall-e-3';
  const apiBaseUrl =
    (await manager.findKnownConfig('OPENAI_BASE_URL'))?.value ?? OPENAI_API_BASE_URL;
  const timeoutMs = parseTimeout((await manager.findKnownConfig('OPENAI_IMAGES_TIMEOUT_MS'))?.value);
  const projectRoot = resolveProjectRoot();

  console.error(`Using model: ${defaultModel}, project root: ${projectRoot}`);

  return Object.freeze({
    credentials,
    projectRoot,
    defaultModel,
    apiBaseUrl,
    timeoutMs,
    fetch: options.fetch ?? fetch,
    now: () => new Date(),
  });
}
