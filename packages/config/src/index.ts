import { existsSync, readFileSync } from 'node:fs';
import { GetSecretValueCommand, SecretsManagerClient } from '@aws-sdk/client-secrets-manager';
import { GetParameterCommand, SSMClient } from '@aws-sdk/client-ssm';
import { config as loadDotenv } from 'dotenv';

/**
 * Configuration source type
 */
export type ConfigSource =
  | 'env'
  | 'credentials-file'
  | 'secrets-manager'
  | 'parameter-store'
  | 'default';

/**
 * Result of a config fetch operation
 */
export interface ConfigResult {
  value: string;
  source: ConfigSource;
}

export interface ConfigLookupOptions {
  /** Field to read from the local JSON credentials file */
  credentialsField?: string;
  /** AWS Secrets Manager secret ID */
  secretId?: string;
  /** AWS SSM Parameter Store parameter name */
  parameterId?: string;
  /** Default value if not found anywhere */
  defaultValue?: string;
  /** Throw error if value not found (default: false) */
  required?: boolean;
}

export interface ConfigManagerOptions {
  region?: string;
  enableCaching?: boolean;
  /** Path of a JSON file holding credentials, e.g. `{ "api_key": "..." }` */
  credentialsFile?: string;
}

/**
 * Configuration Manager
 *
 * Reads configuration values with the following priority:
 * 1. Environment variables (highest priority, includes values loaded from .env)
 * 2. Local JSON credentials file
 * 3. AWS Secrets Manager (only when a secret ID is given)
 * 4. AWS SSM Parameter Store (only when a parameter name is given)
 * 5. Default value
 *
 * Local use needs nothing but an environment variable or a credentials file;
 * the AWS sources are consulted only when they are configured.
 */
export class ConfigManager {
  private secretsClient: SecretsManagerClient | null = null;
  private ssmClient: SSMClient | null = null;
  private region: string;
  private cache: Map<string, ConfigResult> = new Map();
  private enableCaching: boolean;
  private credentialsFile: string | undefined;
  private credentials: Record<string, unknown> | null = null;

  constructor(options?: ConfigManagerOptions) {
    this.region = options?.region || process.env.AWS_REGION || 'us-east-1';
    this.enableCaching = options?.enableCaching ?? true;
    this.credentialsFile = options?.credentialsFile;
  }

  /**
   * Lazy initialization of Secrets Manager client
   */
  private getSecretsClient(): SecretsManagerClient {
    if (!this.secretsClient) {
      this.secretsClient = new SecretsManagerClient({ region: this.region });
    }
    return this.secretsClient;
  }

  /**
   * Lazy initialization of SSM client
   */
  private getSSMClient(): SSMClient {
    if (!this.ssmClient) {
      this.ssmClient = new SSMClient({ region: this.region });
    }
    return this.ssmClient;
  }

  /**
   * Read the credentials file once; a missing or unreadable file counts as empty
   */
  private readCredentialsFile(): Record<string, unknown> {
    if (this.credentials) {
      return this.credentials;
    }

    this.credentials = {};
    if (!this.credentialsFile || !existsSync(this.credentialsFile)) {
      return this.credentials;
    }

    try {
      const parsed: unknown = JSON.parse(readFileSync(this.credentialsFile, 'utf8'));
      if (isRecord(parsed)) {
        this.credentials = parsed;
      } else {
        console.error(`Credentials file ${this.credentialsFile} is not a JSON object`);
      }
    } catch (error) {
      console.error(`Failed to read credentials file ${this.credentialsFile}:`, error);
    }
    return this.credentials;
  }

  /**
   * Get a field from the local credentials file
   */
  getCredentialsField(field: string): string | null {
    const value = this.readCredentialsFile()[field];
    return typeof value === 'string' && value !== '' ? value : null;
  }

  /**
   * Get a secret value from AWS Secrets Manager
   */
  async getSecret(secretId: string): Promise<string | null> {
    try {
      const command = new GetSecretValueCommand({ SecretId: secretId });
      const response = await this.getSecretsClient().send(command);
      return response.SecretString || null;
    } catch (error) {
      console.error(`Failed to get secret ${secretId}:`, error);
      return null;
    }
  }

  /**
   * Get a parameter value from AWS SSM Parameter Store
   */
  async getParameter(name: string, withDecryption = true): Promise<string | null> {
    try {
      const command = new GetParameterCommand({
        Name: name,
        WithDecryption: withDecryption,
      });
      const response = await this.getSSMClient().send(command);
      return response.Parameter?.Value || null;
    } catch (error) {
      console.error(`Failed to get parameter ${name}:`, error);
      return null;
    }
  }

  /**
   * Look up a configuration value through the fallback chain.
   * Returns null when no source has it and there is no default.
   */
  async findConfig(envKey: string, options?: ConfigLookupOptions): Promise<ConfigResult | null> {
    const cacheKey = [
      envKey,
      options?.credentialsField || '',
      options?.secretId || '',
      options?.parameterId || '',
    ].join(':');

    const cached = this.enableCaching ? this.cache.get(cacheKey) : undefined;
    if (cached) {
      return cached;
    }

    const result = await this.resolve(envKey, options);
    if (result && this.enableCaching) {
      this.cache.set(cacheKey, result);
    }
    return result;
  }

  private async resolve(envKey: string, options?: ConfigLookupOptions): Promise<ConfigResult | null> {
    // 1. Environment variable
    const envValue = process.env[envKey];
    if (envValue !== undefined && envValue !== '') {
      return { value: envValue, source: 'env' };
    }

    // 2. Local credentials file
    if (options?.credentialsField) {
      const fileValue = this.getCredentialsField(options.credentialsField);
      if (fileValue) {
        return { value: fileValue, source: 'credentials-file' };
      }
    }

    // 3. Secrets Manager
    if (options?.secretId) {
      const secretValue = await this.getSecret(options.secretId);
      if (secretValue) {
        return { value: extractSecretValue(secretValue, envKey), source: 'secrets-manager' };
      }
    }

    // 4. Parameter Store
    if (options?.parameterId) {
      const paramValue = await this.getParameter(options.parameterId);
      if (paramValue) {
        return { value: paramValue, source: 'parameter-store' };
      }
    }

    // 5. Default
    if (options?.defaultValue !== undefined) {
      return { value: options.defaultValue, source: 'default' };
    }

    return null;
  }

  /**
   * Get a configuration value with fallback chain
   *
   * Priority: ENV -> credentials file -> Secrets Manager -> Parameter Store -> default
   */
  async getConfig(envKey: string, options?: ConfigLookupOptions): Promise<ConfigResult> {
    const result = await this.findConfig(envKey, options);
    if (result) {
      return result;
    }

    if (options?.required) {
      throw new Error(
        `Required configuration not found: ${envKey}. ` +
          `Checked: ENV[${envKey}]` +
          (options.credentialsField ? `, CredentialsFile[${options.credentialsField}]` : '') +
          (options.secretId ? `, SecretsManager[${options.secretId}]` : '') +
          (options.parameterId ? `, ParameterStore[${options.parameterId}]` : '')
      );
    }

    throw new Error(`Configuration not found: ${envKey}`);
  }

  /**
   * Get a configuration value, returning just the string value
   */
  async getValue(envKey: string, options?: ConfigLookupOptions): Promise<string> {
    const result = await this.getConfig(envKey, options);
    return result.value;
  }

  /**
   * Look up a well-known configuration key, or null if it is not set
   */
  async findKnownConfig(key: ConfigKeyName): Promise<ConfigResult | null> {
    return this.findConfig(ConfigKeys[key].envKey, knownLookupOptions(key));
  }

  /**
   * Clear the configuration cache
   */
  clearCache(): void {
    this.cache.clear();
    this.credentials = null;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * JSON secrets are read by key; anything else is used as-is
 */
function extractSecretValue(secretValue: string, envKey: string): string {
  let parsed: unknown;
  try {
    parsed = JSON.parse(secretValue);
  } catch {
    return secretValue;
  }
  if (isRecord(parsed)) {
    const value = parsed[envKey];
    return typeof value === 'string' && value !== '' ? value : secretValue;
  }
  return secretValue;
}

/**
 * Well-known configuration keys for the openai-images project.
 * `secretIdEnv` / `parameterIdEnv` name the variables that opt a key into
 * the AWS sources.
 */
export const ConfigKeys = {
  OPENAI_API_KEY: {
    envKey: 'OPENAI_API_KEY',
    credentialsField: 'api_key',
    secretIdEnv: 'OPENAI_API_KEY_SECRET_ID',
  },
  OPENAI_IMAGE_MODEL: {
    envKey: 'OPENAI_IMAGE_MODEL',
    parameterIdEnv: 'OPENAI_IMAGE_MODEL_PARAMETER',
    defaultValue: 'dall-e-3',
  },
  OPENAI_BASE_URL: {
    envKey: 'OPENAI_BASE_URL',
    defaultValue: 'https://api.openai.com/v1',
  },
  OPENAI_IMAGES_PROJECT_ROOT: {
    envKey: 'OPENAI_IMAGES_PROJECT_ROOT',
  },
  OPENAI_IMAGES_TIMEOUT_MS: {
    envKey: 'OPENAI_IMAGES_TIMEOUT_MS',
  },
} as const;

export type ConfigKeyName = keyof typeof ConfigKeys;

function knownLookupOptions(key: ConfigKeyName): ConfigLookupOptions {
  const config = ConfigKeys[key];
  return {
    credentialsField: 'credentialsField' in config ? config.credentialsField : undefined,
    secretId: 'secretIdEnv' in config ? process.env[config.secretIdEnv] || undefined : undefined,
    parameterId:
      'parameterIdEnv' in config ? process.env[config.parameterIdEnv] || undefined : undefined,
    defaultValue: 'defaultValue' in config ? config.defaultValue : undefined,
  };
}

/**
 * API credentials, resolved once at startup and never refreshed
 */
export type Credentials = Readonly<{
  apiKey?: string;
  source?: ConfigSource;
}>;

/**
 * Resolve the OpenAI API key. A missing key is not an error here:
 * tools that need it report it per call.
 */
export async function loadCredentials(manager: ConfigManager): Promise<Credentials> {
  const result = await manager.findKnownConfig('OPENAI_API_KEY');
  if (!result) {
    return Object.freeze({});
  }
  return Object.freeze({ apiKey: result.value, source: result.source });
}

/**
 * Load the first .env file that exists among the candidates.
 * Variables already set in the process are kept. Returns the loaded path.
 */
export function loadEnvFile(candidates: string[]): string | null {
  const path = candidates.find((candidate) => existsSync(candidate));
  if (!path) {
    return null;
  }

  const result = loadDotenv({ path, quiet: true });
  if (result.error) {
    console.error(`Failed to load ${path}:`, result.error);
    return null;
  }
  return path;
}
