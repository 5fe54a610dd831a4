/**
 * Configuration Manager
 * Centralized configuration loading and validation
 */
import { readFileSync, existsSync } from 'fs';
import { logger, setLogLevel } from '../core/Logger.js';
import {
  appConfigSchema,
  domainFilterConfigSchema,
  openStackAuthSchema,
  type AppConfig,
  type DomainFilterConfig,
  type OpenStackAuthConfig,
} from './schema.js';

type Env = Record<string, string | undefined>;

// Legacy OpenStack RC names -> current names
const LEGACY_ENV_NAMES: Record<string, string> = {
  OS_TENANT_NAME: 'OS_PROJECT_NAME',
  OS_TENANT_ID: 'OS_PROJECT_ID',
  OS_DOMAIN_NAME: 'OS_USER_DOMAIN_NAME',
  OS_DOMAIN_ID: 'OS_USER_DOMAIN_ID',
};

/**
 * Copy legacy variables to their current names without overwriting set values
 */
export function remapLegacyEnv(env: Env): Env {
  const result: Env = { ...env };
  for (const [legacy, current] of Object.entries(LEGACY_ENV_NAMES)) {
    const legacyValue = env[legacy];
    if (!env[current] && legacyValue) {
      result[current] = legacyValue;
    }
  }
  return result;
}

function getEnvBool(env: Env, key: string, defaultValue: boolean): boolean {
  const value = env[key];
  if (value === undefined) return defaultValue;
  return value.toLowerCase() === 'true' || value === '1';
}

/**
 * Read secret from file (Docker secrets support) or environment
 */
function getSecret(env: Env, key: string): string | undefined {
  const secretPath = `/run/secrets/${key.toLowerCase()}`;
  if (existsSync(secretPath)) {
    try {
      return readFileSync(secretPath, 'utf-8').trim();
    } catch (error) {
      logger.warn({ key, error }, 'Failed to read Docker secret');
    }
  }

  return env[key];
}

export class ConfigManager {
  private _app: AppConfig;
  private _domainFilter: DomainFilterConfig;
  private _openStack: OpenStackAuthConfig;

  constructor(source: Env = process.env) {
    const env = remapLegacyEnv(source);

    this._app = appConfigSchema.parse({
      logLevel: env['LOG_LEVEL']?.toLowerCase(),
      webhookHost: env['WEBHOOK_HOST'],
      webhookPort: env['WEBHOOK_PORT'],
      statusHost: env['STATUS_HOST'],
      statusPort: env['STATUS_PORT'],
      dryRun: getEnvBool(env, 'DRY_RUN', false),
    });

    setLogLevel(this._app.logLevel);

    this._domainFilter = domainFilterConfigSchema.parse({
      include: env['DOMAIN_FILTER'],
      exclude: env['EXCLUDE_DOMAINS'],
      regexInclude: env['REGEX_DOMAIN_FILTER'] || undefined,
      regexExclude: env['REGEX_DOMAIN_EXCLUSION'] || undefined,
    });

    this._openStack = openStackAuthSchema.parse({
      authUrl: env['OS_AUTH_URL'],
      username: env['OS_USERNAME'],
      userId: env['OS_USER_ID'],
      password: getSecret(env, 'OS_PASSWORD'),
      applicationCredentialId: env['OS_APPLICATION_CREDENTIAL_ID'],
      applicationCredentialName: env['OS_APPLICATION_CREDENTIAL_NAME'],
      applicationCredentialSecret: getSecret(env, 'OS_APPLICATION_CREDENTIAL_SECRET'),
      projectId: env['OS_PROJECT_ID'],
      projectName: env['OS_PROJECT_NAME'],
      userDomainId: env['OS_USER_DOMAIN_ID'],
      userDomainName: env['OS_USER_DOMAIN_NAME'],
      projectDomainId: env['OS_PROJECT_DOMAIN_ID'],
      projectDomainName: env['OS_PROJECT_DOMAIN_NAME'],
      regionName: env['OS_REGION_NAME'],
      interface: env['OS_INTERFACE']?.toLowerCase(),
    });

    logger.info(
      {
        dryRun: this._app.dryRun,
        domainFilter: this._domainFilter.include,
        authUrl: this._openStack.authUrl,
      },
      'Configuration loaded'
    );
  }

  get app(): Readonly<AppConfig> {
    return this._app;
  }

  get domainFilter(): Readonly<DomainFilterConfig> {
    return this._domainFilter;
  }

  get openStack(): Readonly<OpenStackAuthConfig> {
    return this._openStack;
  }
}

// Export singleton instance
let configInstance: ConfigManager | null = null;

export function getConfig(): ConfigManager {
  if (!configInstance) {
    configInstance = new ConfigManager();
  }
  return configInstance;
}

export function resetConfig(): void {
  configInstance = null;
}
