/**
 * ConfigManager unit tests
 */
import { describe, it, expect } from 'vitest';
import { ConfigManager, remapLegacyEnv } from '../../../src/config/ConfigManager.js';

const baseEnv = {
  LOG_LEVEL: 'silent',
  OS_AUTH_URL: 'https://keystone.example.test/v3',
  OS_USERNAME: 'demo',
  OS_PASSWORD: 'test-secret',
};

describe('ConfigManager', () => {
  describe('app', () => {
    it('should apply defaults', () => {
      const config = new ConfigManager(baseEnv);

      expect(config.app).toEqual({
        logLevel: 'silent',
        webhookHost: '127.0.0.1',
        webhookPort: 8888,
        statusHost: '0.0.0.0',
        statusPort: 8080,
        dryRun: false,
      });
    });

    it('should read listen addresses and dry-run mode', () => {
      const config = new ConfigManager({
        ...baseEnv,
        WEBHOOK_HOST: '0.0.0.0',
        WEBHOOK_PORT: '9888',
        STATUS_PORT: '9080',
        DRY_RUN: 'TRUE',
      });

      expect(config.app.webhookHost).toBe('0.0.0.0');
      expect(config.app.webhookPort).toBe(9888);
      expect(config.app.statusPort).toBe(9080);
      expect(config.app.dryRun).toBe(true);
    });

    it('should reject an invalid port', () => {
      expect(() => new ConfigManager({ ...baseEnv, WEBHOOK_PORT: '70000' })).toThrow();
    });
  });

  describe('domainFilter', () => {
    it('should split comma separated lists', () => {
      const config = new ConfigManager({
        ...baseEnv,
        DOMAIN_FILTER: 'example.com, test.net',
        EXCLUDE_DOMAINS: 'internal.example.com',
      });

      expect(config.domainFilter.include).toEqual(['example.com', 'test.net']);
      expect(config.domainFilter.exclude).toEqual(['internal.example.com']);
    });

    it('should default to empty lists', () => {
      const config = new ConfigManager(baseEnv);

      expect(config.domainFilter.include).toEqual([]);
      expect(config.domainFilter.exclude).toEqual([]);
      expect(config.domainFilter.regexInclude).toBeUndefined();
    });

    it('should reject an invalid regular expression', () => {
      expect(() => new ConfigManager({ ...baseEnv, REGEX_DOMAIN_FILTER: '(' })).toThrow(
        'REGEX_DOMAIN_FILTER and REGEX_DOMAIN_EXCLUSION must be valid regular expressions'
      );
    });
  });

  describe('openStack', () => {
    it('should read password credentials', () => {
      const config = new ConfigManager({
        ...baseEnv,
        OS_PROJECT_NAME: 'demo-project',
        OS_USER_DOMAIN_NAME: 'Default',
        OS_REGION_NAME: 'RegionOne',
      });

      expect(config.openStack).toMatchObject({
        authUrl: 'https://keystone.example.test/v3',
        username: 'demo',
        password: 'test-secret',
        projectName: 'demo-project',
        userDomainName: 'Default',
        regionName: 'RegionOne',
        interface: 'public',
      });
    });

    it('should accept application credentials', () => {
      const config = new ConfigManager({
        LOG_LEVEL: 'silent',
        OS_AUTH_URL: 'https://keystone.example.test/v3',
        OS_APPLICATION_CREDENTIAL_ID: 'cred-1',
        OS_APPLICATION_CREDENTIAL_SECRET: 'test-secret',
      });

      expect(config.openStack.applicationCredentialId).toBe('cred-1');
      expect(config.openStack.applicationCredentialSecret).toBe('test-secret');
    });

    it('should normalize the endpoint interface', () => {
      const config = new ConfigManager({ ...baseEnv, OS_INTERFACE: 'Internal' });

      expect(config.openStack.interface).toBe('internal');
    });

    it('should map legacy tenant variables', () => {
      const config = new ConfigManager({ ...baseEnv, OS_TENANT_NAME: 'legacy-project', OS_DOMAIN_NAME: 'Legacy' });

      expect(config.openStack.projectName).toBe('legacy-project');
      expect(config.openStack.userDomainName).toBe('Legacy');
    });

    it('should require credentials', () => {
      expect(
        () => new ConfigManager({ LOG_LEVEL: 'silent', OS_AUTH_URL: 'https://keystone.example.test/v3', OS_USERNAME: 'demo' })
      ).toThrow('OS_APPLICATION_CREDENTIAL_ID/OS_APPLICATION_CREDENTIAL_SECRET or OS_USERNAME/OS_PASSWORD must be set');
    });

    it('should require a valid auth URL', () => {
      expect(() => new ConfigManager({ ...baseEnv, OS_AUTH_URL: 'keystone' })).toThrow();
    });
  });
});

describe('remapLegacyEnv', () => {
  it('should not overwrite current variables', () => {
    expect(remapLegacyEnv({ OS_TENANT_ID: 'legacy', OS_PROJECT_ID: 'current' })['OS_PROJECT_ID']).toBe('current');
  });

  it('should copy legacy variables to their current names', () => {
    expect(remapLegacyEnv({ OS_TENANT_ID: 'legacy' })).toEqual({ OS_TENANT_ID: 'legacy', OS_PROJECT_ID: 'legacy' });
  });
});
