/**
 * Zod schemas for configuration validation
 */
import { z } from 'zod';

// Log level schema
export const logLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);

const commaListSchema = z
  .string()
  .optional()
  .transform((value) =>
    (value ?? '')
      .split(',')
      .map((item) => item.trim())
      .filter((item) => item !== '')
  );

// Base application config schema
export const appConfigSchema = z.object({
  logLevel: logLevelSchema.default('info'),
  webhookHost: z.string().default('127.0.0.1'),
  webhookPort: z.coerce.number().int().min(1).max(65535).default(8888),
  statusHost: z.string().default('0.0.0.0'),
  statusPort: z.coerce.number().int().min(1).max(65535).default(8080),
  dryRun: z.coerce.boolean().default(false),
});

// Domain filter schema
export const domainFilterConfigSchema = z
  .object({
    include: commaListSchema,
    exclude: commaListSchema,
    regexInclude: z.string().optional(),
    regexExclude: z.string().optional(),
  })
  .refine(
    (data) => {
      for (const pattern of [data.regexInclude, data.regexExclude]) {
        if (pattern === undefined) continue;
        try {
          new RegExp(pattern);
        } catch {
          return false;
        }
      }
      return true;
    },
    { message: 'REGEX_DOMAIN_FILTER and REGEX_DOMAIN_EXCLUSION must be valid regular expressions' }
  );

// OpenStack Keystone credentials
export const openStackAuthSchema = z
  .object({
    authUrl: z.string().url(),
    username: z.string().optional(),
    userId: z.string().optional(),
    password: z.string().optional(),
    applicationCredentialId: z.string().optional(),
    applicationCredentialName: z.string().optional(),
    applicationCredentialSecret: z.string().optional(),
    projectId: z.string().optional(),
    projectName: z.string().optional(),
    userDomainId: z.string().optional(),
    userDomainName: z.string().optional(),
    projectDomainId: z.string().optional(),
    projectDomainName: z.string().optional(),
    regionName: z.string().optional(),
    interface: z.enum(['public', 'internal', 'admin']).default('public'),
  })
  .refine(
    (data) => {
      if (data.applicationCredentialSecret) {
        return !!data.applicationCredentialId || (!!data.applicationCredentialName && !!(data.userId || data.username));
      }
      return !!data.password && !!(data.userId || data.username);
    },
    {
      message:
        'OS_APPLICATION_CREDENTIAL_ID/OS_APPLICATION_CREDENTIAL_SECRET or OS_USERNAME/OS_PASSWORD must be set',
    }
  );

// Export types inferred from schemas
export type AppConfig = z.infer<typeof appConfigSchema>;
export type DomainFilterConfig = z.infer<typeof domainFilterConfigSchema>;
export type OpenStackAuthConfig = z.infer<typeof openStackAuthSchema>;
