/**
 * OpenStack Keystone v3 authentication
 * Obtains a token and the Designate endpoint from the service catalog
 */
import { z } from 'zod';
import type { Logger } from 'pino';
import { createChildLogger } from '../../core/Logger.js';
import type { OpenStackAuthConfig } from '../../config/schema.js';
import { DesignateApiError } from './errors.js';

// Refresh tokens this long before Keystone expires them
const TOKEN_EXPIRY_MARGIN_MS = 60_000;

const tokenResponseSchema = z.object({
  token: z.object({
    expires_at: z.string(),
    catalog: z
      .array(
        z.object({
          type: z.string(),
          name: z.string().optional(),
          endpoints: z.array(
            z.object({
              interface: z.string(),
              region: z.string().nullish(),
              region_id: z.string().nullish(),
              url: z.string(),
            })
          ),
        })
      )
      .default([]),
  }),
});

type TokenResponse = z.infer<typeof tokenResponseSchema>;

interface KeystoneSession {
  token: string;
  expiresAt: number;
  endpoint: string;
}

type NamedOrId = { id: string } | { name: string };

function domainRef(id: string | undefined, name: string | undefined): NamedOrId | undefined {
  if (id) return { id };
  if (name) return { name };
  return undefined;
}

function userRef(config: OpenStackAuthConfig): Record<string, unknown> {
  if (config.userId) {
    return { id: config.userId };
  }
  const domain = domainRef(config.userDomainId, config.userDomainName);
  return domain ? { name: config.username, domain } : { name: config.username };
}

/**
 * Builds the body of a Keystone v3 token request
 */
export function buildAuthRequest(config: OpenStackAuthConfig): Record<string, unknown> {
  if (config.applicationCredentialSecret) {
    const credential = config.applicationCredentialId
      ? { id: config.applicationCredentialId, secret: config.applicationCredentialSecret }
      : {
          name: config.applicationCredentialName,
          secret: config.applicationCredentialSecret,
          user: userRef(config),
        };
    return {
      auth: {
        identity: {
          methods: ['application_credential'],
          application_credential: credential,
        },
      },
    };
  }

  const auth: Record<string, unknown> = {
    identity: {
      methods: ['password'],
      password: {
        user: { ...userRef(config), password: config.password },
      },
    },
  };

  if (config.projectId) {
    auth['scope'] = { project: { id: config.projectId } };
  } else if (config.projectName) {
    const domain = domainRef(
      config.projectDomainId ?? config.userDomainId,
      config.projectDomainName ?? config.userDomainName
    );
    auth['scope'] = { project: domain ? { name: config.projectName, domain } : { name: config.projectName } };
  }

  return { auth };
}

/**
 * Normalizes a catalog URL to the Designate v2 API root, with trailing slash
 */
export function toDesignateV2Url(url: string): string {
  const base = url.endsWith('/') ? url : `${url}/`;
  return base.endsWith('v2/') ? base : `${base}v2/`;
}

/**
 * Picks the DNS endpoint matching interface and region from the catalog
 */
export function findDnsEndpoint(
  catalog: TokenResponse['token']['catalog'],
  endpointInterface: string,
  region?: string
): string | undefined {
  for (const service of catalog) {
    if (service.type !== 'dns') continue;

    const endpoint = service.endpoints.find(
      (candidate) =>
        candidate.interface === endpointInterface &&
        (!region || candidate.region === region || candidate.region_id === region)
    );
    if (endpoint) {
      return endpoint.url;
    }
  }
  return undefined;
}

export class KeystoneAuth {
  private readonly logger: Logger;
  private session: KeystoneSession | null = null;
  private pending: Promise<KeystoneSession> | null = null;

  constructor(private readonly config: OpenStackAuthConfig) {
    this.logger = createChildLogger({ service: 'Keystone' });
  }

  /**
   * Current token, authenticating when none is held or it is about to expire
   */
  async getToken(signal?: AbortSignal): Promise<string> {
    return (await this.getSession(signal)).token;
  }

  /**
   * Designate v2 API root from the service catalog
   */
  async getEndpoint(signal?: AbortSignal): Promise<string> {
    return (await this.getSession(signal)).endpoint;
  }

  /**
   * Drop the held token so the next call re-authenticates
   */
  invalidate(): void {
    this.session = null;
  }

  private async getSession(signal?: AbortSignal): Promise<KeystoneSession> {
    if (this.session && Date.now() < this.session.expiresAt - TOKEN_EXPIRY_MARGIN_MS) {
      return this.session;
    }

    if (!this.pending) {
      this.pending = this.authenticate(signal).finally(() => {
        this.pending = null;
      });
    }
    this.session = await this.pending;
    return this.session;
  }

  private async authenticate(signal?: AbortSignal): Promise<KeystoneSession> {
    const url = `${this.config.authUrl.replace(/\/+$/, '')}/auth/tokens`;
    this.logger.info({ authUrl: this.config.authUrl }, 'Authenticating against OpenStack Keystone');

    let response: Response;
    try {
      response = await fetch(url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json', Accept: 'application/json' },
        body: JSON.stringify(buildAuthRequest(this.config)),
        signal,
      });
    } catch (error) {
      throw DesignateApiError.network('POST', url, error);
    }

    if (!response.ok) {
      const detail = await response.text().catch(() => response.statusText);
      throw DesignateApiError.fromResponse('POST', url, response.status, detail);
    }

    const token = response.headers.get('x-subject-token');
    if (!token) {
      throw new DesignateApiError('Keystone response did not include X-Subject-Token', 'POST', response.status);
    }

    const body = tokenResponseSchema.parse(await response.json());
    const catalogUrl = findDnsEndpoint(body.token.catalog, this.config.interface, this.config.regionName);
    if (!catalogUrl) {
      throw new DesignateApiError(
        `No DNS service endpoint found in the catalog (interface=${this.config.interface}, region=${this.config.regionName ?? 'any'})`,
        'POST'
      );
    }

    const endpoint = toDesignateV2Url(catalogUrl);
    this.logger.info({ endpoint }, 'Found OpenStack Designate service');

    return {
      token,
      expiresAt: Date.parse(body.token.expires_at),
      endpoint,
    };
  }
}
