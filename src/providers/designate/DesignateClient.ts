/**
 * OpenStack Designate v2 API client
 */
import { z } from 'zod';
import type { Logger } from 'pino';
import { createChildLogger } from '../../core/Logger.js';
import type {
  DesignateRecordSet,
  DesignateZone,
  RecordSetCreateInput,
  RecordSetUpdateInput,
} from '../../types/index.js';
import { DesignateApiError } from './errors.js';
import type { KeystoneAuth } from './KeystoneAuth.js';

/**
 * Transport used by the provider. Every call may fail with a DesignateApiError.
 */
export interface DesignateClientInterface {
  /** Calls handler for each zone visible to the project */
  forEachZone(handler: (zone: DesignateZone) => void, signal?: AbortSignal): Promise<void>;

  /** Calls handler for each record set of the given zone */
  forEachRecordSet(
    zoneId: string,
    handler: (recordSet: DesignateRecordSet) => void,
    signal?: AbortSignal
  ): Promise<void>;

  /** Creates a record set and returns its ID */
  createRecordSet(zoneId: string, input: RecordSetCreateInput, signal?: AbortSignal): Promise<string>;

  updateRecordSet(
    zoneId: string,
    recordSetId: string,
    input: RecordSetUpdateInput,
    signal?: AbortSignal
  ): Promise<void>;

  deleteRecordSet(zoneId: string, recordSetId: string, signal?: AbortSignal): Promise<void>;
}

const linksSchema = z
  .object({
    next: z.string().nullish(),
  })
  .passthrough()
  .optional();

const zoneSchema = z
  .object({
    id: z.string(),
    name: z.string(),
    type: z.string().optional(),
    status: z.string(),
  })
  .passthrough();

const recordSetSchema = z
  .object({
    id: z.string(),
    zone_id: z.string(),
    name: z.string(),
    type: z.string(),
    records: z.array(z.string()).default([]),
    ttl: z.number().nullish(),
  })
  .passthrough();

const zonesPageSchema = z.object({ zones: z.array(zoneSchema), links: linksSchema });
const recordSetsPageSchema = z.object({ recordsets: z.array(recordSetSchema), links: linksSchema });

type RequestMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

export class DesignateClient implements DesignateClientInterface {
  private readonly logger: Logger;

  constructor(private readonly auth: KeystoneAuth) {
    this.logger = createChildLogger({ service: 'Designate' });
  }

  async forEachZone(handler: (zone: DesignateZone) => void, signal?: AbortSignal): Promise<void> {
    let next: string | undefined = 'zones';
    while (next) {
      const page = zonesPageSchema.parse(await this.request('GET', next, undefined, signal));
      for (const zone of page.zones) {
        handler(zone);
      }
      next = page.links?.next ?? undefined;
    }
  }

  async forEachRecordSet(
    zoneId: string,
    handler: (recordSet: DesignateRecordSet) => void,
    signal?: AbortSignal
  ): Promise<void> {
    let next: string | undefined = `zones/${encodeURIComponent(zoneId)}/recordsets`;
    while (next) {
      const page = recordSetsPageSchema.parse(await this.request('GET', next, undefined, signal));
      for (const recordSet of page.recordsets) {
        handler(recordSet);
      }
      next = page.links?.next ?? undefined;
    }
  }

  async createRecordSet(zoneId: string, input: RecordSetCreateInput, signal?: AbortSignal): Promise<string> {
    const body: Record<string, unknown> = {
      name: input.name,
      type: input.type,
      records: input.records,
    };
    if (input.ttl) {
      body['ttl'] = input.ttl;
    }

    const created = recordSetSchema.parse(
      await this.request('POST', `zones/${encodeURIComponent(zoneId)}/recordsets`, body, signal)
    );
    this.logger.debug({ zoneId, recordSetId: created.id }, 'Record set created');
    return created.id;
  }

  async updateRecordSet(
    zoneId: string,
    recordSetId: string,
    input: RecordSetUpdateInput,
    signal?: AbortSignal
  ): Promise<void> {
    // null resets the TTL to the zone default
    const body = { records: input.records, ttl: input.ttl ? input.ttl : null };
    await this.request(
      'PUT',
      `zones/${encodeURIComponent(zoneId)}/recordsets/${encodeURIComponent(recordSetId)}`,
      body,
      signal
    );
  }

  async deleteRecordSet(zoneId: string, recordSetId: string, signal?: AbortSignal): Promise<void> {
    await this.request(
      'DELETE',
      `zones/${encodeURIComponent(zoneId)}/recordsets/${encodeURIComponent(recordSetId)}`,
      undefined,
      signal
    );
  }

  /**
   * Performs one API call. A 401 re-authenticates and retries once.
   */
  private async request(
    method: RequestMethod,
    path: string,
    body: unknown,
    signal: AbortSignal | undefined,
    reauthenticated: boolean = false
  ): Promise<unknown> {
    const endpoint = await this.auth.getEndpoint(signal);
    const url = new URL(path, endpoint).toString();
    const token = await this.auth.getToken(signal);

    let response: Response;
    try {
      response = await fetch(url, {
        method,
        headers: {
          'X-Auth-Token': token,
          Accept: 'application/json',
          ...(body !== undefined ? { 'Content-Type': 'application/json' } : {}),
        },
        body: body !== undefined ? JSON.stringify(body) : undefined,
        signal,
      });
    } catch (error) {
      throw DesignateApiError.network(method, url, error);
    }

    if (response.status === 401 && !reauthenticated) {
      this.logger.debug({ method, url }, 'Token rejected, re-authenticating');
      this.auth.invalidate();
      return this.request(method, path, body, signal, true);
    }

    if (!response.ok) {
      const detail = await response.text().catch(() => response.statusText);
      throw DesignateApiError.fromResponse(method, url, response.status, detail);
    }

    if (response.status === 204 || method === 'DELETE') {
      return undefined;
    }

    return response.json();
  }
}
