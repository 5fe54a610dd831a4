/**
 * Abstract DNS Provider Interface
 * Base class for providers served through the external-dns webhook API
 */
import type { Logger } from 'pino';
import { createChildLogger } from '../../core/Logger.js';
import type { Changes, Endpoint } from '../../types/index.js';
import type { DomainFilter } from './DomainFilter.js';

export interface ProviderOptions {
  domainFilter: DomainFilter;
  dryRun?: boolean;
}

export abstract class DNSProvider {
  protected logger: Logger;
  protected readonly domainFilter: DomainFilter;
  protected readonly dryRun: boolean;

  constructor(
    protected readonly providerName: string,
    options: ProviderOptions
  ) {
    this.logger = createChildLogger({ service: providerName, provider: providerName });
    this.domainFilter = options.domainFilter;
    this.dryRun = options.dryRun ?? false;
  }

  /**
   * List all managed records as endpoints
   */
  abstract records(signal?: AbortSignal): Promise<Endpoint[]>;

  /**
   * Apply a planned change batch
   */
  abstract applyChanges(changes: Changes, signal?: AbortSignal): Promise<void>;

  /**
   * Canonicalize endpoints before the planner compares them with current state.
   * Providers with no provider-specific normalization return them unchanged.
   */
  adjustEndpoints(endpoints: Endpoint[]): Endpoint[] {
    return endpoints;
  }

  /**
   * Domain filter reported to external-dns during negotiation
   */
  getDomainFilter(): DomainFilter {
    return this.domainFilter;
  }

  getProviderName(): string {
    return this.providerName;
  }

  isDryRun(): boolean {
    return this.dryRun;
  }
}
