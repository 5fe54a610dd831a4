/**
 * Designate error types
 */

/**
 * Transport-level failure of a single Designate or Keystone HTTP call
 */
export class DesignateApiError extends Error {
  constructor(
    message: string,
    public readonly method: string,
    public readonly statusCode?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'DesignateApiError';
  }

  static fromResponse(method: string, url: string, status: number, detail?: string): DesignateApiError {
    const suffix = detail ? `: ${detail}` : '';
    return new DesignateApiError(`${method} ${url} failed with status ${status}${suffix}`, method, status);
  }

  static network(method: string, url: string, cause: unknown): DesignateApiError {
    const reason = cause instanceof Error ? cause.message : String(cause);
    return new DesignateApiError(`${method} ${url} failed: ${reason}`, method, undefined, { cause });
  }
}

/**
 * Zones could not be enumerated; aborts the whole reconciliation call
 */
export class ZoneListingError extends Error {
  constructor(cause: unknown) {
    super(`failed to list zones: ${describe(cause)}`, { cause });
    this.name = 'ZoneListingError';
  }
}

/**
 * Record sets of a zone could not be enumerated; aborts the read
 */
export class RecordListingError extends Error {
  constructor(
    public readonly zoneId: string,
    cause: unknown
  ) {
    super(`failed to list record sets of zone ${zoneId}: ${describe(cause)}`, { cause });
    this.name = 'RecordListingError';
  }
}

export type RecordMutation = 'create' | 'update' | 'delete';

/**
 * A single create/update/delete failed. Other record sets are still processed.
 */
export class RecordMutationError extends Error {
  constructor(
    public readonly operation: RecordMutation,
    public readonly dnsName: string,
    public readonly recordType: string,
    cause: unknown
  ) {
    super(`failed to ${operation} record set ${dnsName}/${recordType}: ${describe(cause)}`, { cause });
    this.name = 'RecordMutationError';
  }
}

function describe(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
