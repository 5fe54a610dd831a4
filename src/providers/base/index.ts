/**
 * Base provider exports
 */
export { DNSProvider, type ProviderOptions } from './DNSProvider.js';
export { DomainFilter, type DomainFilterOptions, type DomainFilterJSON } from './DomainFilter.js';
