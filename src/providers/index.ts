/**
 * Providers module exports
 */
export { DNSProvider, DomainFilter, type ProviderOptions, type DomainFilterOptions, type DomainFilterJSON } from './base/index.js';
export {
  DesignateProvider,
  DesignateClient,
  InstrumentedDesignateClient,
  KeystoneAuth,
  type DesignateClientInterface,
} from './designate/index.js';
