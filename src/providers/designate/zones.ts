/**
 * Zone name helpers
 */
import type { DesignateZone, ManagedZones } from '../../types/index.js';
import type { DomainFilter } from '../base/DomainFilter.js';

/**
 * Lower-case FQDN with a trailing dot
 */
export function canonicalizeDomainName(name: string): string {
  const fqdn = name.endsWith('.') ? name : `${name}.`;
  return fqdn.toLowerCase();
}

export function canonicalizeDomainNames(names: readonly string[]): string[] {
  return names.map(canonicalizeDomainName);
}

/**
 * Whether a zone may own record sets managed by this webhook
 */
export function isZoneManaged(zone: DesignateZone, domainFilter: DomainFilter): boolean {
  if (zone.type && zone.type.toUpperCase() !== 'PRIMARY') {
    return false;
  }
  if (zone.status !== 'ACTIVE') {
    return false;
  }
  return domainFilter.match(canonicalizeDomainName(zone.name));
}

/**
 * Whether a canonical hostname lies in a canonical zone. The suffix must start
 * on a label boundary, so `first-test.example.com.` is not in `test.example.com.`.
 */
export function isInZone(hostname: string, zoneName: string): boolean {
  return hostname === zoneName || hostname.endsWith(`.${zoneName}`);
}

/**
 * Finds the zone owning a canonical hostname by longest suffix.
 * Returns an empty string when no managed zone matches.
 */
export function matchZone(hostname: string, managedZones: ManagedZones): string {
  let longestZoneLength = 0;
  let resultId = '';

  for (const [zoneId, zoneName] of managedZones) {
    if (!isInZone(hostname, zoneName)) {
      continue;
    }
    if (zoneName.length > longestZoneLength) {
      resultId = zoneId;
      longestZoneLength = zoneName.length;
    }
  }

  return resultId;
}
