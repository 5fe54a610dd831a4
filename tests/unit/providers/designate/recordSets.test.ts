/**
 * Change aggregation unit tests
 */
import { describe, it, expect } from 'vitest';
import { DesignateLabels, type Changes, type Endpoint } from '../../../../src/types/index.js';
import {
  foldChanges,
  parseOriginalRecords,
  recordSetKey,
  resolveIdentityLabels,
  wantedRecords,
} from '../../../../src/providers/designate/recordSets.js';

function endpoint(
  dnsName: string,
  recordType: string,
  targets: string[],
  labels: Record<string, string> = {},
  recordTTL?: number
): Endpoint {
  return recordTTL === undefined
    ? { dnsName, recordType, targets, labels }
    : { dnsName, recordType, targets, labels, recordTTL };
}

function changes(partial: Partial<Changes>): Changes {
  return { create: [], updateOld: [], updateNew: [], delete: [], ...partial };
}

const identity = (zoneId: string, recordSetId: string, original: string[]): Record<string, string> => ({
  [DesignateLabels.ZONE_ID]: zoneId,
  [DesignateLabels.RECORD_SET_ID]: recordSetId,
  [DesignateLabels.ORIGINAL_RECORDS]: original.join('\u0000'),
});

describe('recordSets', () => {
  describe('recordSetKey', () => {
    it('should key by canonical name and type', () => {
      expect(recordSetKey('WWW.example.com', 'A')).toBe('www.example.com./A');
    });
  });

  describe('parseOriginalRecords', () => {
    it('should split the label on NUL', () => {
      const ep = endpoint('srv.example.com', 'A', [], identity('z', 'r', ['10.2.1.1', '10.3.3.2']));
      expect(parseOriginalRecords(ep)).toEqual(['10.2.1.1', '10.3.3.2']);
    });

    it('should return nothing when the label is missing', () => {
      expect(parseOriginalRecords(endpoint('srv.example.com', 'A', []))).toEqual([]);
    });
  });

  describe('resolveIdentityLabels', () => {
    const current = [
      endpoint('www.example.com', 'A', ['10.0.0.1'], identity('zone-1', 'rs-www', ['10.0.0.1'])),
      endpoint('www.example.com', 'TXT', ['"heritage"'], identity('zone-1', 'rs-txt', ['"heritage"'])),
    ];

    it('should keep labels the endpoint already carries', () => {
      const ep = endpoint('www.example.com', 'A', [], {
        [DesignateLabels.ZONE_ID]: 'zone-9',
        [DesignateLabels.RECORD_SET_ID]: 'rs-9',
      });
      expect(resolveIdentityLabels(ep, current)).toEqual({ zoneId: 'zone-9', recordSetId: 'rs-9' });
    });

    it('should backfill missing labels from the current endpoint with the same name and type', () => {
      const ep = endpoint('www.example.com', 'TXT', ['"heritage"']);
      expect(resolveIdentityLabels(ep, current)).toEqual({ zoneId: 'zone-1', recordSetId: 'rs-txt' });
    });

    it('should only fill labels that are missing', () => {
      const ep = endpoint('www.example.com', 'A', [], { [DesignateLabels.ZONE_ID]: 'zone-9' });
      expect(resolveIdentityLabels(ep, current)).toEqual({ zoneId: 'zone-9', recordSetId: 'rs-www' });
    });

    it('should leave labels empty when nothing matches', () => {
      const ep = endpoint('ftp.example.com', 'A', []);
      expect(resolveIdentityLabels(ep, current)).toEqual({ zoneId: undefined, recordSetId: undefined });
    });

    it('should not modify the endpoint', () => {
      const ep = endpoint('www.example.com', 'A', []);
      resolveIdentityLabels(ep, current);
      expect(ep.labels).toEqual({});
    });
  });

  describe('foldChanges', () => {
    it('should create an entry for a new endpoint', () => {
      const entries = foldChanges(changes({ create: [endpoint('new.example.com', 'A', ['10.0.0.5'], {}, 300)] }), []);

      expect([...entries.keys()]).toEqual(['new.example.com./A']);
      const entry = entries.get('new.example.com./A');
      expect(entry?.zoneId).toBe('');
      expect(entry?.recordSetId).toBe('');
      expect(entry?.ttl).toBe(300);
      expect(entry && wantedRecords(entry)).toEqual(['10.0.0.5']);
    });

    it('should keep sibling targets when one target is replaced', () => {
      const labels = identity('zone-1', 'rs-srv', ['10.2.1.1', '10.2.1.2']);
      const entries = foldChanges(
        changes({
          updateOld: [endpoint('srv.example.com', 'A', ['10.2.1.2'], labels)],
          updateNew: [endpoint('srv.example.com', 'A', ['10.3.3.2'], labels)],
        }),
        []
      );

      const entry = entries.get('srv.example.com./A');
      expect(entry?.recordSetId).toBe('rs-srv');
      expect(entry?.zoneId).toBe('zone-1');
      expect(entry && wantedRecords(entry)).toEqual(['10.2.1.1', '10.3.3.2']);
    });

    it('should mark every target unwanted when the whole endpoint is deleted', () => {
      const labels = identity('zone-1', 'rs-ftp', ['10.1.1.2']);
      const entries = foldChanges(changes({ delete: [endpoint('ftp.example.com', 'A', ['10.1.1.2'], labels)] }), []);

      const entry = entries.get('ftp.example.com./A');
      expect(entry?.recordSetId).toBe('rs-ftp');
      expect(entry && wantedRecords(entry)).toEqual([]);
    });

    it('should let a later phase override an earlier one', () => {
      const entries = foldChanges(
        changes({
          create: [endpoint('x.example.com', 'A', ['10.0.0.1'])],
          delete: [endpoint('x.example.com', 'A', ['10.0.0.1'])],
        }),
        []
      );

      const entry = entries.get('x.example.com./A');
      expect(entry?.names.get('10.0.0.1')).toBe(false);
    });

    it('should merge endpoints that differ only in name case', () => {
      const entries = foldChanges(
        changes({
          create: [endpoint('Mixed.example.com', 'A', ['10.0.0.1']), endpoint('mixed.example.com.', 'A', ['10.0.0.2'])],
        }),
        []
      );

      expect(entries.size).toBe(1);
      const entry = entries.get('mixed.example.com./A');
      expect(entry?.dnsName).toBe('mixed.example.com.');
      expect(entry && wantedRecords(entry)).toEqual(['10.0.0.1', '10.0.0.2']);
    });

    it('should canonicalize CNAME targets', () => {
      const entries = foldChanges(changes({ create: [endpoint('alias.example.com', 'CNAME', ['Target.Example.com'])] }), []);
      const entry = entries.get('alias.example.com./CNAME');
      expect(entry && wantedRecords(entry)).toEqual(['target.example.com.']);
    });

    it('should keep A and TXT targets verbatim', () => {
      const entries = foldChanges(
        changes({ create: [endpoint('txt.example.com', 'TXT', ['"Owner=Default"'])] }),
        []
      );
      const entry = entries.get('txt.example.com./TXT');
      expect(entry && wantedRecords(entry)).toEqual(['"Owner=Default"']);
    });

    it('should skip record types that are not managed', () => {
      const entries = foldChanges(changes({ create: [endpoint('mail.example.com', 'MX', ['10 mx.example.com'])] }), []);
      expect(entries.size).toBe(0);
    });

    it('should backfill identity labels from current endpoints', () => {
      const current = [endpoint('www.example.com', 'A', ['10.0.0.1'], identity('zone-1', 'rs-www', ['10.0.0.1']))];
      const entries = foldChanges(
        changes({
          updateOld: [endpoint('www.example.com', 'A', ['10.0.0.1'])],
          updateNew: [endpoint('www.example.com', 'A', ['10.0.0.2'])],
        }),
        current
      );

      const entry = entries.get('www.example.com./A');
      expect(entry?.zoneId).toBe('zone-1');
      expect(entry?.recordSetId).toBe('rs-www');
      expect(entry && wantedRecords(entry)).toEqual(['10.0.0.2']);
    });

    it('should take the TTL of the added endpoint on update', () => {
      const labels = identity('zone-1', 'rs-www', ['10.0.0.1']);
      const entries = foldChanges(
        changes({
          updateOld: [endpoint('www.example.com', 'A', ['10.0.0.1'], labels, 300)],
          updateNew: [endpoint('www.example.com', 'A', ['10.0.0.1'], labels, 60)],
        }),
        []
      );

      expect(entries.get('www.example.com./A')?.ttl).toBe(60);
    });

    it('should leave the TTL unset when no endpoint configures one', () => {
      const entries = foldChanges(changes({ create: [endpoint('new.example.com', 'A', ['10.0.0.5'], {}, 0)] }), []);
      expect(entries.get('new.example.com./A')?.ttl).toBeUndefined();
    });
  });

  describe('wantedRecords', () => {
    it('should return wanted targets sorted', () => {
      const names = new Map([
        ['10.0.0.3', true],
        ['10.0.0.1', true],
        ['10.0.0.2', false],
      ]);
      expect(
        wantedRecords({ dnsName: 'a.example.com.', recordType: 'A', zoneId: '', recordSetId: '', names })
      ).toEqual(['10.0.0.1', '10.0.0.3']);
    });
  });
});
