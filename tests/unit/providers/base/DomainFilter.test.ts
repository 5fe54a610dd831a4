/**
 * DomainFilter unit tests
 */
import { describe, it, expect } from 'vitest';
import { DomainFilter } from '../../../../src/providers/base/DomainFilter.js';

describe('DomainFilter', () => {
  describe('match', () => {
    it('should accept everything when empty', () => {
      const filter = new DomainFilter();
      expect(filter.match('example.com.')).toBe(true);
      expect(filter.isConfigured()).toBe(false);
    });

    it('should accept the domain and its subdomains', () => {
      const filter = new DomainFilter({ include: ['example.com'] });
      expect(filter.match('example.com.')).toBe(true);
      expect(filter.match('sub.example.com')).toBe(true);
      expect(filter.isConfigured()).toBe(true);
    });

    it('should reject domains that only share a suffix', () => {
      const filter = new DomainFilter({ include: ['example.com'] });
      expect(filter.match('badexample.com')).toBe(false);
      expect(filter.match('example.org')).toBe(false);
    });

    it('should treat a leading dot as subdomains only', () => {
      const filter = new DomainFilter({ include: ['.example.com'] });
      expect(filter.match('sub.example.com')).toBe(true);
      expect(filter.match('example.com')).toBe(false);
    });

    it('should ignore case and trailing dots in filters', () => {
      const filter = new DomainFilter({ include: ['Example.COM.'] });
      expect(filter.match('www.example.com.')).toBe(true);
    });

    it('should apply exclusions after inclusions', () => {
      const filter = new DomainFilter({ include: ['example.com'], exclude: ['internal.example.com'] });
      expect(filter.match('www.example.com')).toBe(true);
      expect(filter.match('internal.example.com')).toBe(false);
      expect(filter.match('db.internal.example.com')).toBe(false);
    });

    it('should use regular expressions when configured', () => {
      const filter = new DomainFilter({ regexInclude: '^(.+\\.)?example\\.com$', regexExclude: '^private\\.' });
      expect(filter.match('www.example.com.')).toBe(true);
      expect(filter.match('private.example.com.')).toBe(false);
      expect(filter.match('example.org.')).toBe(false);
    });
  });

  describe('toJSON', () => {
    it('should report include and exclude lists', () => {
      const filter = new DomainFilter({ include: ['example.com'], exclude: ['internal.example.com'] });
      expect(filter.toJSON()).toEqual({ include: ['example.com'], exclude: ['internal.example.com'] });
    });

    it('should serialize an empty filter as an empty object', () => {
      expect(JSON.stringify(new DomainFilter())).toBe('{}');
    });

    it('should report regular expressions', () => {
      const filter = new DomainFilter({ regexInclude: 'example\\.com$' });
      expect(JSON.stringify(filter)).toBe('{"regexInclude":"example\\\\.com$"}');
    });
  });
});
