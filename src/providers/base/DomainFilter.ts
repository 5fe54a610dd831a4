/**
 * Domain filter restricting which zones are visible to the webhook
 */

export interface DomainFilterOptions {
  include?: string[];
  exclude?: string[];
  regexInclude?: string;
  regexExclude?: string;
}

/** Negotiation payload sent to external-dns */
export type DomainFilterJSON =
  | { include?: string[]; exclude?: string[] }
  | { regexInclude?: string; regexExclude?: string };

function prepareFilters(filters: readonly string[] | undefined): string[] {
  return (filters ?? [])
    .map((filter) => filter.trim().replace(/\.+$/, '').toLowerCase())
    .filter((filter) => filter !== '');
}

function normalizeDomain(domain: string): string {
  return domain.replace(/\.$/, '').toLowerCase();
}

function countDots(value: string): number {
  return value.split('.').length - 1;
}

function matchFilter(filters: readonly string[], domain: string, emptyValue: boolean): boolean {
  if (filters.length === 0) {
    return emptyValue;
  }

  const stripped = normalizeDomain(domain);
  for (const filter of filters) {
    if (filter.startsWith('.') && stripped.endsWith(filter)) {
      return true;
    }
    if (countDots(stripped) === countDots(filter)) {
      if (stripped === filter) {
        return true;
      }
    } else if (stripped.endsWith(`.${filter}`)) {
      return true;
    }
  }
  return false;
}

export class DomainFilter {
  private readonly include: string[];
  private readonly exclude: string[];
  private readonly regexInclude?: RegExp;
  private readonly regexExclude?: RegExp;

  constructor(options: DomainFilterOptions = {}) {
    this.include = prepareFilters(options.include);
    this.exclude = prepareFilters(options.exclude);
    if (options.regexInclude) {
      this.regexInclude = new RegExp(options.regexInclude);
    }
    if (options.regexExclude) {
      this.regexExclude = new RegExp(options.regexExclude);
    }
  }

  /**
   * Whether a domain (with or without trailing dot) is accepted
   */
  match(domain: string): boolean {
    if (this.regexInclude || this.regexExclude) {
      return this.matchRegex(domain);
    }
    return matchFilter(this.include, domain, true) && !matchFilter(this.exclude, domain, false);
  }

  isConfigured(): boolean {
    return this.include.length > 0 || this.regexInclude !== undefined;
  }

  toJSON(): DomainFilterJSON {
    if (this.regexInclude || this.regexExclude) {
      return {
        regexInclude: this.regexInclude?.source,
        regexExclude: this.regexExclude?.source,
      };
    }
    return {
      include: this.include.length > 0 ? this.include : undefined,
      exclude: this.exclude.length > 0 ? this.exclude : undefined,
    };
  }

  private matchRegex(domain: string): boolean {
    const stripped = normalizeDomain(domain);
    if (this.regexExclude && this.regexExclude.test(stripped)) {
      return false;
    }
    return this.regexInclude ? this.regexInclude.test(stripped) : true;
  }
}
