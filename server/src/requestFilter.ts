import { compilePatterns } from "./comparator.js";
import type { FilterOptions, RequestRecord, ScopeOptions } from "./types.js";

const hostOf = (url: string): string => {
  try {
    return new URL(url).host;
  } catch {
    return "";
  }
};

/** Picks the records to minimize: a record must pass the filter and be in scope. */
export class RequestFilter {
  private readonly filter: FilterOptions;
  private readonly scope: ScopeOptions;
  private readonly methods: Set<string>;
  private readonly urlPatterns: RegExp[];
  private readonly scopePatterns: RegExp[];

  constructor(filter: FilterOptions, scope: ScopeOptions) {
    this.filter = filter;
    this.scope = scope;
    this.methods = new Set(filter.methods.map((method) => method.toUpperCase()));
    this.urlPatterns = compilePatterns(filter.urlPatterns, "");
    this.scopePatterns = compilePatterns(scope.includePatterns, "");
  }

  apply(records: readonly RequestRecord[]): RequestRecord[] {
    return records.filter((record) => this.matchesFilter(record) && this.inScope(record));
  }

  private matchesFilter(record: RequestRecord): boolean {
    if (this.methods.size > 0 && !this.methods.has(record.method.toUpperCase())) {
      return false;
    }
    if (this.filter.hosts.length > 0 && !this.filter.hosts.includes(hostOf(record.url))) {
      return false;
    }
    if (
      this.urlPatterns.length > 0 &&
      !this.urlPatterns.some((pattern) => pattern.test(record.url))
    ) {
      return false;
    }
    const range = this.filter.indexRange;
    if (range && (record.index < range[0] || record.index > range[1])) {
      return false;
    }
    return true;
  }

  private inScope(record: RequestRecord): boolean {
    if (this.scope.includeUrls.length === 0 && this.scopePatterns.length === 0) {
      return true;
    }
    return (
      this.scope.includeUrls.includes(record.url) ||
      this.scopePatterns.some((pattern) => pattern.test(record.url))
    );
  }
}
