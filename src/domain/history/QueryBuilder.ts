/**
 * Incremental builder for filtered history queries.
 * The base query must end in an open WHERE clause (e.g. `WHERE 1=1`);
 * every filter appends an ` AND ...` fragment and binds its values positionally.
 */

import { BuiltQuery, QueryArg, SearchFilter } from '../models/types';
import { encodeTimestamp } from '../../utils/DateFormatter';

// Upper date bound covers the whole day: to + 24h - 1s
const END_OF_DAY_OFFSET_MS = 24 * 60 * 60 * 1000 - 1000;

export class QueryBuilder {
  private readonly baseQuery: string;
  private clauses = '';
  private readonly boundArgs: QueryArg[] = [];

  constructor(baseQuery: string) {
    this.baseQuery = baseQuery;
  }

  /**
   * Substring match on URL or title. No-op for an empty keyword.
   */
  withKeyword(keyword: string): this {
    if (keyword !== '') {
      const pattern = `%${keyword}%`;
      this.append(' AND (hi.url LIKE ? OR hv.title LIKE ?)', pattern, pattern);
    }
    return this;
  }

  /**
   * Exact match on the stored domain column. No-op for an empty domain.
   */
  withDomain(domain: string): this {
    if (domain !== '') {
      this.append(' AND hi.domain_expansion = ?', domain);
    }
    return this;
  }

  /**
   * Exclude each non-empty pattern and its subdomains.
   * The domain column may be NULL, so it is coalesced to '' and the URL is checked as well.
   */
  withIgnoreDomains(domains: readonly string[]): this {
    for (const d of domains) {
      if (d === '') {
        continue;
      }
      this.append(
        " AND COALESCE(hi.domain_expansion, '') != ?" +
          " AND COALESCE(hi.domain_expansion, '') NOT LIKE ?" +
          ' AND hi.url NOT LIKE ?' +
          ' AND hi.url NOT LIKE ?',
        d,
        `%.${d}`,
        `%://${d}.%`,
        `%://%.${d}.%`
      );
    }
    return this;
  }

  /**
   * Inclusive date range; `to` includes the whole day up to 23:59:59.
   * Either bound may be null.
   */
  withDateRange(from: Date | null, to: Date | null): this {
    if (from) {
      this.append(' AND hv.visit_time >= ?', encodeTimestamp(from));
    }
    if (to) {
      const endOfDay = new Date(to.getTime() + END_OF_DAY_OFFSET_MS);
      this.append(' AND hv.visit_time <= ?', encodeTimestamp(endOfDay));
    }
    return this;
  }

  /**
   * Apply keyword, domain, date range and ignore list, in that order
   */
  withFilter(filter: SearchFilter): this {
    return this.withKeyword(filter.keyword)
      .withDomain(filter.domain)
      .withDateRange(filter.from, filter.to)
      .withIgnoreDomains(filter.ignoreDomains);
  }

  /**
   * Append ORDER BY. The column is inserted verbatim and must be a trusted identifier.
   */
  orderByDesc(column: string): this {
    this.clauses += ` ORDER BY ${column} DESC`;
    return this;
  }

  limit(limit: number): this {
    this.append(' LIMIT ?', limit);
    return this;
  }

  offset(offset: number): this {
    this.append(' OFFSET ?', offset);
    return this;
  }

  /**
   * Final query text and arguments. Safe to call repeatedly.
   */
  build(): BuiltQuery {
    return {
      text: this.baseQuery + this.clauses,
      args: this.args(),
    };
  }

  /**
   * Arguments bound so far
   */
  args(): QueryArg[] {
    return [...this.boundArgs];
  }

  private append(clause: string, ...args: QueryArg[]): void {
    this.clauses += clause;
    this.boundArgs.push(...args);
  }
}
