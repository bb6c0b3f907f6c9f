/**
 * Read-only aggregation queries over the browser history database.
 * Every call issues fresh queries; nothing is cached between calls.
 */

import Database from 'better-sqlite3';
import {
  DailyStats,
  DomainStats,
  HierarchicalDomainStats,
  HourlyStats,
  SearchFilter,
  Visit,
} from '../domain/models/types';
import { QueryBuilder } from '../domain/history/QueryBuilder';
import { extractBaseDomain, extractHostFromURL, groupHierarchical } from '../domain/history/DomainClassifier';
import { shouldIgnore } from '../domain/history/IgnoreMatcher';
import { decodeTimestamp, formatDate } from '../utils/DateFormatter';
import { UNKNOWN_DOMAIN } from '../utils/constants';
import { LoggingService, toError } from './LoggingService';

const VISIT_JOIN = `
  FROM history_visits hv
  JOIN history_items hi ON hv.history_item = hi.id
  WHERE 1=1`;

const HISTORY_BASE_QUERY = `
  SELECT
    hi.url AS url,
    COALESCE(hv.title, '') AS title,
    COALESCE(hi.domain_expansion, '') AS domain,
    hv.visit_time AS visit_time${VISIT_JOIN}`;

const VISIT_TIME_BASE_QUERY = `SELECT hv.visit_time AS visit_time${VISIT_JOIN}`;

const FILTERED_COUNT_BASE_QUERY = `SELECT COUNT(*) AS count${VISIT_JOIN}`;

const ITEM_COUNTS_QUERY = 'SELECT hi.url AS url, COALESCE(hi.visit_count, 0) AS visit_count FROM history_items hi';

const TOTAL_COUNT_QUERY = 'SELECT COUNT(*) AS count FROM history_visits';

const DAY_MS = 24 * 60 * 60 * 1000;

interface VisitRow {
  url: string;
  title: string;
  domain: string;
  visit_time: number;
}

interface VisitTimeRow {
  visit_time: number;
}

interface ItemCountRow {
  url: string;
  visit_count: number;
}

interface CountRow {
  count: number;
}

/**
 * HistoryService runs the report queries against a read-only history database
 */
export class HistoryService {
  private db: Database.Database;
  private logger: LoggingService;

  /**
   * @param db - An open database handle; the service never writes to it
   * @param logger - LoggingService instance for query logging
   */
  constructor(db: Database.Database, logger: LoggingService) {
    this.db = db;
    this.logger = logger;
  }

  /**
   * Open a history database file in read-only mode
   * @throws Error if the file does not exist or cannot be opened
   */
  static open(dbPath: string, logger: LoggingService): HistoryService {
    try {
      const db = new Database(dbPath, { readonly: true, fileMustExist: true });
      logger.info(`History database opened: ${dbPath}`);
      return new HistoryService(db, logger);
    } catch (error) {
      const err = toError(error);
      logger.error(`Failed to open history database: ${dbPath}`, err);
      throw new Error(`Failed to open history database ${dbPath}: ${err.message}`, { cause: err });
    }
  }

  /**
   * Most recent visits matching the filter, newest first
   * @param limit - Maximum number of visits
   * @param offset - Number of visits to skip (for paging)
   */
  getRecentVisits(limit: number, filter: SearchFilter, offset: number = 0): Visit[] {
    return this.run('fetch recent visits', () => {
      const qb = new QueryBuilder(HISTORY_BASE_QUERY)
        .withFilter(filter)
        .orderByDesc('hv.visit_time')
        .limit(limit);
      if (offset > 0) {
        qb.offset(offset);
      }

      const { text, args } = qb.build();
      const rows = this.db.prepare<unknown[], VisitRow>(text).all(...args);

      return rows.map((row) => ({
        url: row.url,
        title: row.title,
        domain: row.domain || extractHostFromURL(row.url),
        visitTime: decodeTimestamp(row.visit_time),
      }));
    });
  }

  /**
   * Visit counts per host, summed from each URL's visit counter.
   * The ignore list is matched against the host.
   * @param limit - Maximum number of domains, 0 for all
   */
  getDomainStats(limit: number, filter: SearchFilter): DomainStats[] {
    return this.run('fetch domain stats', () => {
      const counts = new Map<string, number>();
      for (const [host, count] of this.fetchHostCounts()) {
        if (shouldIgnore(host, filter.ignoreDomains)) {
          continue;
        }
        counts.set(host, (counts.get(host) ?? 0) + count);
      }

      const stats = [...counts].map(([domain, visitCount]) => ({ domain, visitCount }));
      stats.sort((a, b) => b.visitCount - a.visitCount);

      return limit > 0 ? stats.slice(0, limit) : stats;
    });
  }

  /**
   * Visit counts grouped by base domain.
   * A host is dropped when the ignore list matches either its base domain or the host itself.
   * @param domainLimit - Maximum number of base domains, 0 for all
   * @param pathLimit - Maximum number of hosts listed per base domain, 0 for all
   */
  getHierarchicalDomainStats(
    domainLimit: number,
    pathLimit: number,
    filter: SearchFilter
  ): HierarchicalDomainStats[] {
    return this.run('fetch hierarchical domain stats', () => {
      const kept = this.fetchHostCounts().filter(
        ([host]) =>
          !shouldIgnore(extractBaseDomain(host), filter.ignoreDomains) &&
          !shouldIgnore(host, filter.ignoreDomains)
      );

      const groups = groupHierarchical(kept);
      const limited = domainLimit > 0 ? groups.slice(0, domainLimit) : groups;
      if (pathLimit <= 0) {
        return limited;
      }

      return limited.map((group) => ({
        ...group,
        subdomains: group.subdomains.slice(0, pathLimit),
      }));
    });
  }

  /**
   * Visits per hour of day (UTC), always 24 entries
   */
  getHourlyStats(filter: SearchFilter): HourlyStats[] {
    return this.run('fetch hourly stats', () => {
      const counts = new Array<number>(24).fill(0);
      for (const visitTime of this.fetchVisitTimes(filter)) {
        counts[visitTime.getUTCHours()]++;
      }
      return counts.map((visitCount, hour) => ({ hour, visitCount }));
    });
  }

  /**
   * Visits per calendar date within the last `days` days, newest date first
   * @param now - Reference time for the lookback window
   */
  getDailyStats(days: number, filter: SearchFilter, now: Date = new Date()): DailyStats[] {
    return this.run('fetch daily stats', () => {
      const cutoff = now.getTime() - days * DAY_MS;
      const counts = new Map<string, number>();

      for (const visitTime of this.fetchVisitTimes(filter)) {
        if (visitTime.getTime() > cutoff) {
          const date = formatDate(visitTime);
          counts.set(date, (counts.get(date) ?? 0) + 1);
        }
      }

      const stats = [...counts].map(([date, visitCount]) => ({ date, visitCount }));
      stats.sort((a, b) => (a.date < b.date ? 1 : a.date > b.date ? -1 : 0));
      return stats;
    });
  }

  /**
   * Number of visits in the database, unfiltered
   */
  getTotalVisits(): number {
    return this.run('count visits', () => {
      const row = this.db.prepare<unknown[], CountRow>(TOTAL_COUNT_QUERY).get();
      return row?.count ?? 0;
    });
  }

  /**
   * Number of visits matching the filter
   */
  getFilteredCount(filter: SearchFilter): number {
    return this.run('count filtered visits', () => {
      const { text, args } = new QueryBuilder(FILTERED_COUNT_BASE_QUERY).withFilter(filter).build();
      const row = this.db.prepare<unknown[], CountRow>(text).get(...args);
      return row?.count ?? 0;
    });
  }

  /**
   * Close the database connection
   */
  close(): void {
    try {
      this.db.close();
      this.logger.debug('History database closed');
    } catch (error) {
      this.logger.error('Failed to close history database', toError(error));
      throw error;
    }
  }

  /**
   * (host, visit counter) for every history item; URLs without a host count as unknown
   */
  private fetchHostCounts(): Array<[string, number]> {
    const rows = this.db.prepare<unknown[], ItemCountRow>(ITEM_COUNTS_QUERY).all();
    return rows.map((row) => [extractHostFromURL(row.url) || UNKNOWN_DOMAIN, row.visit_count]);
  }

  private fetchVisitTimes(filter: SearchFilter): Date[] {
    const { text, args } = new QueryBuilder(VISIT_TIME_BASE_QUERY).withFilter(filter).build();
    const rows = this.db.prepare<unknown[], VisitTimeRow>(text).all(...args);
    return rows.map((row) => decodeTimestamp(row.visit_time));
  }

  /**
   * Run one aggregation; store errors are logged and rethrown with the operation name
   */
  private run<T>(operation: string, query: () => T): T {
    this.logger.debug(`Running query: ${operation}`);
    try {
      return query();
    } catch (error) {
      const err = toError(error);
      this.logger.error(`Failed to ${operation}`, err);
      throw new Error(`Failed to ${operation}: ${err.message}`, { cause: err });
    }
  }
}
