/**
 * Core type definitions for the history analyzer
 */

/**
 * A single browsing event read from the history store
 */
export interface Visit {
  url: string;
  title: string;
  domain: string;
  visitTime: Date;
}

/**
 * Search and filter criteria shared by every read path.
 * Empty strings and `null` dates mean "no constraint".
 */
export interface SearchFilter {
  keyword: string;
  domain: string;
  from: Date | null;
  to: Date | null;
  ignoreDomains: readonly string[];
}

/**
 * Visit count for one domain
 */
export interface DomainStats {
  domain: string;
  visitCount: number;
}

/**
 * One hostname inside a base-domain bucket
 */
export interface SubdomainStats {
  subdomain: string;
  count: number;
}

/**
 * Visit counts grouped by base domain
 */
export interface HierarchicalDomainStats {
  baseDomain: string;
  totalCount: number;
  hasSubdomains: boolean;
  subdomains: SubdomainStats[];
}

/**
 * Visit count for one hour of the day (0-23, UTC)
 */
export interface HourlyStats {
  hour: number;
  visitCount: number;
}

/**
 * Visit count for one calendar date (YYYY-MM-DD, UTC)
 */
export interface DailyStats {
  date: string;
  visitCount: number;
}

/**
 * Everything a report can contain. Sections that were not requested stay undefined.
 */
export interface AnalysisResult {
  totalVisits: number;
  recentVisits?: Visit[];
  domainStats?: DomainStats[];
  hierarchicalDomainStats?: HierarchicalDomainStats[];
  hourlyStats?: HourlyStats[];
  dailyStats?: DailyStats[];
}

/**
 * Report sections selectable from the command line
 */
export interface ReportSections {
  history: boolean;
  domains: boolean;
  hierarchical: boolean;
  hourly: boolean;
  daily: boolean;
}

export type OutputFormat = 'text' | 'json' | 'csv' | 'tsv';

/**
 * Fully resolved configuration for a one-shot report run
 */
export interface ReportConfig {
  limit: number;
  domainLimit: number;
  pathLimit: number;
  days: number;
  sections: ReportSections;
  filter: SearchFilter;
  format: OutputFormat;
  outputFile: string | null;
}

/**
 * Value bound to a `?` placeholder
 */
export type QueryArg = string | number;

/**
 * Final SQL text plus its positional arguments
 */
export interface BuiltQuery {
  text: string;
  args: QueryArg[];
}

/**
 * Logging levels
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

/**
 * Returns a filter with every field empty
 */
export function emptyFilter(): SearchFilter {
  return {
    keyword: '',
    domain: '',
    from: null,
    to: null,
    ignoreDomains: [],
  };
}
