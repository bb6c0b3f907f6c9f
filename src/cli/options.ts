/**
 * Command-line option parsing for the report mode
 */

import { OutputFormat, ReportConfig, ReportSections, SearchFilter } from '../domain/models/types';
import { parseDateInput } from '../utils/DateFormatter';

/**
 * Options as commander hands them over; numbers are still strings
 */
export interface RawReportOptions {
  json?: boolean;
  csv?: boolean;
  tsv?: boolean;
  output?: string;
  limit: string;
  domains: string;
  paths: string;
  days: string;
  history?: boolean;
  domainStats?: boolean;
  hierarchical?: boolean;
  hourly?: boolean;
  daily?: boolean;
  all?: boolean;
  search?: string;
  domain?: string;
  from?: string;
  to?: string;
  /** false when --no-ignore is given */
  ignore: boolean;
}

/**
 * Parse a whole, non-negative number
 * @param flag - Option name used in the error message
 */
export function parseCount(value: string, flag: string): number {
  const trimmed = value.trim();
  const parsed = parseInt(trimmed, 10);
  if (!/^\d+$/.test(trimmed) || !Number.isSafeInteger(parsed)) {
    throw new Error(`Invalid value for ${flag}: ${value} (expected a non-negative integer)`);
  }
  return parsed;
}

export function parsePort(value: string): number {
  const port = parseCount(value, '--port');
  if (port < 1 || port > 65535) {
    throw new Error(`Invalid value for --port: ${value} (expected 1-65535)`);
  }
  return port;
}

function resolveSections(raw: RawReportOptions): ReportSections {
  if (raw.all) {
    return { history: true, domains: true, hierarchical: true, hourly: true, daily: true };
  }

  const sections: ReportSections = {
    history: raw.history ?? false,
    domains: raw.domainStats ?? false,
    hierarchical: raw.hierarchical ?? false,
    hourly: raw.hourly ?? false,
    daily: raw.daily ?? false,
  };

  // history is the default view
  if (!Object.values(sections).some(Boolean)) {
    sections.history = true;
  }
  return sections;
}

function resolveFormat(raw: RawReportOptions): OutputFormat {
  if (raw.json) {
    return 'json';
  }
  if (raw.csv) {
    return 'csv';
  }
  if (raw.tsv) {
    return 'tsv';
  }
  return 'text';
}

/**
 * Build the search filter shared by every output mode
 * @param ignoreList - Patterns loaded from the ignore file; dropped when --no-ignore is set
 */
export function buildFilter(
  raw: Pick<RawReportOptions, 'search' | 'domain' | 'from' | 'to' | 'ignore'>,
  ignoreList: readonly string[]
): SearchFilter {
  const from = raw.from ? parseDateInput(raw.from) : null;
  const to = raw.to ? parseDateInput(raw.to) : null;

  return {
    keyword: raw.search ?? '',
    domain: raw.domain ?? '',
    from,
    to,
    ignoreDomains: raw.ignore ? [...ignoreList] : [],
  };
}

/**
 * Validate raw options and produce the report configuration
 * @throws Error for malformed numbers or dates
 */
export function parseReportOptions(raw: RawReportOptions, ignoreList: readonly string[]): ReportConfig {
  return {
    limit: parseCount(raw.limit, '--limit'),
    domainLimit: parseCount(raw.domains, '--domains'),
    pathLimit: parseCount(raw.paths, '--paths'),
    days: parseCount(raw.days, '--days'),
    sections: resolveSections(raw),
    filter: buildFilter(raw, ignoreList),
    format: resolveFormat(raw),
    outputFile: raw.output ?? null,
  };
}
