/**
 * Query-string parsing shared by the page and JSON routes
 */

import { Request } from 'express';
import { SearchFilter } from '../domain/models/types';
import { parseDateInput } from '../utils/DateFormatter';
import { HistoryQuery } from '../web/TemplateProvider';

/**
 * A request parameter that cannot be used; answered with 400
 */
export class BadRequestError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'BadRequestError';
  }
}

/**
 * Single string value of a query parameter; repeated or nested values count as absent
 */
export function queryString(req: Request, name: string): string {
  const value = req.query[name];
  return typeof value === 'string' ? value.trim() : '';
}

/**
 * Non-negative integer parameter
 * @throws BadRequestError when present but not a whole number, or beyond Number.MAX_SAFE_INTEGER
 */
export function queryInt(req: Request, name: string, defaultValue: number): number {
  const value = queryString(req, name);
  if (value === '') {
    return defaultValue;
  }
  const parsed = parseInt(value, 10);
  if (!/^\d+$/.test(value) || !Number.isSafeInteger(parsed)) {
    throw new BadRequestError(`Invalid ${name}: ${value}`);
  }
  return parsed;
}

export function historyQuery(req: Request): HistoryQuery {
  return {
    q: queryString(req, 'q'),
    domain: queryString(req, 'domain'),
    from: queryString(req, 'from'),
    to: queryString(req, 'to'),
  };
}

/**
 * @throws BadRequestError for malformed dates
 */
export function toFilter(query: HistoryQuery, ignoreDomains: readonly string[]): SearchFilter {
  try {
    return {
      keyword: query.q,
      domain: query.domain,
      from: query.from ? parseDateInput(query.from) : null,
      to: query.to ? parseDateInput(query.to) : null,
      ignoreDomains,
    };
  } catch (error) {
    throw new BadRequestError(error instanceof Error ? error.message : String(error));
  }
}
