/**
 * JSON API routes
 */

import { Router, Request, Response } from 'express';
import { AppContext } from '../context';
import { BadRequestError, historyQuery, queryInt, queryString, toFilter } from '../query';
import { toError } from '../../services/LoggingService';
import { AnalysisResult, emptyFilter } from '../../domain/models/types';
import { DEFAULT_DOMAIN_LIMIT, DEFAULT_PATH_LIMIT, WEB_PAGE_SIZE } from '../../utils/constants';

export function createApiRouter(ctx: AppContext): Router {
  const router = Router();
  const { history, ignoreDomains, logger } = ctx;

  function fail(res: Response, error: unknown): void {
    const err = toError(error);
    if (err instanceof BadRequestError) {
      res.status(400).json({ error: err.message });
      return;
    }
    logger.error('API request failed', err);
    res.status(500).json({ error: err.message });
  }

  /**
   * Total visits, top domains and hourly distribution; daily counts when ?days= is given
   */
  router.get('/stats', (req: Request, res: Response) => {
    try {
      const filter = { ...emptyFilter(), ignoreDomains };
      const result: AnalysisResult = {
        totalVisits: history.getTotalVisits(),
        domainStats: history.getDomainStats(queryInt(req, 'limit', DEFAULT_DOMAIN_LIMIT), filter),
        hourlyStats: history.getHourlyStats(filter),
      };

      if (queryString(req, 'days') !== '') {
        result.dailyStats = history.getDailyStats(queryInt(req, 'days', 0), filter);
      }

      res.json(result);
    } catch (error) {
      fail(res, error);
    }
  });

  /**
   * Filtered visits, newest first
   */
  router.get('/history', (req: Request, res: Response) => {
    try {
      const filter = toFilter(historyQuery(req), ignoreDomains);
      // limit=0 falls back to the default page size
      const limit = queryInt(req, 'limit', WEB_PAGE_SIZE) || WEB_PAGE_SIZE;
      const offset = queryInt(req, 'offset', 0);

      res.json({
        visits: history.getRecentVisits(limit, filter, offset),
        matching: history.getFilteredCount(filter),
        limit,
        offset,
      });
    } catch (error) {
      fail(res, error);
    }
  });

  router.get('/domains', (req: Request, res: Response) => {
    try {
      const filter = { ...emptyFilter(), ignoreDomains };
      res.json(
        history.getHierarchicalDomainStats(
          queryInt(req, 'limit', DEFAULT_DOMAIN_LIMIT),
          queryInt(req, 'paths', DEFAULT_PATH_LIMIT),
          filter
        )
      );
    } catch (error) {
      fail(res, error);
    }
  });

  router.get('/health', (req: Request, res: Response) => {
    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
    });
  });

  return router;
}
