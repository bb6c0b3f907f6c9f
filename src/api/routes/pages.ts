/**
 * HTML page routes: dashboard, paged history and domain breakdown
 */

import { Router, Request, Response } from 'express';
import { AppContext } from '../context';
import { BadRequestError, historyQuery, queryInt, toFilter } from '../query';
import { toError } from '../../services/LoggingService';
import { emptyFilter } from '../../domain/models/types';
import {
  DEFAULT_DOMAIN_LIMIT,
  DEFAULT_PATH_LIMIT,
  WEB_DASHBOARD_RECENT_VISITS,
  WEB_DEFAULT_DAYS,
  WEB_PAGE_SIZE,
} from '../../utils/constants';

export function createPagesRouter(ctx: AppContext): Router {
  const router = Router();
  const { history, templates, ignoreDomains, logger } = ctx;

  function fail(res: Response, error: unknown): void {
    const err = toError(error);
    if (err instanceof BadRequestError) {
      res.status(400).type('text/plain').send(err.message);
      return;
    }
    logger.error('Page render failed', err);
    res.status(500).type('text/plain').send(err.message);
  }

  /**
   * Dashboard: totals, top domains, latest visits and recent daily activity
   */
  router.get('/', (req: Request, res: Response) => {
    try {
      const filter = { ...emptyFilter(), ignoreDomains };
      const html = templates.dashboard({
        totalVisits: history.getTotalVisits(),
        domainStats: history.getDomainStats(DEFAULT_DOMAIN_LIMIT, filter),
        recentVisits: history.getRecentVisits(WEB_DASHBOARD_RECENT_VISITS, filter),
        dailyStats: history.getDailyStats(WEB_DEFAULT_DAYS, filter),
        days: WEB_DEFAULT_DAYS,
      });
      res.type('html').send(html);
    } catch (error) {
      fail(res, error);
    }
  });

  /**
   * Paged history. The page count follows the filtered visit count.
   */
  router.get('/history', (req: Request, res: Response) => {
    try {
      const query = historyQuery(req);
      const filter = toFilter(query, ignoreDomains);

      const matching = history.getFilteredCount(filter);
      const totalPages = Math.max(1, Math.ceil(matching / WEB_PAGE_SIZE));
      // out-of-range pages are clamped
      const currentPage = Math.min(Math.max(queryInt(req, 'page', 1), 1), totalPages);

      const visits = history.getRecentVisits(WEB_PAGE_SIZE, filter, (currentPage - 1) * WEB_PAGE_SIZE);
      res.type('html').send(templates.history({ visits, matching, currentPage, totalPages, query }));
    } catch (error) {
      fail(res, error);
    }
  });

  router.get('/domains', (req: Request, res: Response) => {
    try {
      const filter = { ...emptyFilter(), ignoreDomains };
      const groups = history.getHierarchicalDomainStats(
        queryInt(req, 'limit', DEFAULT_DOMAIN_LIMIT),
        queryInt(req, 'paths', DEFAULT_PATH_LIMIT),
        filter
      );
      res.type('html').send(templates.domains({ groups }));
    } catch (error) {
      fail(res, error);
    }
  });

  return router;
}
