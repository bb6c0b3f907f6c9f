import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import axios from 'axios';
import Database from 'better-sqlite3';
import { Server } from 'http';
import { createApp, startServer, AppOptions } from '../index';
import { HistoryService } from '../../services/HistoryService';
import { createLogger } from '../../services/LoggingService';
import { TemplateProvider } from '../../web/TemplateProvider';
import { createHistoryDb } from '../../__tests__/helpers/historyFixture';

describe('History dashboard server', () => {
  const logger = createLogger('ServerTest', { silent: true });
  let db: Database.Database;
  let server: Server | null = null;

  async function serve(options: Partial<AppOptions> = {}): Promise<string> {
    const app = createApp({ history: new HistoryService(db, logger), logger, ...options });
    server = await startServer(app, 0, logger);
    const address = server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('Server has no TCP address');
    }
    return `http://localhost:${address.port}`;
  }

  function get(url: string) {
    return axios.get(url, { validateStatus: () => true });
  }

  beforeEach(() => {
    db = createHistoryDb();
  });

  afterEach((done) => {
    db.close();
    if (server) {
      server.close(() => done());
      server = null;
    } else {
      done();
    }
  });

  describe('JSON API', () => {
    it('should answer health checks', async () => {
      const base = await serve();

      const response = await get(`${base}/api/health`);

      expect(response.status).toBe(200);
      expect(response.data.status).toBe('ok');
    });

    it('should return totals with domain and hourly stats', async () => {
      const base = await serve();

      const { status, data } = await get(`${base}/api/stats`);

      expect(status).toBe(200);
      expect(data.totalVisits).toBe(5);
      expect(data.domainStats[0]).toEqual({ domain: 'youtube.com', visitCount: 25 });
      expect(data.hourlyStats).toHaveLength(24);
      expect(data).not.toHaveProperty('dailyStats');
    });

    it('should reject a malformed days parameter', async () => {
      const base = await serve();

      const { status, data } = await get(`${base}/api/stats?days=abc`);

      expect(status).toBe(400);
      expect(data).toEqual({ error: 'Invalid days: abc' });
    });

    it('should reject a limit beyond the safe integer range', async () => {
      const base = await serve();

      const { status, data } = await get(`${base}/api/history?limit=99999999999999999999`);

      expect(status).toBe(400);
      expect(data).toEqual({ error: 'Invalid limit: 99999999999999999999' });
    });

    it('should page through history newest first', async () => {
      const base = await serve();

      const { data } = await get(`${base}/api/history?limit=2&offset=1`);

      expect(data.matching).toBe(5);
      expect(data.limit).toBe(2);
      expect(data.offset).toBe(1);
      expect(data.visits.map((v: { title: string }) => v.title)).toEqual(['GitHub - Another Page', 'Google Search']);
      expect(data.visits[0].visitTime).toBe('2025-01-02T10:00:00.000Z');
    });

    it('should filter history by domain and date', async () => {
      const base = await serve();

      const byDomain = await get(`${base}/api/history?domain=youtube`);
      const byDate = await get(`${base}/api/history?from=2025-01-02`);

      expect(byDomain.data.matching).toBe(2);
      expect(byDate.data.matching).toBe(2);
    });

    it('should reject malformed dates', async () => {
      const base = await serve();

      const { status, data } = await get(`${base}/api/history?from=bad`);

      expect(status).toBe(400);
      expect(data).toEqual({ error: 'Invalid date format (expected YYYY-MM-DD): bad' });
    });

    it('should return hierarchical domains', async () => {
      const base = await serve();

      const { data } = await get(`${base}/api/domains?limit=2`);

      expect(data.map((g: { baseDomain: string }) => g.baseDomain)).toEqual(['youtube.com', 'google.com']);
    });

    it('should apply the instance ignore list to every view', async () => {
      const base = await serve({ ignoreDomains: ['youtube'] });

      const stats = await get(`${base}/api/stats`);
      const history = await get(`${base}/api/history`);
      const domains = await get(`${base}/api/domains`);

      expect(stats.data.domainStats.map((s: { domain: string }) => s.domain)).toEqual([
        'google.com',
        'github.com',
        'example.com',
      ]);
      expect(history.data.matching).toBe(3);
      expect(domains.data).toHaveLength(3);
    });

    it('should answer 500 with the store error', async () => {
      const base = await serve();
      db.exec('DROP TABLE history_visits');

      const { status, data } = await get(`${base}/api/stats`);

      expect(status).toBe(500);
      expect(data).toEqual({ error: 'Failed to count visits: no such table: history_visits' });
    });

    it('should answer 404 for unknown routes', async () => {
      const base = await serve();

      expect((await get(`${base}/api/unknown`)).status).toBe(404);
    });
  });

  describe('pages', () => {
    it('should render the dashboard', async () => {
      const base = await serve();

      const { status, data, headers } = await get(`${base}/`);

      expect(status).toBe(200);
      expect(headers['content-type']).toMatch(/^text\/html/);
      expect(data).toContain('Total visits: <strong>5</strong>');
      expect(data).toContain('<td>youtube.com</td>');
      expect(data).toContain('YouTube - Music');
    });

    it('should escape search terms echoed into the history page', async () => {
      const base = await serve();

      const { data } = await get(`${base}/history?q=${encodeURIComponent('<script>')}`);

      expect(data).toContain('value="&lt;script&gt;"');
      expect(data).toContain('<p class="matching">0 visits</p>');
      expect(data).not.toContain('<script>');
    });

    it('should clamp the page number', async () => {
      const base = await serve();

      const { data } = await get(`${base}/history?page=9`);

      expect(data).toContain('Page 1 of 1');
      expect(data).toContain('<p class="matching">5 visits</p>');
    });

    it('should render the domains page', async () => {
      const base = await serve();

      const { data } = await get(`${base}/domains`);

      expect(data).toContain('<td>google.com</td>');
    });

    it('should use an injected template provider', async () => {
      const templates: TemplateProvider = {
        dashboard: (view) => `total=${view.totalVisits} recent=${view.recentVisits.length}`,
        history: (view) => `page=${view.currentPage}/${view.totalPages}`,
        domains: (view) => `groups=${view.groups.length}`,
      };
      const base = await serve({ templates });

      expect((await get(`${base}/`)).data).toBe('total=5 recent=5');
      expect((await get(`${base}/history`)).data).toBe('page=1/1');
      expect((await get(`${base}/domains`)).data).toBe('groups=4');
    });

    it('should answer plain-text 500 on store errors', async () => {
      const base = await serve();
      db.exec('DROP TABLE history_visits');

      const { status, data } = await get(`${base}/`);

      expect(status).toBe(500);
      expect(data).toBe('Failed to count visits: no such table: history_visits');
    });
  });

  describe('static files', () => {
    let staticDir: string;

    beforeEach(() => {
      staticDir = fs.mkdtempSync(path.join(os.tmpdir(), 'history-static-'));
      fs.writeFileSync(path.join(staticDir, 'style.css'), 'body { margin: 0; }');
    });

    afterEach(() => {
      fs.rmSync(staticDir, { recursive: true, force: true });
    });

    it('should serve files from the static directory', async () => {
      const base = await serve({ staticDir });

      const { status, data } = await get(`${base}/static/style.css`);

      expect(status).toBe(200);
      expect(data).toBe('body { margin: 0; }');
    });
  });
});
