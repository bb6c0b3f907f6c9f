import inquirer from 'inquirer';
import { HistoryService } from '../services/HistoryService';
import { LoggingService, toError } from '../services/LoggingService';
import { SearchFilter, Visit, emptyFilter } from '../domain/models/types';
import { formatFull, formatShort } from '../utils/DateFormatter';
import {
  DEFAULT_PAGE_SIZE,
  MAX_TITLE_LENGTH,
  MIN_PAGE_SIZE,
  NO_TITLE,
  SEPARATOR_WIDTH,
} from '../utils/constants';
import { truncateTitle } from '../services/ReportWriter';

export interface HistoryBrowserOptions {
  /** Visits per page; derived from the terminal height when omitted */
  pageSize?: number;
  /** Terminal width used for titles and separators */
  width?: number;
  ignoreDomains?: readonly string[];
}

export interface PageState {
  visits: Visit[];
  matching: number;
  total: number;
  error: string | null;
}

type Action = 'search' | 'clear' | 'next' | 'prev' | 'reload' | 'quit';

function defaultPageSize(): number {
  const rows = process.stdout.rows;
  return rows ? Math.max(MIN_PAGE_SIZE, rows - 10) : DEFAULT_PAGE_SIZE;
}

/**
 * Prompt-driven history browser: page through visits, search, open details
 */
export class HistoryBrowser {
  private history: HistoryService;
  private logger: LoggingService;
  private pageSize: number;
  private width: number;
  private filter: SearchFilter;
  private page = 0;

  constructor(history: HistoryService, logger: LoggingService, options: HistoryBrowserOptions = {}) {
    this.history = history;
    this.logger = logger;
    this.pageSize = Math.max(MIN_PAGE_SIZE, options.pageSize ?? defaultPageSize());
    this.width = options.width ?? process.stdout.columns ?? 80;
    this.filter = { ...emptyFilter(), ignoreDomains: options.ignoreDomains ?? [] };
  }

  /**
   * Run the browse loop until the user quits
   */
  async start(): Promise<void> {
    while (true) {
      const state = this.load();
      console.log(this.renderPage(state));

      const { choice } = await inquirer.prompt<{ choice: string }>([
        {
          type: 'list',
          name: 'choice',
          message: 'Select a visit or an action',
          pageSize: this.pageSize + 8,
          choices: this.buildChoices(state),
        },
      ]);

      const visit = this.selectedVisit(choice, state.visits);
      if (visit) {
        console.log(this.renderDetail(visit));
        await this.waitForKeypress();
        continue;
      }

      if (choice === 'quit') {
        return;
      }
      await this.handleAction(choice);
    }
  }

  /**
   * Current page of visits plus the counts shown in the footer
   */
  load(): PageState {
    try {
      return {
        visits: this.history.getRecentVisits(this.pageSize, this.filter, this.page * this.pageSize),
        matching: this.history.getFilteredCount(this.filter),
        total: this.history.getTotalVisits(),
        error: null,
      };
    } catch (error) {
      const err = toError(error);
      this.logger.debug(`Browser load failed: ${err.message}`);
      return { visits: [], matching: 0, total: 0, error: err.message };
    }
  }

  renderPage(state: PageState): string {
    const rule = '─'.repeat(Math.min(SEPARATOR_WIDTH, this.width));
    const lines = ['', 'History Browser', rule, ''];

    if (state.error !== null) {
      lines.push(`Error: ${state.error}`);
      return lines.join('\n');
    }

    if (this.filter.keyword) {
      lines.push(`Searching: "${this.filter.keyword}"`, '');
    }

    if (state.visits.length === 0) {
      lines.push('No history found');
    }

    lines.push('', rule);
    lines.push(`Page ${this.page + 1}/${this.pageCount(state.matching)}  Matching: ${state.matching}  Total visits: ${state.total}`);
    return lines.join('\n');
  }

  renderDetail(visit: Visit): string {
    const rule = '─'.repeat(Math.min(SEPARATOR_WIDTH, this.width));
    return [
      '',
      'Visit Detail',
      rule,
      '',
      `Title: ${visit.title || NO_TITLE}`,
      `URL: ${visit.url}`,
      `Domain: ${visit.domain}`,
      `Visited: ${formatFull(visit.visitTime)}`,
      '',
      rule,
    ].join('\n');
  }

  getFilter(): SearchFilter {
    return this.filter;
  }

  getPage(): number {
    return this.page;
  }

  private buildChoices(state: PageState) {
    const titleLength = Math.max(10, Math.min(MAX_TITLE_LENGTH, this.width - 20));
    const visitChoices = state.visits.map((visit, index) => ({
      name: `${formatShort(visit.visitTime)}  ${truncateTitle(visit.title, titleLength)}${
        visit.domain ? `  (${visit.domain})` : ''
      }`,
      value: `visit:${index}`,
    }));

    const actions: Array<{ name: string; value: Action }> = [{ name: 'Search', value: 'search' }];
    if (this.filter.keyword) {
      actions.push({ name: 'Clear search', value: 'clear' });
    }
    if ((this.page + 1) * this.pageSize < state.matching) {
      actions.push({ name: 'Next page', value: 'next' });
    }
    if (this.page > 0) {
      actions.push({ name: 'Previous page', value: 'prev' });
    }
    actions.push({ name: 'Reload', value: 'reload' }, { name: 'Quit', value: 'quit' });

    return [...visitChoices, new inquirer.Separator(), ...actions];
  }

  private selectedVisit(choice: string, visits: Visit[]): Visit | undefined {
    if (!choice.startsWith('visit:')) {
      return undefined;
    }
    return visits[Number(choice.slice('visit:'.length))];
  }

  private async handleAction(choice: string): Promise<void> {
    switch (choice) {
      case 'search': {
        const { keyword } = await inquirer.prompt<{ keyword: string }>([
          {
            type: 'input',
            name: 'keyword',
            message: 'Search (URL or title):',
            default: this.filter.keyword,
          },
        ]);
        this.filter = { ...this.filter, keyword: keyword.trim() };
        this.page = 0;
        break;
      }
      case 'clear':
        this.filter = { ...this.filter, keyword: '' };
        this.page = 0;
        break;
      case 'next':
        this.page++;
        break;
      case 'prev':
        this.page = Math.max(0, this.page - 1);
        break;
      case 'reload':
        break;
      default:
        this.logger.warn(`Unknown browser action: ${choice}`);
    }
  }

  private pageCount(matching: number): number {
    return Math.max(1, Math.ceil(matching / this.pageSize));
  }

  private async waitForKeypress(): Promise<void> {
    await inquirer.prompt([
      {
        type: 'input',
        name: 'continue',
        message: 'Press Enter to return to the list...',
      },
    ]);
  }
}
