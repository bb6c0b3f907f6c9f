import { HistoryService } from '../services/HistoryService';
import { LoggingService } from '../services/LoggingService';
import { TemplateProvider } from '../web/TemplateProvider';

/**
 * Dependencies shared by every route of one server instance
 */
export interface AppContext {
  history: HistoryService;
  templates: TemplateProvider;
  /** Applied to every view served by this instance */
  ignoreDomains: readonly string[];
  logger: LoggingService;
}
