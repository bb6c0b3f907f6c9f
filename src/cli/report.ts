import { AnalysisResult, ReportConfig } from '../domain/models/types';
import { HistoryService } from '../services/HistoryService';

/**
 * Run the aggregations selected in the config. Unselected sections stay undefined.
 * @param now - Reference time for the daily lookback window
 */
export function collectAnalysis(
  history: HistoryService,
  config: ReportConfig,
  now: Date = new Date()
): AnalysisResult {
  const { sections, filter } = config;
  const result: AnalysisResult = { totalVisits: history.getTotalVisits() };

  if (sections.history) {
    result.recentVisits = history.getRecentVisits(config.limit, filter);
  }
  if (sections.domains) {
    result.domainStats = history.getDomainStats(config.domainLimit, filter);
  }
  if (sections.hierarchical) {
    result.hierarchicalDomainStats = history.getHierarchicalDomainStats(config.domainLimit, config.pathLimit, filter);
  }
  if (sections.hourly) {
    result.hourlyStats = history.getHourlyStats(filter);
  }
  if (sections.daily) {
    result.dailyStats = history.getDailyStats(config.days, filter, now);
  }

  return result;
}
