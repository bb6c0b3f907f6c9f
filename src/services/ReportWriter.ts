/**
 * Renders an AnalysisResult as a text report, JSON, CSV or TSV
 */

import * as fs from 'fs';
import * as path from 'path';
import { AnalysisResult, OutputFormat, ReportSections } from '../domain/models/types';
import { formatDateTime, formatFull } from '../utils/DateFormatter';
import { BAR_CHART_WIDTH, NO_TITLE, TITLE_TRUNCATE_LENGTH } from '../utils/constants';
import { LoggingService } from './LoggingService';

const HEAVY_RULE = '━'.repeat(40);
const LIGHT_RULE = '─'.repeat(41);

export type Delimiter = ',' | '\t';

function bar(count: number, max: number): string {
  if (max <= 0) {
    return '';
  }
  return '█'.repeat(Math.floor((count / max) * BAR_CHART_WIDTH));
}

function maxOf(counts: number[]): number {
  return counts.reduce((max, n) => (n > max ? n : max), 0);
}

export function truncateTitle(title: string, maxLength: number = TITLE_TRUNCATE_LENGTH): string {
  const text = title || NO_TITLE;
  return text.length > maxLength ? `${text.slice(0, maxLength - 3)}...` : text;
}

/**
 * Human-readable report with bar charts. Empty sections are skipped.
 */
export function renderText(result: AnalysisResult, sections: ReportSections): string {
  const lines: string[] = ['', 'Browser History Report', HEAVY_RULE, `Total visits: ${result.totalVisits}`, ''];

  const visits = result.recentVisits ?? [];
  if (sections.history && visits.length > 0) {
    lines.push('Recent visits', LIGHT_RULE);
    for (const visit of visits) {
      lines.push(`  ${formatDateTime(visit.visitTime)}  ${truncateTitle(visit.title)}`);
      if (visit.domain) {
        lines.push(`                    @ ${visit.domain}`);
      }
    }
    lines.push('');
  }

  const domains = result.domainStats ?? [];
  if (sections.domains && domains.length > 0) {
    const max = maxOf(domains.map((s) => s.visitCount));
    lines.push(`Visits by domain (Top ${domains.length})`, LIGHT_RULE);
    for (const s of domains) {
      lines.push(`  ${s.domain.padEnd(20)} ${bar(s.visitCount, max)} ${s.visitCount}`);
    }
    lines.push('');
  }

  const groups = result.hierarchicalDomainStats ?? [];
  if (sections.hierarchical && groups.length > 0) {
    const max = maxOf(groups.map((g) => g.totalCount));
    lines.push(`Visits by site (Top ${groups.length})`, LIGHT_RULE);
    for (const group of groups) {
      lines.push(`  ${group.baseDomain.padEnd(20)} ${bar(group.totalCount, max)} ${group.totalCount}`);
      if (group.hasSubdomains) {
        for (const sub of group.subdomains) {
          lines.push(`      ${sub.subdomain.padEnd(30)} ${sub.count}`);
        }
      }
    }
    lines.push('');
  }

  const hourly = result.hourlyStats ?? [];
  if (sections.hourly && hourly.length > 0) {
    const max = maxOf(hourly.map((s) => s.visitCount));
    lines.push('Visits by hour (UTC)', LIGHT_RULE);
    for (const s of hourly) {
      lines.push(`  ${s.hour.toString().padStart(2, '0')}:00  ${bar(s.visitCount, max)} ${s.visitCount}`);
    }
    lines.push('');
  }

  const daily = result.dailyStats ?? [];
  if (sections.daily && daily.length > 0) {
    const max = maxOf(daily.map((s) => s.visitCount));
    lines.push(`Visits by day (${daily.length} days)`, LIGHT_RULE);
    for (const s of daily) {
      lines.push(`  ${s.date}  ${bar(s.visitCount, max)} ${s.visitCount}`);
    }
    lines.push('');
  }

  return lines.join('\n') + '\n';
}

export function renderJson(result: AnalysisResult): string {
  return JSON.stringify(result, null, 2) + '\n';
}

/**
 * Quote a field when it contains the delimiter, a quote or a line break
 */
export function escapeField(value: string, delimiter: Delimiter): string {
  if (value.includes(delimiter) || value.includes('"') || value.includes('\n') || value.includes('\r')) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

/**
 * One header row per section, sections separated by a blank line
 */
export function renderDelimited(
  result: AnalysisResult,
  sections: ReportSections,
  delimiter: Delimiter
): string {
  const blocks: string[][][] = [];

  const visits = result.recentVisits ?? [];
  if (sections.history && visits.length > 0) {
    blocks.push([
      ['visit_time', 'title', 'domain', 'url'],
      ...visits.map((v) => [formatFull(v.visitTime), v.title, v.domain, v.url]),
    ]);
  }

  const domains = result.domainStats ?? [];
  if (sections.domains && domains.length > 0) {
    blocks.push([['domain', 'visit_count'], ...domains.map((s) => [s.domain, String(s.visitCount)])]);
  }

  const groups = result.hierarchicalDomainStats ?? [];
  if (sections.hierarchical && groups.length > 0) {
    const rows = groups.flatMap((g) =>
      g.subdomains.map((sub) => [g.baseDomain, String(g.totalCount), sub.subdomain, String(sub.count)])
    );
    blocks.push([['base_domain', 'total_count', 'host', 'visit_count'], ...rows]);
  }

  const hourly = result.hourlyStats ?? [];
  if (sections.hourly && hourly.length > 0) {
    blocks.push([
      ['hour', 'visit_count'],
      ...hourly.map((s) => [`${s.hour.toString().padStart(2, '0')}:00`, String(s.visitCount)]),
    ]);
  }

  const daily = result.dailyStats ?? [];
  if (sections.daily && daily.length > 0) {
    blocks.push([['date', 'visit_count'], ...daily.map((s) => [s.date, String(s.visitCount)])]);
  }

  return blocks
    .map((rows) => rows.map((row) => row.map((f) => escapeField(f, delimiter)).join(delimiter) + '\n').join(''))
    .join('\n');
}

export function render(result: AnalysisResult, sections: ReportSections, format: OutputFormat): string {
  switch (format) {
    case 'json':
      return renderJson(result);
    case 'csv':
      return renderDelimited(result, sections, ',');
    case 'tsv':
      return renderDelimited(result, sections, '\t');
    case 'text':
      return renderText(result, sections);
  }
}

/**
 * ReportWriter sends a rendered report to stdout or a file
 */
export class ReportWriter {
  private logger: LoggingService;
  private stdout: NodeJS.WritableStream;

  constructor(logger: LoggingService, stdout: NodeJS.WritableStream = process.stdout) {
    this.logger = logger;
    this.stdout = stdout;
  }

  /**
   * @param outputFile - Destination path, or null for stdout
   */
  write(
    result: AnalysisResult,
    sections: ReportSections,
    format: OutputFormat,
    outputFile: string | null
  ): void {
    const output = render(result, sections, format);

    if (outputFile === null) {
      this.stdout.write(output);
      return;
    }

    const dir = path.dirname(outputFile);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
    fs.writeFileSync(outputFile, output, 'utf-8');
    this.logger.info(`Report written: ${outputFile}`);
  }
}
