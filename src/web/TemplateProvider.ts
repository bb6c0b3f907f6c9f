/**
 * Server-rendered HTML for the dashboard pages.
 * The server receives a TemplateProvider instance, so pages can be swapped in tests.
 */

import { DailyStats, DomainStats, HierarchicalDomainStats, Visit } from '../domain/models/types';
import { formatFull } from '../utils/DateFormatter';
import { truncateTitle } from '../services/ReportWriter';
import { NO_TITLE } from '../utils/constants';

export interface DashboardView {
  totalVisits: number;
  domainStats: DomainStats[];
  recentVisits: Visit[];
  dailyStats: DailyStats[];
  days: number;
}

/**
 * Filter values echoed back into the search form and paging links
 */
export interface HistoryQuery {
  q: string;
  domain: string;
  from: string;
  to: string;
}

export interface HistoryPageView {
  visits: Visit[];
  matching: number;
  currentPage: number;
  totalPages: number;
  query: HistoryQuery;
}

export interface DomainsView {
  groups: HierarchicalDomainStats[];
}

export interface TemplateProvider {
  dashboard(view: DashboardView): string;
  history(view: HistoryPageView): string;
  domains(view: DomainsView): string;
}

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, (ch) => HTML_ESCAPES[ch] ?? ch);
}

/**
 * Share of `max` as a percentage, 0 when max is 0
 */
export function percentage(count: number, max: number): number {
  return max === 0 ? 0 : (count / max) * 100;
}

function barRow(label: string, count: number, max: number): string {
  return `<tr><td>${escapeHtml(label)}</td><td class="bar-cell"><div class="bar" style="width: ${percentage(
    count,
    max
  ).toFixed(1)}%"></div></td><td class="count">${count}</td></tr>`;
}

/**
 * Only http(s) URLs become links; javascript:, data: and the like stay plain text
 */
export function isLinkable(url: string): boolean {
  return /^https?:\/\//i.test(url);
}

function visitRow(visit: Visit, titleLength: number): string {
  const title = escapeHtml(truncateTitle(visit.title, titleLength));
  const fullTitle = escapeHtml(visit.title || NO_TITLE);
  const link = isLinkable(visit.url)
    ? `<a href="${escapeHtml(visit.url)}" title="${fullTitle}">${title}</a>`
    : `<span title="${fullTitle}">${title}</span> <code>${escapeHtml(visit.url)}</code>`;
  return [
    '<tr>',
    `<td class="time">${escapeHtml(formatFull(visit.visitTime))}</td>`,
    `<td>${link}</td>`,
    `<td class="domain">${escapeHtml(visit.domain)}</td>`,
    '</tr>',
  ].join('');
}

function historyLink(query: HistoryQuery, page: number): string {
  const params = new URLSearchParams();
  for (const [key, value] of Object.entries(query)) {
    if (value) {
      params.set(key, value);
    }
  }
  params.set('page', String(page));
  return `/history?${escapeHtml(params.toString())}`;
}

/**
 * Default page templates
 */
export class HtmlTemplates implements TemplateProvider {
  private layout(title: string, body: string): string {
    return `<!DOCTYPE html>
<html lang="en">
<head>
<meta charset="utf-8">
<title>${escapeHtml(title)} - History Lens</title>
<link rel="stylesheet" href="/static/style.css">
</head>
<body>
<nav><a href="/">Dashboard</a> <a href="/history">History</a> <a href="/domains">Domains</a></nav>
<main>
<h1>${escapeHtml(title)}</h1>
${body}
</main>
</body>
</html>
`;
  }

  dashboard(view: DashboardView): string {
    const maxDomain = view.domainStats.reduce((max, s) => Math.max(max, s.visitCount), 0);
    const maxDaily = view.dailyStats.reduce((max, s) => Math.max(max, s.visitCount), 0);

    const body = [
      `<p class="total">Total visits: <strong>${view.totalVisits}</strong></p>`,
      '<h2>Top domains</h2>',
      view.domainStats.length === 0
        ? '<p class="empty">No domains</p>'
        : `<table class="chart">${view.domainStats.map((s) => barRow(s.domain, s.visitCount, maxDomain)).join('\n')}</table>`,
      '<h2>Recent visits</h2>',
      view.recentVisits.length === 0
        ? '<p class="empty">No history</p>'
        : `<table class="visits">${view.recentVisits.map((v) => visitRow(v, 60)).join('\n')}</table>`,
      `<h2>Last ${view.days} days</h2>`,
      view.dailyStats.length === 0
        ? '<p class="empty">No visits in this period</p>'
        : `<table class="chart">${view.dailyStats.map((s) => barRow(s.date, s.visitCount, maxDaily)).join('\n')}</table>`,
    ].join('\n');

    return this.layout('Dashboard', body);
  }

  history(view: HistoryPageView): string {
    const { query } = view;
    const form = `<form method="get" action="/history">
<input type="search" name="q" placeholder="Keyword" value="${escapeHtml(query.q)}">
<input type="text" name="domain" placeholder="Domain" value="${escapeHtml(query.domain)}">
<input type="date" name="from" value="${escapeHtml(query.from)}">
<input type="date" name="to" value="${escapeHtml(query.to)}">
<button type="submit">Search</button>
</form>`;

    const pager = [
      view.currentPage > 1 ? `<a class="prev" href="${historyLink(query, view.currentPage - 1)}">Previous</a>` : '',
      `<span class="page">Page ${view.currentPage} of ${view.totalPages}</span>`,
      view.currentPage < view.totalPages
        ? `<a class="next" href="${historyLink(query, view.currentPage + 1)}">Next</a>`
        : '',
    ].join(' ');

    const body = [
      form,
      `<p class="matching">${view.matching} visits</p>`,
      view.visits.length === 0
        ? '<p class="empty">No history</p>'
        : `<table class="visits">${view.visits.map((v) => visitRow(v, 80)).join('\n')}</table>`,
      `<div class="pager">${pager}</div>`,
    ].join('\n');

    return this.layout('History', body);
  }

  domains(view: DomainsView): string {
    const max = view.groups.reduce((m, g) => Math.max(m, g.totalCount), 0);
    const rows = view.groups.map((group) => {
      const subRows = group.hasSubdomains
        ? group.subdomains
            .map((s) => `<tr class="sub"><td>${escapeHtml(s.subdomain)}</td><td></td><td class="count">${s.count}</td></tr>`)
            .join('\n')
        : '';
      return barRow(group.baseDomain, group.totalCount, max) + (subRows ? `\n${subRows}` : '');
    });

    const body =
      view.groups.length === 0 ? '<p class="empty">No domains</p>' : `<table class="chart">${rows.join('\n')}</table>`;
    return this.layout('Domains', body);
  }
}
