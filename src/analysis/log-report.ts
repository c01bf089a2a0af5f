import { LevelName, LogSummary, SEVERITY_ORDER } from './log-analyzer';

export interface LogReport {
  file: string;
  analyzedAt: string;
  summary: LogSummary;
}

export interface LogReportJson {
  file: string;
  analyzedAt: string;
  lines: {
    total: number;
    structured: number;
    unstructured: number;
  };
  crashMarkers: number;
  levels: Record<LevelName, number>;
  tags: Array<{ tag: string; count: number }>;
  topTags: Array<{ tag: string; count: number }>;
  topOffenders: Array<{ tag: string; errors: number; fatals: number; total: number }>;
}

export function buildReport(file: string, summary: LogSummary, now: Date = new Date()): LogReport {
  return { file, analyzedAt: now.toISOString(), summary };
}

export function reportToJson(report: LogReport): LogReportJson {
  const { summary } = report;
  return {
    file: report.file,
    analyzedAt: report.analyzedAt,
    lines: {
      total: summary.totalLines,
      structured: summary.structuredLines,
      unstructured: summary.unstructuredLines
    },
    crashMarkers: summary.crashMarkers,
    levels: { ...summary.levels },
    tags: summary.tags.map(t => ({ ...t })),
    topTags: summary.topTags.map(t => ({ ...t })),
    topOffenders: summary.topOffenders.map(o => ({ ...o }))
  };
}

function column(entries: Array<[string, string]>): string[] {
  if (entries.length === 0) {
    return ['  (none)'];
  }
  const width = Math.max(...entries.map(([name]) => name.length));
  return entries.map(([name, value]) => `  ${name.padEnd(width)}  ${value}`);
}

/**
 * Plain-text rendering of a report, one entry per line
 */
export function renderTextReport(report: LogReport): string[] {
  const { summary } = report;

  return [
    `Log analysis: ${report.file}`,
    `Analyzed at: ${report.analyzedAt}`,
    '',
    `Lines: ${summary.totalLines} total, ${summary.structuredLines} structured, ${summary.unstructuredLines} unstructured`,
    `Crash markers: ${summary.crashMarkers}`,
    '',
    'Levels:',
    ...column(SEVERITY_ORDER.map(level => [level, String(summary.levels[level])])),
    '',
    'Tags:',
    ...column(summary.tags.map(t => [t.tag, String(t.count)])),
    '',
    'Top tags:',
    ...column(summary.topTags.map(t => [t.tag, String(t.count)])),
    '',
    'Top offenders (error+fatal):',
    ...column(summary.topOffenders.map(o => [o.tag, `${o.errors + o.fatals} (E ${o.errors}, F ${o.fatals})`]))
  ];
}
