import { LogAnalyzer } from '../log-analyzer';
import { buildReport, renderTextReport, reportToJson } from '../log-report';

const SAMPLE = [
  '01-01 00:00:01.000 E ActivityManager: crash',
  '01-01 00:00:02.000 I Zygote: ok',
  'garbage'
];

const ANALYZED_AT = new Date('2025-01-02T03:04:05.000Z');

describe('log report', () => {
  const summary = new LogAnalyzer().analyzeLines(SAMPLE);

  it('should stamp the report with the given time', () => {
    expect(buildReport('app.log', summary, ANALYZED_AT).analyzedAt).toBe('2025-01-02T03:04:05.000Z');
  });

  it('should render the text report', () => {
    const lines = renderTextReport(buildReport('app.log', summary, ANALYZED_AT));

    expect(lines).toEqual([
      'Log analysis: app.log',
      'Analyzed at: 2025-01-02T03:04:05.000Z',
      '',
      'Lines: 3 total, 2 structured, 1 unstructured',
      'Crash markers: 0',
      '',
      'Levels:',
      '  Verbose  0',
      '  Debug    0',
      '  Info     1',
      '  Warn     0',
      '  Error    1',
      '  Fatal    0',
      '',
      'Tags:',
      '  ActivityManager  1',
      '  Zygote           1',
      '',
      'Top tags:',
      '  ActivityManager  1',
      '  Zygote           1',
      '',
      'Top offenders (error+fatal):',
      '  ActivityManager  1 (E 1, F 0)'
    ]);
  });

  it('should render empty sections as (none)', () => {
    const empty = new LogAnalyzer().analyzeLines(['garbage']);
    const lines = renderTextReport(buildReport('empty.log', empty, ANALYZED_AT));

    expect(lines.slice(-5)).toEqual(['Top tags:', '  (none)', '', 'Top offenders (error+fatal):', '  (none)']);
  });

  it('should list every tag count in text, beyond the top tags', () => {
    const many = new LogAnalyzer({ top: 2 }).analyzeLines([
      '01-01 00:00:01.000 I Alpha: m',
      '01-01 00:00:02.000 I Alpha: m',
      '01-01 00:00:03.000 I Beta: m',
      '01-01 00:00:04.000 I Gamma: m',
      '01-01 00:00:05.000 I Delta: m'
    ]);
    const report = buildReport('many.log', many, ANALYZED_AT);
    const lines = renderTextReport(report);
    const tagsAt = lines.indexOf('Tags:');

    expect(reportToJson(report).topTags).toHaveLength(2);
    expect(lines.slice(tagsAt, tagsAt + 5)).toEqual([
      'Tags:',
      '  Alpha  2',
      '  Beta   1',
      '  Gamma  1',
      '  Delta  1'
    ]);
    for (const { tag, count } of reportToJson(report).tags) {
      expect(lines).toContain(`  ${tag.padEnd(5)}  ${count}`);
    }
  });

  it('should carry the same counts in JSON', () => {
    const json = reportToJson(buildReport('app.log', summary, ANALYZED_AT));

    expect(json).toEqual({
      file: 'app.log',
      analyzedAt: '2025-01-02T03:04:05.000Z',
      lines: { total: 3, structured: 2, unstructured: 1 },
      crashMarkers: 0,
      levels: { Verbose: 0, Debug: 0, Info: 1, Warn: 0, Error: 1, Fatal: 0 },
      tags: [
        { tag: 'ActivityManager', count: 1 },
        { tag: 'Zygote', count: 1 }
      ],
      topTags: [
        { tag: 'ActivityManager', count: 1 },
        { tag: 'Zygote', count: 1 }
      ],
      topOffenders: [{ tag: 'ActivityManager', errors: 1, fatals: 0, total: 1 }]
    });
  });

  it('should give JSON that serializes to a parseable document', () => {
    const json = reportToJson(buildReport('app.log', summary, ANALYZED_AT));

    expect(JSON.parse(JSON.stringify(json))).toEqual(json);
  });
});
