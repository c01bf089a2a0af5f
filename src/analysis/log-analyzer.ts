/**
 * Offline analysis of captured logcat output
 */

import { promises as fs } from 'fs';
import { ParseError, errnoCode, errorMessage } from '../errors';

export type LogPriority = 'V' | 'D' | 'I' | 'W' | 'E' | 'F';

export type LevelName = 'Verbose' | 'Debug' | 'Info' | 'Warn' | 'Error' | 'Fatal';

const PRIORITY_LEVELS: Record<LogPriority, LevelName> = {
  V: 'Verbose',
  D: 'Debug',
  I: 'Info',
  W: 'Warn',
  E: 'Error',
  F: 'Fatal'
};

/**
 * Levels from least to most severe
 */
export const SEVERITY_ORDER: readonly LevelName[] = ['Verbose', 'Debug', 'Info', 'Warn', 'Error', 'Fatal'];

export const DEFAULT_TOP_N = 10;

// MM-DD HH:MM:SS.mmm, optionally prefixed by the year (logcat -v year)
const TIMESTAMP = String.raw`((?:\d{4}-)?\d{2}-\d{2} \d{2}:\d{2}:\d{2}\.\d{3})`;

// <timestamp> [<pid> <tid>] <L> <tag>: <message>
const THREADTIME_LINE = new RegExp(
  String.raw`^${TIMESTAMP}\s+(?:(\d+)\s+(\d+)\s+)?(\S)\s+([^:\s][^:]*?)\s*:\s?(.*)$`
);

// <timestamp> <L>/<tag>( <pid>): <message>
const TIME_LINE = new RegExp(
  String.raw`^${TIMESTAMP}\s+(\S)\/([^(:\s][^(:]*?)\s*(?:\(\s*(\d+)\))?\s*:\s?(.*)$`
);

const CRASH_MARKER = /FATAL EXCEPTION|ANR in|java\.lang\./i;

export interface LogRecord {
  timestamp: string;
  pid?: number;
  tid?: number;
  level: LevelName;
  tag: string;
  message: string;
}

export type ParsedLine =
  | { kind: 'structured'; raw: string; record: LogRecord }
  | { kind: 'unstructured'; raw: string };

export interface TagCount {
  tag: string;
  count: number;
}

export interface OffenderCount {
  tag: string;
  errors: number;
  fatals: number;
  total: number;
}

export interface LogSummary {
  readonly totalLines: number;
  readonly structuredLines: number;
  readonly unstructuredLines: number;
  /** Lines mentioning a fatal exception, an ANR or a java.lang exception */
  readonly crashMarkers: number;
  readonly levels: Readonly<Record<LevelName, number>>;
  /** Every tag seen, in first-seen order */
  readonly tags: readonly TagCount[];
  readonly topTags: readonly TagCount[];
  /** Tags ranked by Error + Fatal lines; tags without any are left out */
  readonly topOffenders: readonly OffenderCount[];
}

export interface LogAnalyzerOptions {
  top?: number;
}

function isPriority(value: string): value is LogPriority {
  return Object.prototype.hasOwnProperty.call(PRIORITY_LEVELS, value);
}

function toNumber(value: string | undefined): number | undefined {
  return value === undefined ? undefined : parseInt(value, 10);
}

/**
 * Decompose one log line; anything that does not fit a known layout, or that
 * carries an unknown priority letter, comes back unstructured.
 */
export function parseLogLine(raw: string): ParsedLine {
  const threadtime = raw.match(THREADTIME_LINE);
  if (threadtime) {
    const [, timestamp, pid, tid, priority, tag, message] = threadtime;
    if (!isPriority(priority)) {
      return { kind: 'unstructured', raw };
    }
    return {
      kind: 'structured',
      raw,
      record: {
        timestamp,
        pid: toNumber(pid),
        tid: toNumber(tid),
        level: PRIORITY_LEVELS[priority],
        tag,
        message
      }
    };
  }

  const time = raw.match(TIME_LINE);
  if (time) {
    const [, timestamp, priority, tag, pid, message] = time;
    if (!isPriority(priority)) {
      return { kind: 'unstructured', raw };
    }
    return {
      kind: 'structured',
      raw,
      record: {
        timestamp,
        pid: toNumber(pid),
        level: PRIORITY_LEVELS[priority],
        tag,
        message
      }
    };
  }

  return { kind: 'unstructured', raw };
}

/**
 * Split file content into lines without inventing an empty last line.
 * A leading byte order mark is dropped.
 */
export function splitLines(content: string): string[] {
  const lines = content.replace(/^\uFEFF/, '').split(/\r?\n/);
  if (lines.length > 0 && lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
}

interface TagTally {
  tag: string;
  total: number;
  errors: number;
  fatals: number;
}

/**
 * Builds LogSummary values from captured log lines
 */
export class LogAnalyzer {
  private readonly top: number;

  constructor(options: LogAnalyzerOptions = {}) {
    const top = options.top ?? DEFAULT_TOP_N;
    if (!Number.isInteger(top) || top < 1) {
      throw new RangeError(`top must be a positive integer, got ${top}`);
    }
    this.top = top;
  }

  analyzeLines(lines: Iterable<string>): LogSummary {
    const levels: Record<LevelName, number> = {
      Verbose: 0,
      Debug: 0,
      Info: 0,
      Warn: 0,
      Error: 0,
      Fatal: 0
    };
    const tallies = new Map<string, TagTally>();
    let totalLines = 0;
    let structuredLines = 0;
    let crashMarkers = 0;

    for (const line of lines) {
      totalLines++;
      if (CRASH_MARKER.test(line)) {
        crashMarkers++;
      }

      const parsed = parseLogLine(line);
      if (parsed.kind === 'unstructured') {
        continue;
      }

      structuredLines++;
      const { level, tag } = parsed.record;
      levels[level]++;

      let tally = tallies.get(tag);
      if (!tally) {
        tally = { tag, total: 0, errors: 0, fatals: 0 };
        tallies.set(tag, tally);
      }
      tally.total++;
      if (level === 'Error') {
        tally.errors++;
      } else if (level === 'Fatal') {
        tally.fatals++;
      }
    }

    // Map iteration keeps first-seen order and Array.prototype.sort is stable,
    // so equal counts stay in the order their tags first appeared.
    const seen = [...tallies.values()];
    const tags = seen.map(t => ({ tag: t.tag, count: t.total }));
    const topTags = [...tags].sort((a, b) => b.count - a.count).slice(0, this.top);
    const topOffenders = seen
      .filter(t => t.errors + t.fatals > 0)
      .sort((a, b) => (b.errors + b.fatals) - (a.errors + a.fatals))
      .slice(0, this.top)
      .map(t => ({ tag: t.tag, errors: t.errors, fatals: t.fatals, total: t.total }));

    return Object.freeze({
      totalLines,
      structuredLines,
      unstructuredLines: totalLines - structuredLines,
      crashMarkers,
      levels: Object.freeze(levels),
      tags: Object.freeze(tags),
      topTags: Object.freeze(topTags),
      topOffenders: Object.freeze(topOffenders)
    });
  }

  /**
   * Read a captured log file and summarize it. Fails only when the file
   * cannot be read.
   */
  async analyzeFile(path: string): Promise<LogSummary> {
    let content: string;
    try {
      content = await fs.readFile(path, 'utf-8');
    } catch (error) {
      throw new ParseError(path, errnoCode(error) === 'ENOENT' ? 'file not found' : errorMessage(error));
    }
    return this.analyzeLines(splitLines(content));
  }
}
