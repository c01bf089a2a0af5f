/**
 * Output Formatter - Handles consistent formatting and display of CLI output
 */

import { DeviceInfo, Settings } from '../interfaces/common';

/**
 * ANSI color codes for terminal output
 */
const COLORS = {
  reset: '\x1b[0m',
  bright: '\x1b[1m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  cyan: '\x1b[36m',
  gray: '\x1b[90m'
};

/**
 * Device state color mapping
 */
const STATE_COLORS: Record<DeviceInfo['state'], string> = {
  device: COLORS.green,
  offline: COLORS.gray,
  unauthorized: COLORS.yellow
};

/**
 * Handles formatting and display of CLI output
 */
export class OutputFormatter {
  private colorEnabled: boolean = true;
  private quiet = false;
  private verbose = false;

  constructor(colorEnabled: boolean = true) {
    this.colorEnabled = colorEnabled && process.stdout.isTTY === true;
  }

  /**
   * Quiet hides success and info lines; verbose shows debug lines
   */
  setVerbosity(options: { quiet?: boolean; verbose?: boolean }): void {
    this.quiet = options.quiet === true;
    this.verbose = options.verbose === true && !this.quiet;
  }

  /**
   * Apply color to text if colors are enabled
   */
  private colorize(text: string, color: string): string {
    return this.colorEnabled ? `${color}${text}${COLORS.reset}` : text;
  }

  success(message: string): void {
    if (!this.quiet) {
      console.log(this.colorize('✓ ', COLORS.green) + message);
    }
  }

  error(message: string): void {
    console.error(this.colorize('✗ ', COLORS.red) + this.colorize(message, COLORS.red));
  }

  warn(message: string): void {
    console.warn(this.colorize('⚠ ', COLORS.yellow) + this.colorize(message, COLORS.yellow));
  }

  info(message: string): void {
    if (!this.quiet) {
      console.log(this.colorize('ℹ ', COLORS.blue) + message);
    }
  }

  /**
   * Debug lines go to stderr so stdout stays parseable
   */
  debug(message: string): void {
    if (this.verbose) {
      console.error(this.colorize(message, COLORS.gray));
    }
  }

  /**
   * Print command output verbatim; printed even in quiet mode
   */
  plain(text: string): void {
    if (text.length > 0) {
      console.log(text);
    }
  }

  /**
   * Print a block of lines, blank lines included
   */
  lines(lines: string[]): void {
    console.log(lines.join('\n'));
  }

  /**
   * Pass device output through untouched
   */
  raw(text: string): void {
    process.stdout.write(text);
  }

  json(value: unknown): void {
    console.log(JSON.stringify(value, null, 2));
  }

  /**
   * Display a table of data
   */
  displayTable(headers: string[], rows: string[][]): void {
    if (rows.length === 0) {
      this.info('(empty)');
      return;
    }

    // Calculate column widths
    const columnWidths = headers.map((header, index) => {
      const maxRowWidth = Math.max(...rows.map(row => (row[index] || '').length));
      return Math.max(header.length, maxRowWidth);
    });

    const headerRow = headers.map((header, index) =>
      this.colorize(header.padEnd(columnWidths[index]), COLORS.bright)
    ).join(' | ');
    console.log(headerRow);

    const separator = columnWidths.map(width => '─'.repeat(width)).join('─┼─');
    console.log(this.colorize(separator, COLORS.gray));

    rows.forEach(row => {
      const formattedRow = row.map((cell, index) =>
        (cell || '').padEnd(columnWidths[index])
      ).join(' | ');
      console.log(formattedRow);
    });
  }

  /**
   * Display a record as a two-column key/value table
   */
  displayRecord(record: Record<string, string>): void {
    const entries = Object.entries(record);
    const width = Math.max(...entries.map(([key]) => key.length));
    entries.forEach(([key, value]) => {
      console.log(`${this.colorize(key.padEnd(width), COLORS.bright)}  ${value}`);
    });
  }

  /**
   * Display list of devices
   */
  displayDevices(devices: DeviceInfo[]): void {
    if (devices.length === 0) {
      this.info('No devices found');
      return;
    }

    const headers = ['SERIAL', 'STATE', 'MODEL', 'ANDROID', 'SDK', 'TRANSPORT'];
    const widths = headers.map((header, index) => {
      const cells = devices.map(d => [d.serial, d.state, d.model, d.android, d.sdk, d.transportId][index] || '');
      return Math.max(header.length, ...cells.map(cell => cell.length));
    });

    console.log(headers.map((h, i) => this.colorize(h.padEnd(widths[i]), COLORS.bright)).join(' | '));
    console.log(this.colorize(widths.map(w => '─'.repeat(w)).join('─┼─'), COLORS.gray));

    devices.forEach(device => {
      const state = this.colorize(device.state.padEnd(widths[1]), STATE_COLORS[device.state]);
      const cells = [
        this.colorize(device.serial.padEnd(widths[0]), COLORS.cyan),
        state,
        (device.model || '').padEnd(widths[2]),
        (device.android || '').padEnd(widths[3]),
        (device.sdk || '').padEnd(widths[4]),
        (device.transportId || '').padEnd(widths[5])
      ];
      console.log(cells.join(' | '));
    });

    console.log(`Total: ${devices.length} device(s)`);
  }

  /**
   * Display effective settings and where each came from
   */
  displaySettings(settings: Settings, configPath: string): void {
    console.log(`\n${this.colorize('Effective Configuration:', COLORS.bright)}`);
    console.log(this.colorize('─'.repeat(50), COLORS.gray));
    console.log(`  Config file:     ${configPath}`);
    console.log(`  adb:             ${settings.adbPath ?? '(search PATH and Android SDK)'}${this.source(settings.sources.adbPath)}`);
    console.log(`  Serial:          ${settings.serial ?? '(auto)'}${this.source(settings.sources.serial)}`);
    console.log(`  Timeout:         ${settings.timeoutSeconds}s${this.source(settings.sources.timeoutSeconds)}`);
    console.log(`  Logs dir:        ${settings.logsDir}${this.source(settings.sources.logsDir)}`);
    console.log(`  Screenshots dir: ${settings.screenshotsDir}${this.source(settings.sources.screenshotsDir)}`);
    console.log(`  Log file:        ${settings.logFile}${this.source(settings.sources.logFile)}`);
  }

  private source(source: string | undefined): string {
    return source ? this.colorize(` [${source}]`, COLORS.gray) : '';
  }
}
