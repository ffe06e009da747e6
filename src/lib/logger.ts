/**
 * Logger for kvmlab
 *
 * Severity-tagged diagnostics: trace, info, success and warning go to
 * stdout; error and fatal go to stderr. Trace output is only written in
 * verbose mode.
 */

/**
 * Log level for messages
 */
export type LogLevel = 'trace' | 'info' | 'success' | 'warning' | 'error' | 'fatal';

/**
 * Minimal writable sink (process.stdout, process.stderr, or a test buffer)
 */
export interface LogSink {
  write(chunk: string): unknown;
}

/**
 * Options for constructing a Logger
 */
export interface LoggerOptions {
  /** Emit trace messages (default: false) */
  verbose?: boolean;
  /** Sink for trace/info/success/warning (default: process.stdout) */
  stdout?: LogSink;
  /** Sink for error/fatal (default: process.stderr) */
  stderr?: LogSink;
}

const SYMBOLS: Record<LogLevel, string> = {
  trace: '·',
  info: '',
  success: '✓',
  warning: '⚠',
  error: '✗',
  fatal: '✗',
};

/**
 * Logger class for human-readable output.
 */
export class Logger {
  private readonly verbose: boolean;
  private readonly stdout: LogSink;
  private readonly stderr: LogSink;
  private indentLevel: number = 0;

  constructor(options: LoggerOptions = {}) {
    this.verbose = options.verbose ?? false;
    this.stdout = options.stdout ?? process.stdout;
    this.stderr = options.stderr ?? process.stderr;
  }

  /**
   * Whether trace messages are emitted.
   */
  isVerbose(): boolean {
    return this.verbose;
  }

  /**
   * Increase indent level for nested output.
   */
  indent(): void {
    this.indentLevel++;
  }

  /**
   * Decrease indent level.
   */
  dedent(): void {
    if (this.indentLevel > 0) {
      this.indentLevel--;
    }
  }

  /**
   * Log a trace message (verbose mode only).
   */
  trace(message: string): void {
    if (this.verbose) {
      this.emit('trace', message);
    }
  }

  /**
   * Log an info message.
   */
  info(message: string): void {
    this.emit('info', message);
  }

  /**
   * Log a success message.
   */
  success(message: string): void {
    this.emit('success', message);
  }

  /**
   * Log a warning message.
   */
  warning(message: string): void {
    this.emit('warning', message);
  }

  /**
   * Log an error message.
   */
  error(message: string, suggestion?: string): void {
    this.emit('error', message);
    if (suggestion) {
      this.stderr.write(`${this.getIndent()}  Fix: ${suggestion}\n`);
    }
  }

  /**
   * Log a fatal message. The caller is responsible for ending the process.
   */
  fatal(message: string, suggestion?: string): void {
    this.emit('fatal', message);
    if (suggestion) {
      this.stderr.write(`${this.getIndent()}  Fix: ${suggestion}\n`);
    }
  }

  /**
   * Write text verbatim to stdout (command output such as JSON documents).
   */
  print(text: string): void {
    this.stdout.write(text.endsWith('\n') ? text : `${text}\n`);
  }

  /**
   * Log a table of data.
   */
  table(headers: string[], rows: string[][], options: { heading?: boolean } = {}): void {
    const { heading = true } = options;

    // Calculate column widths
    const widths = headers.map((h, i) => {
      const maxRowWidth = Math.max(0, ...rows.map((r) => (r[i] ?? '').length));
      return Math.max(heading ? h.length : 0, maxRowWidth);
    });

    const format = (cells: string[]): string =>
      cells
        .map((cell, i) => (i === cells.length - 1 ? cell : cell.padEnd(widths[i] ?? 0)))
        .join('  ')
        .trimEnd();

    if (heading) {
      this.print(`${this.getIndent()}${format(headers)}`);
    }
    for (const row of rows) {
      this.print(`${this.getIndent()}${format(row)}`);
    }
  }

  /**
   * Print a blank line.
   */
  newline(): void {
    this.stdout.write('\n');
  }

  private getIndent(): string {
    return '  '.repeat(this.indentLevel);
  }

  private emit(level: LogLevel, message: string): void {
    const symbol = SYMBOLS[level];
    const line = `${this.getIndent()}${symbol ? `${symbol} ` : ''}${message}\n`;
    if (level === 'error' || level === 'fatal') {
      this.stderr.write(line);
    } else {
      this.stdout.write(line);
    }
  }

  /**
   * Create a logger from CLI options.
   */
  static fromOptions(options: { verbose?: boolean }): Logger {
    return new Logger({ verbose: options.verbose === true });
  }
}

/**
 * Logger sink that records everything written to it.
 */
export class BufferSink implements LogSink {
  private readonly chunks: string[] = [];

  write(chunk: string): boolean {
    this.chunks.push(chunk);
    return true;
  }

  /**
   * All text written so far.
   */
  text(): string {
    return this.chunks.join('');
  }

  /**
   * Written text split into lines, without the trailing empty line.
   */
  lines(): string[] {
    const text = this.text();
    if (text === '') {
      return [];
    }
    return text.replace(/\n$/, '').split('\n');
  }
}
