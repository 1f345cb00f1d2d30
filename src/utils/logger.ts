/**
 * Console logger for edr-profile-gen
 *
 * Prefixes each message with a symbol for its category, colors it unless
 * disabled, and honors quiet/verbose modes. Errors always go to stderr.
 */

export interface LoggerOptions {
  quiet: boolean;
  verbose: boolean;
  noColor: boolean;
  timestamps: boolean;
}

const DEFAULT_OPTIONS: LoggerOptions = {
  quiet: false,
  verbose: false,
  noColor: false,
  timestamps: false,
};

const COLORS = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  cyan: '\x1b[36m',
} as const;

type Color = keyof typeof COLORS;

export class Logger {
  private options: LoggerOptions;

  constructor(options: Partial<LoggerOptions> = {}) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  configure(options: Partial<LoggerOptions>): void {
    this.options = { ...this.options, ...options };
  }

  getOptions(): LoggerOptions {
    return { ...this.options };
  }

  private paint(color: Color, text: string): string {
    if (this.options.noColor) return text;
    return `${COLORS[color]}${text}${COLORS.reset}`;
  }

  private stamp(line: string): string {
    if (!this.options.timestamps) return line;
    return `[${new Date().toISOString()}] ${line}`;
  }

  private out(line: string): void {
    if (this.options.quiet) return;
    console.log(this.stamp(line));
  }

  /** Reading or locating inputs */
  discovery(message: string): void {
    this.out(`${this.paint('blue', '🔍')} ${message}`);
  }

  /** Synthesis and verification steps */
  analysis(message: string): void {
    this.out(`${this.paint('cyan', '🔬')} ${message}`);
  }

  success(message: string): void {
    this.out(`${this.paint('green', '✓')} ${message}`);
  }

  warning(message: string): void {
    this.out(`${this.paint('yellow', '⚠')} ${message}`);
  }

  error(message: string): void {
    console.error(this.stamp(`${this.paint('red', '✗')} ${message}`));
  }

  debug(message: string): void {
    if (!this.options.verbose) return;
    this.out(`${this.paint('dim', '→')} ${message}`);
  }

  section(title: string): void {
    this.out(this.paint('bold', `=== ${title} ===`));
  }

  info(key: string, value: string | number | boolean): void {
    this.out(`  ${this.paint('dim', `${key}:`)} ${value}`);
  }

  listItem(text: string, indent = 0): void {
    this.out(`${'  '.repeat(indent)}• ${text}`);
  }

  blank(): void {
    if (this.options.quiet) return;
    console.log('');
  }
}

export const logger = new Logger();

export function configureLogger(options: Partial<LoggerOptions>): void {
  logger.configure(options);
}

export default logger;
