import chalk from "chalk";

// Verbosity levels. A message is printed when the configured level is at least its severity.
export const Severity = {
  FATAL: 2,
  WARN: 4,
  INFO: 5,
  VERBOSE: 6,
  DEBUG: 7,
} as const;

export type SeverityName = Lowercase<keyof typeof Severity>;

export const DEFAULT_LOG_LEVEL: number = Severity.INFO;

type Sink = (line: string) => void;

/**
 * Console logger with a fixed verbosity, handed to every component explicitly.
 */
export class Logger {
  readonly level: number;
  private readonly sink: Sink;

  constructor(level: number = DEFAULT_LOG_LEVEL, sink: Sink = (line) => console.log(line)) {
    this.level = level;
    this.sink = sink;
  }

  fatal(message: string): void {
    this.write("fatal", message, chalk.red);
  }

  warn(message: string): void {
    this.write("warn", message, chalk.yellow);
  }

  info(message: string): void {
    this.write("info", message, chalk.green);
  }

  verbose(message: string): void {
    this.write("verbose", message, chalk.gray);
  }

  debug(message: string): void {
    this.write("debug", message, chalk.gray);
  }

  enabled(severity: SeverityName): boolean {
    return this.level >= Severity[toKey(severity)];
  }

  private write(severity: SeverityName, message: string, paint: (text: string) => string): void {
    if (!this.enabled(severity)) {
      return;
    }
    this.sink(paint(`[${severity}] ${message}`));
  }
}

function toKey(severity: SeverityName): keyof typeof Severity {
  switch (severity) {
    case "fatal":
      return "FATAL";
    case "warn":
      return "WARN";
    case "info":
      return "INFO";
    case "verbose":
      return "VERBOSE";
    case "debug":
      return "DEBUG";
  }
}

// Logger used by tests and library callers that want no output.
export const silentLogger = new Logger(0);
