import { LOG_PREFIX } from "../constants";

export type LogLevel = "info" | "warn" | "error" | "debug";
export type LogOutputFn = (message: string, level: LogLevel) => void;

export interface LoggerOptions {
  prefix?: string;
  debug?: boolean;
  outputFn?: LogOutputFn;
}

/**
 * Build-log style output: `ci: <message>` on stdout, `ci: error: <message>` on stderr.
 */
export class Logger {
  private prefix: string;
  private debugEnabled: boolean;
  private outputFn?: LogOutputFn;

  constructor(options: LoggerOptions = {}) {
    this.prefix = options.prefix ?? LOG_PREFIX;
    this.debugEnabled = options.debug ?? false;
    this.outputFn = options.outputFn;
  }

  private label(level: LogLevel): string {
    switch (level) {
      case "info":
        return `${this.prefix}: `;
      case "warn":
        return `${this.prefix}: warning: `;
      case "error":
        return `${this.prefix}: error: `;
      case "debug":
        return `${this.prefix}: debug: `;
    }
  }

  debug(message: string, ...args: unknown[]): void {
    if (!this.debugEnabled) return;
    const formattedMessage = this.label("debug") + this.formatMessage(message, args);
    if (this.outputFn) {
      this.outputFn(formattedMessage, "debug");
    } else {
      console.log(formattedMessage);
    }
  }

  info(message: string, ...args: unknown[]): void {
    const formattedMessage = this.label("info") + this.formatMessage(message, args);
    if (this.outputFn) {
      this.outputFn(formattedMessage, "info");
    } else {
      console.log(formattedMessage);
    }
  }

  warn(message: string, ...args: unknown[]): void {
    const formattedMessage = this.label("warn") + this.formatMessage(message, args);
    if (this.outputFn) {
      this.outputFn(formattedMessage, "warn");
    } else {
      console.warn(formattedMessage);
    }
  }

  error(message: string, error?: Error | unknown): void {
    let formattedMessage = this.label("error") + message;
    if (error instanceof Error) {
      formattedMessage += ` ${error.message}`;
    } else if (error) {
      formattedMessage += ` ${String(error)}`;
    }
    if (this.outputFn) {
      this.outputFn(formattedMessage, "error");
    } else {
      console.error(formattedMessage);
    }
  }

  table(content: string): void {
    const formattedMessage = "\n" + content + "\n";
    if (this.outputFn) {
      this.outputFn(formattedMessage, "info");
    } else {
      console.log(formattedMessage);
    }
  }

  private formatMessage(message: string, args: unknown[]): string {
    if (args.length === 0) {
      return message;
    }

    return args.reduce<string>((msg, arg) => msg.replace("%s", String(arg)), message);
  }

  static createDefault(debug?: boolean): Logger {
    return new Logger({ debug });
  }
}
