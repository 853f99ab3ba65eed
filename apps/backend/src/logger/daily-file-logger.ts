import { LoggerService, LogLevel } from "@nestjs/common";
import { appendFileSync, existsSync, mkdirSync } from "fs";
import { join } from "path";

const LEVEL_ORDER: LogLevel[] = ["fatal", "error", "warn", "log", "debug", "verbose"];

export type DailyFileLoggerOptions = {
  logDir?: string;
  level?: string;
  toFile?: boolean;
};

/**
 * Nest logger writing `<time> [LEVEL] [context] message` lines to one file
 * per local calendar day and mirroring them to the console.
 */
export class DailyFileLogger implements LoggerService {
  private readonly logDir: string;
  private readonly maxLevel: number;
  private readonly toFile: boolean;

  constructor(options: DailyFileLoggerOptions = {}) {
    this.logDir = options.logDir ?? join(process.cwd(), "logs");
    this.toFile = options.toFile ?? true;
    const index = LEVEL_ORDER.findIndex((level) => level === options.level?.toLowerCase());
    this.maxLevel = index >= 0 ? index : LEVEL_ORDER.indexOf("log");

    if (this.toFile && !existsSync(this.logDir)) {
      mkdirSync(this.logDir, { recursive: true });
    }
  }

  static fromEnv(env: NodeJS.ProcessEnv = process.env) {
    return new DailyFileLogger({
      logDir: env.LOG_DIR,
      level: env.LOG_LEVEL,
      toFile: (env.LOG_TO_FILE ?? "true") === "true",
    });
  }

  log(message: unknown, context?: string) {
    this.write("log", message, context);
  }

  error(message: unknown, trace?: string, context?: string) {
    // Nest passes (message, context) when there is no stack.
    if (context === undefined && trace !== undefined && !trace.includes("\n")) {
      this.write("error", message, trace);
      return;
    }
    this.write("error", message, context, trace);
  }

  warn(message: unknown, context?: string) {
    this.write("warn", message, context);
  }

  debug(message: unknown, context?: string) {
    this.write("debug", message, context);
  }

  verbose(message: unknown, context?: string) {
    this.write("verbose", message, context);
  }

  fatal(message: unknown, context?: string) {
    this.write("fatal", message, context);
  }

  isEnabled(level: LogLevel) {
    return LEVEL_ORDER.indexOf(level) <= this.maxLevel;
  }

  formatLine(level: LogLevel, message: unknown, context?: string, now = new Date()) {
    const text = message instanceof Error ? message.message : typeof message === "string" ? message : JSON.stringify(message);
    const ctx = context ? ` [${context}]` : "";
    return `${now.toISOString()} [${level.toUpperCase()}]${ctx} ${text}`;
  }

  private write(level: LogLevel, message: unknown, context?: string, trace?: string) {
    if (!this.isEnabled(level)) {
      return;
    }

    const now = new Date();
    const line = this.formatLine(level, message, context, now) + (trace ? `\n${trace}` : "");
    if (this.toFile) {
      appendFileSync(join(this.logDir, `${this.formatDate(now)}.log`), `${line}\n`, { encoding: "utf-8" });
    }
    // eslint-disable-next-line no-console
    console.log(line);
  }

  private formatDate(date: Date) {
    const yyyy = date.getFullYear();
    const mm = String(date.getMonth() + 1).padStart(2, "0");
    const dd = String(date.getDate()).padStart(2, "0");
    return `${yyyy}-${mm}-${dd}`;
  }
}
