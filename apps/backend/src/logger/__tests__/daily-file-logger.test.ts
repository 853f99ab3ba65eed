import { format } from "date-fns";
import { existsSync, mkdtempSync, readFileSync, rmSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { DailyFileLogger } from "../daily-file-logger";

describe("DailyFileLogger", () => {
  let logDir: string;
  let consoleLog: jest.SpyInstance;

  beforeEach(() => {
    logDir = mkdtempSync(join(tmpdir(), "daily-file-logger-"));
    consoleLog = jest.spyOn(console, "log").mockImplementation(() => undefined);
  });

  afterEach(() => {
    consoleLog.mockRestore();
    rmSync(logDir, { recursive: true, force: true });
  });

  it("should format a line with time, level and context", () => {
    const logger = new DailyFileLogger({ logDir, toFile: false });

    expect(logger.formatLine("warn", "hello", "Ctx", new Date("2024-01-02T03:04:05.000Z"))).toBe(
      "2024-01-02T03:04:05.000Z [WARN] [Ctx] hello",
    );
    expect(logger.formatLine("log", { a: 1 }, undefined, new Date("2024-01-02T03:04:05.000Z"))).toBe(
      '2024-01-02T03:04:05.000Z [LOG] {"a":1}',
    );
  });

  it("should drop messages above the configured level", () => {
    const logger = new DailyFileLogger({ logDir, level: "warn", toFile: false });

    expect(logger.isEnabled("error")).toBe(true);
    expect(logger.isEnabled("log")).toBe(false);
    logger.log("quiet");
    expect(consoleLog).not.toHaveBeenCalled();
  });

  it("should append to the file of the current day", () => {
    const logger = new DailyFileLogger({ logDir });

    logger.log("stored", "Ingestion");

    const contents = readFileSync(join(logDir, `${format(new Date(), "yyyy-MM-dd")}.log`), "utf-8");
    expect(contents.trimEnd()).toMatch(/ \[LOG\] \[Ingestion\] stored$/);
  });

  it("should not create a directory when file output is off", () => {
    const missing = join(logDir, "nested");
    new DailyFileLogger({ logDir: missing, toFile: false }).log("console only");

    expect(existsSync(missing)).toBe(false);
    expect(consoleLog).toHaveBeenCalledTimes(1);
  });

  /**
   * Nest calls error(message, context) when there is no stack trace.
   */
  it("should treat a single-line second argument to error as the context", () => {
    const logger = new DailyFileLogger({ logDir, toFile: false });

    logger.error("boom", "Scheduler");

    expect(String(consoleLog.mock.calls[0][0])).toMatch(/ \[ERROR\] \[Scheduler\] boom$/);
  });

  it("should read its options from the environment", () => {
    const logger = DailyFileLogger.fromEnv({ LOG_DIR: logDir, LOG_LEVEL: "error", LOG_TO_FILE: "false" });

    expect(logger.isEnabled("warn")).toBe(false);
    expect(logger.isEnabled("fatal")).toBe(true);
  });
});
