import { ConfigModule } from "@nestjs/config";
import { mkdtempSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { createAppLogger } from "../app.setup";

describe("createAppLogger", () => {
  const keys = ["LOG_DIR", "LOG_LEVEL", "LOG_TO_FILE"];
  let envDir: string;

  beforeEach(() => {
    envDir = mkdtempSync(join(tmpdir(), "app-setup-"));
    for (const key of keys) {
      delete process.env[key];
    }
  });

  afterEach(() => {
    for (const key of keys) {
      delete process.env[key];
    }
    rmSync(envDir, { recursive: true, force: true });
  });

  /**
   * Log settings written only in the env file reach the bootstrap logger.
   */
  it("should read log settings from the env file", async () => {
    const envFile = join(envDir, ".env");
    writeFileSync(envFile, "LOG_LEVEL=error\nLOG_TO_FILE=false\n");
    await ConfigModule.forRoot({ envFilePath: [envFile] });

    const logger = await createAppLogger();

    expect(logger.isEnabled("error")).toBe(true);
    expect(logger.isEnabled("warn")).toBe(false);
  });
});
