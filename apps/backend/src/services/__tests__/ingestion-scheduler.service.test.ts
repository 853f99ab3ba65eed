import { ConfigService } from "@nestjs/config";
import { SchedulerRegistry } from "@nestjs/schedule";
import type { IngestionSummary } from "@portfolio-valuation/shared";
import { INGESTION_CRON_JOB, IngestionSchedulerService } from "../ingestion-scheduler.service";
import { PriceIngestionService } from "../price-ingestion.service";

const summary: IngestionSummary = {
  runId: "ingest-test",
  trigger: "startup",
  mode: "synthetic",
  symbols: [],
  successCount: 0,
  errorCount: 0,
  insertedCount: 0,
  durationMs: 0,
  results: [],
};

describe("IngestionSchedulerService", () => {
  let registry: SchedulerRegistry;
  let runIngestion: jest.Mock<Promise<IngestionSummary>, [string]>;

  const buildService = (env: Record<string, string>) =>
    new IngestionSchedulerService(
      new ConfigService(env),
      registry,
      { runIngestion } as unknown as PriceIngestionService,
    );

  beforeEach(() => {
    registry = new SchedulerRegistry();
    runIngestion = jest.fn().mockResolvedValue(summary);
  });

  afterEach(() => {
    for (const job of registry.getCronJobs().values()) {
      job.stop();
    }
  });

  it("should run a startup ingestion by default", async () => {
    await buildService({}).onApplicationBootstrap();

    expect(runIngestion).toHaveBeenCalledWith("startup");
    expect(registry.getCronJobs().size).toBe(0);
  });

  it("should register the cron job when scheduling is enabled", async () => {
    await buildService({
      INGESTION_ON_STARTUP: "false",
      INGESTION_SCHEDULE_ENABLED: "true",
      INGESTION_SCHEDULE_CRON: "0 3 * * *",
    }).onApplicationBootstrap();

    expect(runIngestion).not.toHaveBeenCalled();
    expect(registry.doesExist("cron", INGESTION_CRON_JOB)).toBe(true);
  });

  it("should not start a second run while one is in flight", async () => {
    let finish: (value: IngestionSummary) => void = () => undefined;
    runIngestion.mockReturnValueOnce(
      new Promise((resolve) => {
        finish = resolve;
      }),
    );
    const service = buildService({});

    const first = service.runSafely("schedule");
    const second = service.runSafely("manual");
    finish(summary);
    await Promise.all([first, second]);
    await service.runSafely("schedule");

    expect(runIngestion).toHaveBeenCalledTimes(2);
  });

  it("should swallow a failed run so startup continues", async () => {
    runIngestion.mockRejectedValueOnce(new Error("database unavailable"));

    await expect(buildService({}).onApplicationBootstrap()).resolves.toBeUndefined();
  });
});
