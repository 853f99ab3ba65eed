import { Inject, Injectable, Logger, OnApplicationBootstrap } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { SchedulerRegistry } from "@nestjs/schedule";
import type { IngestionTrigger } from "@portfolio-valuation/shared";
import { CronJob } from "cron";
import { PriceIngestionService } from "./price-ingestion.service";

export const INGESTION_CRON_JOB = "priceIngestion";

@Injectable()
export class IngestionSchedulerService implements OnApplicationBootstrap {
  private readonly logger = new Logger(IngestionSchedulerService.name);
  private running: Promise<void> | null = null;

  constructor(
    @Inject(ConfigService) private readonly config: ConfigService,
    @Inject(SchedulerRegistry) private readonly schedulerRegistry: SchedulerRegistry,
    @Inject(PriceIngestionService) private readonly ingestion: PriceIngestionService,
  ) {}

  async onApplicationBootstrap() {
    if ((this.config.get<string>("INGESTION_SCHEDULE_ENABLED") ?? "false") === "true") {
      this.registerCronJob();
    }
    if ((this.config.get<string>("INGESTION_ON_STARTUP") ?? "true") === "true") {
      await this.runSafely("startup");
    }
  }

  /** Runs one ingestion unless one started by the scheduler is still going. */
  runSafely(trigger: IngestionTrigger): Promise<void> {
    if (this.running) {
      this.logger.warn(`Ingestion already running. Skipping ${trigger} run.`);
      return this.running;
    }

    this.running = this.ingestion
      .runIngestion(trigger)
      .then(() => undefined)
      .catch((error: unknown) => {
        this.logger.error(`Ingestion ${trigger} run failed`, error instanceof Error ? error.stack : String(error));
      })
      .finally(() => {
        this.running = null;
      });
    return this.running;
  }

  private registerCronJob() {
    const cron = this.config.get<string>("INGESTION_SCHEDULE_CRON") ?? "0 */6 * * *";
    const job = new CronJob(cron, () => {
      void this.runSafely("schedule");
    });
    this.schedulerRegistry.addCronJob(INGESTION_CRON_JOB, job);
    job.start();
    this.logger.log(`Cron registered: ${INGESTION_CRON_JOB}=${cron}`);
  }
}
