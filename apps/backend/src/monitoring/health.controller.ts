import { Controller, Get, Logger } from "@nestjs/common";
import { InjectDataSource } from "@nestjs/typeorm";
import type { HealthStatus } from "@portfolio-valuation/shared";
import { DataSource } from "typeorm";

@Controller()
export class HealthController {
  private readonly logger = new Logger(HealthController.name);

  constructor(@InjectDataSource() private readonly dataSource: DataSource) {}

  @Get("healthz")
  async check(): Promise<HealthStatus> {
    try {
      await this.dataSource.query("SELECT 1");
      return { ok: true, database: "connected" };
    } catch (error) {
      this.logger.error(`Health check failed: ${String(error)}`);
      return { ok: false, database: "disconnected" };
    }
  }
}
