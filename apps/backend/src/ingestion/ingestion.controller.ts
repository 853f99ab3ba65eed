import { Controller, Get, HttpCode, Inject, Post, Query, UseGuards } from "@nestjs/common";
import { JwtAuthGuard } from "../auth/jwt-auth.guard";
import { PaginationDto } from "../dto/pagination.dto";
import { PriceIngestionService } from "../services/price-ingestion.service";

@Controller("ingestion")
@UseGuards(JwtAuthGuard)
export class IngestionController {
  constructor(@Inject(PriceIngestionService) private readonly ingestion: PriceIngestionService) {}

  @Get("runs")
  listRuns(@Query() query: PaginationDto) {
    return this.ingestion.listRuns(query.page ?? 1, query.pageSize ?? 20);
  }

  @Post("run")
  @HttpCode(200)
  runNow() {
    return this.ingestion.runIngestion("manual");
  }
}
