import { Inject, Injectable, Logger } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { InjectRepository } from "@nestjs/typeorm";
import type {
  IngestionSource,
  IngestionSummary,
  IngestionTrigger,
  Paginated,
  SymbolIngestionResult,
} from "@portfolio-valuation/shared";
import { isWeekend, parseISO, subDays } from "date-fns";
import { Repository } from "typeorm";
import { IngestionRun, PricePoint, Ticker } from "../entities";
import { DailyBar, MARKET_DATA_PROVIDER, MarketDataProvider } from "../types";
import { isRateLimitLike } from "./market-data.errors";
import { catalogEntryFor, generateSyntheticBars, tradingDaysInWindow } from "./synthetic-prices";

const DEFAULT_TICKERS = "AAPL,GOOGL,MSFT,TSLA,NVDA";

type RunContext = {
  runId: string;
  // Shared by every symbol task of the run; flips to "synthetic" once the provider throttles.
  mode: IngestionSource;
  days: string[];
  from: Date;
  to: Date;
};

const errorMessage = (error: unknown) => (error instanceof Error ? error.message : String(error));

@Injectable()
export class PriceIngestionService {
  private readonly logger = new Logger(PriceIngestionService.name);

  constructor(
    @Inject(ConfigService) private readonly config: ConfigService,
    @InjectRepository(Ticker) private readonly tickerRepository: Repository<Ticker>,
    @InjectRepository(PricePoint) private readonly priceRepository: Repository<PricePoint>,
    @InjectRepository(IngestionRun)
    private readonly ingestionRunRepository: Repository<IngestionRun>,
    @Inject(MARKET_DATA_PROVIDER) private readonly provider: MarketDataProvider,
  ) {}

  resolveSymbols(): string[] {
    const symbols = (this.config.get<string>("TICKERS") ?? DEFAULT_TICKERS)
      .split(",")
      .map((symbol) => symbol.trim())
      .filter(Boolean);
    return [...new Set(symbols)];
  }

  async runIngestion(trigger: IngestionTrigger = "manual", now = new Date()): Promise<IngestionSummary> {
    const startedAt = Date.now();
    const lookbackDays = Number(this.config.get<string>("INGESTION_LOOKBACK_DAYS") ?? "30");
    const staggerMs = Number(this.config.get<string>("INGESTION_STAGGER_MS") ?? "500");
    const useMock = (this.config.get<string>("INGESTION_USE_MOCK_DATA") ?? "false").toLowerCase() === "true";
    const symbols = this.resolveSymbols();

    const run: RunContext = {
      runId: `ingest-${new Date(startedAt).toISOString()}`,
      mode: useMock ? "synthetic" : "provider",
      days: tradingDaysInWindow(now, lookbackDays),
      from: subDays(now, lookbackDays),
      to: now,
    };
    this.logger.log(`[${run.runId}] Ingestion start trigger=${trigger} mode=${run.mode} symbols=${symbols.join(",")}`);

    const settled = await Promise.allSettled(
      symbols.map((symbol, index) => this.ingestWithDelay(run, symbol, index * staggerMs)),
    );
    const results = settled.map<SymbolIngestionResult>((outcome, idx) =>
      outcome.status === "fulfilled"
        ? outcome.value
        : { symbol: symbols[idx], status: "error", source: run.mode, inserted: 0, error: errorMessage(outcome.reason) },
    );

    const summary: IngestionSummary = {
      runId: run.runId,
      trigger,
      mode: run.mode,
      symbols,
      successCount: results.filter((result) => result.status === "success").length,
      errorCount: results.filter((result) => result.status === "error").length,
      insertedCount: results.reduce((acc, result) => acc + result.inserted, 0),
      durationMs: Date.now() - startedAt,
      results,
    };

    this.logger.log(
      `[${run.runId}] Ingestion complete in ${summary.durationMs}ms: ${summary.successCount} successful, ` +
        `${summary.errorCount} errors, ${summary.insertedCount} prices inserted`,
    );
    await this.recordRun(summary);
    return summary;
  }

  async listRuns(page = 1, pageSize = 20): Promise<Paginated<IngestionRun>> {
    const [items, total] = await this.ingestionRunRepository.findAndCount({
      skip: (page - 1) * pageSize,
      take: pageSize,
      order: { createdAt: "DESC" },
    });
    return { items, total, page, pageSize };
  }

  private async ingestWithDelay(run: RunContext, symbol: string, delayMs: number): Promise<SymbolIngestionResult> {
    if (delayMs > 0) {
      await new Promise((resolve) => setTimeout(resolve, delayMs));
    }

    if (run.mode === "synthetic") {
      return this.ingestSynthetic(run, symbol);
    }

    try {
      const inserted = await this.ingestFromProvider(run, symbol);
      return { symbol, status: "success", source: "provider", inserted };
    } catch (error) {
      if (!isRateLimitLike(error)) {
        this.logger.error(`[${run.runId}] Error processing ticker ${symbol}: ${errorMessage(error)}`);
        return { symbol, status: "error", source: "provider", inserted: 0, error: errorMessage(error) };
      }
      this.logger.warn(`[${run.runId}] Provider unavailable for ${symbol}. Switching to synthetic data.`);
      run.mode = "synthetic";
      return this.ingestSynthetic(run, symbol);
    }
  }

  private async ingestFromProvider(run: RunContext, symbol: string): Promise<number> {
    const profile = await this.provider.getProfile(symbol);

    let ticker = await this.tickerRepository.findOne({ where: { symbol } });
    if (!ticker) {
      ticker = await this.createTicker(symbol, profile.name ?? symbol, profile.sector ?? "Unknown");
      this.logger.log(`Created ticker: ${symbol} - ${ticker.name}`);
    } else {
      ticker.name = profile.name ?? ticker.name;
      ticker.sector = profile.sector ?? ticker.sector;
      // Set explicitly: an unchanged profile would otherwise issue no UPDATE.
      ticker.updatedAt = new Date();
      ticker = await this.tickerRepository.save(ticker);
    }

    const bars = await this.provider.getDailyHistory(symbol, run.from, run.to);
    const existing = await this.loadExistingDates(ticker.id);
    const fresh = bars.filter((bar) => {
      if (existing.has(bar.date) || isWeekend(parseISO(bar.date))) {
        return false;
      }
      existing.add(bar.date);
      return true;
    });

    const inserted = await this.insertBars(ticker.id, fresh);
    this.logger.log(`[${run.runId}] Stored ${inserted} price records for ${symbol} from ${this.provider.name}`);
    return inserted;
  }

  private async ingestSynthetic(run: RunContext, symbol: string): Promise<SymbolIngestionResult> {
    try {
      const entry = catalogEntryFor(symbol);
      let ticker = await this.tickerRepository.findOne({ where: { symbol } });
      if (!ticker) {
        ticker = await this.createTicker(symbol, entry.name, entry.sector);
        this.logger.log(`Created ticker with synthetic data: ${symbol} - ${ticker.name}`);
      }

      const existing = await this.loadExistingDates(ticker.id);
      const bars = generateSyntheticBars({ basePrice: entry.basePrice, days: run.days, existing });
      const inserted = await this.insertBars(ticker.id, bars);
      this.logger.log(`[${run.runId}] Created ${inserted} synthetic price records for ${symbol}`);
      return { symbol, status: "success", source: "synthetic", inserted };
    } catch (error) {
      this.logger.error(`[${run.runId}] Failed to create synthetic data for ${symbol}: ${errorMessage(error)}`);
      return { symbol, status: "error", source: "synthetic", inserted: 0, error: errorMessage(error) };
    }
  }

  /** Insert-or-ignore on `symbol`, then read back whichever row won. */
  private async createTicker(symbol: string, name: string, sector: string): Promise<Ticker> {
    await this.tickerRepository
      .createQueryBuilder()
      .insert()
      .into(Ticker)
      .values([{ symbol, name, sector }])
      .orIgnore()
      .execute();

    const ticker = await this.tickerRepository.findOne({ where: { symbol } });
    if (!ticker) {
      throw new Error(`Ticker ${symbol} missing after insert`);
    }
    return ticker;
  }

  private async loadExistingDates(tickerId: number): Promise<Set<string>> {
    const rows = await this.priceRepository.find({ where: { tickerId }, select: { date: true } });
    return new Set(rows.map((row) => row.date));
  }

  private async insertBars(tickerId: number, bars: DailyBar[]): Promise<number> {
    if (bars.length === 0) {
      return 0;
    }

    await this.priceRepository
      .createQueryBuilder()
      .insert()
      .into(PricePoint)
      .values(bars.map((bar) => ({ tickerId, ...bar })))
      .orIgnore()
      .execute();
    return bars.length;
  }

  private async recordRun(summary: IngestionSummary) {
    try {
      await this.ingestionRunRepository.save({
        runId: summary.runId,
        trigger: summary.trigger,
        mode: summary.mode,
        symbolCount: summary.symbols.length,
        successCount: summary.successCount,
        errorCount: summary.errorCount,
        insertedCount: summary.insertedCount,
        results: summary.results,
        durationMs: summary.durationMs,
      });
    } catch (error) {
      this.logger.warn(`[${summary.runId}] Failed to record ingestion run: ${errorMessage(error)}`);
    }
  }
}
