import { Injectable, Logger } from "@nestjs/common";
import yahooFinance from "yahoo-finance2";
import { DailyBar, MarketDataProvider, TickerProfile } from "../types";
import { isRateLimitLike, MarketDataUnavailableError } from "./market-data.errors";

@Injectable()
export class YahooMarketDataService implements MarketDataProvider {
  readonly name = "yahoo";
  private readonly logger = new Logger(YahooMarketDataService.name);

  async getProfile(symbol: string): Promise<TickerProfile> {
    try {
      const summary = await yahooFinance.quoteSummary(symbol, { modules: ["price", "assetProfile"] });
      return {
        name: summary.price?.longName ?? summary.price?.shortName ?? undefined,
        sector: summary.assetProfile?.sector ?? undefined,
      };
    } catch (error) {
      throw this.classify(symbol, "profile", error);
    }
  }

  async getDailyHistory(symbol: string, from: Date, to: Date): Promise<DailyBar[]> {
    const rows = await yahooFinance
      .historical(symbol, { period1: from, period2: to, interval: "1d" })
      .catch((error: unknown) => {
        throw this.classify(symbol, "history", error);
      });

    if (rows.length === 0) {
      throw new MarketDataUnavailableError(symbol, "No historical data available");
    }

    return rows
      .filter((row) => Number.isFinite(row.close))
      .map((row) => ({
        // Yahoo stamps daily bars at exchange-day midnight UTC.
        date: row.date.toISOString().slice(0, 10),
        open: row.open,
        high: row.high,
        low: row.low,
        close: row.close,
        volume: row.volume,
      }));
  }

  private classify(symbol: string, call: string, error: unknown): Error {
    const message = error instanceof Error ? error.message : String(error);
    this.logger.warn(`Yahoo ${call} request failed for ${symbol}: ${message}`);
    if (isRateLimitLike(error)) {
      return new MarketDataUnavailableError(symbol, message, { cause: error });
    }
    return error instanceof Error ? error : new Error(message);
  }
}
