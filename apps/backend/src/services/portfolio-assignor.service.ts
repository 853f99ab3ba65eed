import { Injectable, Logger } from "@nestjs/common";
import { InjectRepository } from "@nestjs/typeorm";
import seedrandom from "seedrandom";
import { Repository } from "typeorm";
import { Holding, Ticker } from "../entities";

const MIN_HOLDINGS = 3;
const MAX_HOLDINGS = 7;
const MIN_QUANTITY = 5;
const MAX_QUANTITY = 50;

export type HoldingPick = { ticker: Ticker; quantity: number };

const randomInt = (random: () => number, min: number, max: number) =>
  min + Math.floor(random() * (max - min + 1));

/**
 * Deterministic basket for `seed`: the same seed over the same set of
 * tickers (in any order) always yields the same picks.
 */
export function pickHoldings(seed: number | string, tickers: Ticker[]): HoldingPick[] {
  if (tickers.length === 0) {
    return [];
  }

  const random = seedrandom(String(seed));
  const pool = [...tickers].sort((a, b) => (a.symbol < b.symbol ? -1 : a.symbol > b.symbol ? 1 : 0));
  const maxCount = Math.min(MAX_HOLDINGS, pool.length);
  const count = randomInt(random, Math.min(MIN_HOLDINGS, maxCount), maxCount);

  // Partial Fisher-Yates: the first `count` slots end up a sample without replacement.
  for (let i = 0; i < count; i += 1) {
    const j = randomInt(random, i, pool.length - 1);
    [pool[i], pool[j]] = [pool[j], pool[i]];
  }

  return pool.slice(0, count).map((ticker) => ({
    ticker,
    quantity: randomInt(random, MIN_QUANTITY, MAX_QUANTITY),
  }));
}

@Injectable()
export class PortfolioAssignorService {
  private readonly logger = new Logger(PortfolioAssignorService.name);

  constructor(
    @InjectRepository(Ticker) private readonly tickerRepository: Repository<Ticker>,
    @InjectRepository(Holding) private readonly holdingRepository: Repository<Holding>,
  ) {}

  /** Holdings of `userId` with their tickers, generating the basket on first access. */
  async ensureHoldings(userId: number): Promise<Holding[]> {
    const holdings = await this.loadHoldings(userId);
    if (holdings.length > 0) {
      return holdings;
    }

    // A concurrent request may have written the basket in between; reload either way.
    await this.assign(userId);
    return this.loadHoldings(userId);
  }

  /**
   * Writes a generated basket for a user without holdings. No-op once any
   * holding exists. Rows are insert-or-ignore on (userId, tickerId), so
   * concurrent first requests converge on the same basket.
   */
  async assign(userId: number): Promise<HoldingPick[]> {
    const existing = await this.holdingRepository.count({ where: { userId } });
    if (existing > 0) {
      return [];
    }

    const tickers = await this.tickerRepository.find({ order: { symbol: "ASC" } });
    if (tickers.length === 0) {
      this.logger.warn("No tickers available to generate portfolio");
      return [];
    }

    const picks = pickHoldings(userId, tickers);
    await this.holdingRepository
      .createQueryBuilder()
      .insert()
      .into(Holding)
      .values(picks.map((pick) => ({ userId, tickerId: pick.ticker.id, quantity: pick.quantity })))
      .orIgnore()
      .execute();

    this.logger.log(`Generated portfolio for user ${userId} with ${picks.length} holdings`);
    return picks;
  }

  private loadHoldings(userId: number): Promise<Holding[]> {
    return this.holdingRepository.find({
      where: { userId },
      relations: { ticker: true },
      order: { id: "ASC" },
    });
  }
}
