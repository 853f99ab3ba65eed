import { Inject, Injectable } from "@nestjs/common";
import { InjectRepository } from "@nestjs/typeorm";
import type { PortfolioHoldingView, PortfolioView } from "@portfolio-valuation/shared";
import { Repository } from "typeorm";
import { Holding, PricePoint } from "../entities";
import { PortfolioAssignorService } from "./portfolio-assignor.service";

export const round2 = (value: number) => Number(value.toFixed(2));

@Injectable()
export class PortfolioService {
  constructor(
    @InjectRepository(PricePoint) private readonly priceRepository: Repository<PricePoint>,
    @Inject(PortfolioAssignorService) private readonly assignor: PortfolioAssignorService,
  ) {}

  async getPortfolio(userId: number): Promise<PortfolioView> {
    const holdings = await this.assignor.ensureHoldings(userId);
    if (holdings.length === 0) {
      return { holdings: [], totalValue: 0 };
    }

    const valued = await Promise.all(holdings.map((holding) => this.valuateHolding(holding)));
    const priced = valued.filter((entry): entry is { view: PortfolioHoldingView; rawValue: number } => entry !== null);

    // The total is rounded once from unrounded values, not summed from rounded ones.
    const totalValue = priced.reduce((acc, entry) => acc + entry.rawValue, 0);

    return {
      holdings: priced.map((entry) => entry.view),
      totalValue: round2(totalValue),
    };
  }

  private async valuateHolding(holding: Holding): Promise<{ view: PortfolioHoldingView; rawValue: number } | null> {
    const [latest, previous]: Array<PricePoint | undefined> = await this.priceRepository.find({
      where: { tickerId: holding.tickerId },
      order: { date: "DESC" },
      take: 2,
    });
    if (!latest || !holding.ticker) {
      return null;
    }

    const dailyChangePct =
      previous && previous.close ? ((latest.close - previous.close) / previous.close) * 100 : 0;
    const rawValue = latest.close * holding.quantity;

    return {
      rawValue,
      view: {
        ticker: holding.ticker.symbol,
        name: holding.ticker.name,
        qty: holding.quantity,
        price: round2(latest.close),
        dailyChangePct: round2(dailyChangePct),
        value: round2(rawValue),
      },
    };
  }
}
