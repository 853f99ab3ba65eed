import { Controller, Get, Inject, Logger, UseGuards } from "@nestjs/common";
import type { PortfolioView } from "@portfolio-valuation/shared";
import { CurrentUser } from "../auth/current-user.decorator";
import { JwtAuthGuard } from "../auth/jwt-auth.guard";
import { User } from "../entities";
import { PortfolioService } from "../services/portfolio.service";

@Controller("portfolio")
@UseGuards(JwtAuthGuard)
export class PortfolioController {
  private readonly logger = new Logger(PortfolioController.name);

  constructor(@Inject(PortfolioService) private readonly portfolioService: PortfolioService) {}

  @Get()
  async getPortfolio(@CurrentUser() user: User): Promise<PortfolioView> {
    this.logger.log(`Fetching portfolio for user: ${user.email}`);
    const portfolio = await this.portfolioService.getPortfolio(user.id);
    this.logger.log(
      `Portfolio retrieved for ${user.email}: ${portfolio.holdings.length} holdings, total value: $${portfolio.totalValue.toFixed(2)}`,
    );
    return portfolio;
  }
}
