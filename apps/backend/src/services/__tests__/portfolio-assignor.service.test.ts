import { Ticker } from "../../entities";
import { createTestStores, seedTickers, TestStores } from "../../test-utils";
import { pickHoldings, PortfolioAssignorService } from "../portfolio-assignor.service";

const SYMBOLS = ["AAPL", "AMZN", "GOOGL", "JPM", "META", "MSFT", "NVDA", "TSLA", "V", "WMT"];

const tickersFor = (symbols: string[]) =>
  symbols.map((symbol, index) => Object.assign(new Ticker(), { id: index + 1, symbol, name: symbol }));

const summarize = (picks: ReturnType<typeof pickHoldings>) =>
  picks.map((pick) => `${pick.ticker.symbol}:${pick.quantity}`);

describe("pickHoldings", () => {
  it("should pick the same basket for the same seed", () => {
    expect(summarize(pickHoldings(42, tickersFor(SYMBOLS)))).toEqual(summarize(pickHoldings(42, tickersFor(SYMBOLS))));
  });

  /**
   * Ticker order coming from storage must not change the result.
   */
  it("should not depend on the order of the tickers", () => {
    const reversed = tickersFor([...SYMBOLS].reverse());
    expect(summarize(pickHoldings(7, reversed))).toEqual(summarize(pickHoldings(7, tickersFor(SYMBOLS))));
  });

  it("should pick three to seven distinct tickers with bounded quantities", () => {
    for (let seed = 1; seed <= 50; seed += 1) {
      const picks = pickHoldings(seed, tickersFor(SYMBOLS));
      const symbols = picks.map((pick) => pick.ticker.symbol);

      expect(picks.length).toBeGreaterThanOrEqual(3);
      expect(picks.length).toBeLessThanOrEqual(7);
      expect(new Set(symbols).size).toBe(symbols.length);
      for (const pick of picks) {
        expect(Number.isInteger(pick.quantity)).toBe(true);
        expect(pick.quantity).toBeGreaterThanOrEqual(5);
        expect(pick.quantity).toBeLessThanOrEqual(50);
      }
    }
  });

  it("should take every ticker when fewer than three exist", () => {
    const picks = pickHoldings(3, tickersFor(["AAPL", "MSFT"]));
    expect(picks.map((pick) => pick.ticker.symbol).sort()).toEqual(["AAPL", "MSFT"]);
  });

  it("should return nothing without tickers", () => {
    expect(pickHoldings(3, [])).toEqual([]);
  });
});

describe("PortfolioAssignorService", () => {
  let stores: TestStores;
  let service: PortfolioAssignorService;

  beforeEach(() => {
    stores = createTestStores();
    service = new PortfolioAssignorService(stores.tickers.asRepository(), stores.holdings.asRepository());
  });

  it("should write the seeded basket for a new user", async () => {
    const tickers = await seedTickers(stores, [...SYMBOLS].reverse());

    const picks = await service.assign(11);

    expect(summarize(picks)).toEqual(summarize(pickHoldings(11, tickers)));
    expect(stores.holdings.rows.map((row) => `${row.userId}:${row.tickerId}:${row.quantity}`)).toEqual(
      picks.map((pick) => `11:${pick.ticker.id}:${pick.quantity}`),
    );
  });

  it("should leave a user with holdings untouched", async () => {
    await seedTickers(stores, SYMBOLS);
    await stores.holdings.save({ userId: 11, tickerId: 1, quantity: 99 });

    expect(await service.assign(11)).toEqual([]);
    expect(stores.holdings.rows).toHaveLength(1);
  });

  it("should return holdings with their tickers loaded", async () => {
    await seedTickers(stores, SYMBOLS);

    const holdings = await service.ensureHoldings(5);

    expect(holdings.length).toBeGreaterThanOrEqual(3);
    for (const holding of holdings) {
      expect(holding.ticker?.id).toBe(holding.tickerId);
    }
    expect(await service.ensureHoldings(5)).toEqual(holdings);
  });

  it("should generate nothing when no tickers exist", async () => {
    expect(await service.ensureHoldings(5)).toEqual([]);
    expect(stores.holdings.rows).toHaveLength(0);
  });

  /**
   * Both requests see no holdings; the unique (user, ticker) index keeps
   * the second insert from adding rows.
   */
  it("should converge on one basket for concurrent first requests", async () => {
    await seedTickers(stores, SYMBOLS);

    const [first, second] = await Promise.all([service.ensureHoldings(8), service.ensureHoldings(8)]);

    expect(first.map((holding) => holding.id)).toEqual(second.map((holding) => holding.id));
    expect(stores.holdings.rows).toHaveLength(first.length);
  });
});
