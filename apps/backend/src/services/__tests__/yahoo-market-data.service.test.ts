const mockHistorical = jest.fn();
const mockQuoteSummary = jest.fn();

jest.mock("yahoo-finance2", () => ({
  __esModule: true,
  default: {
    historical: (...args: unknown[]) => mockHistorical(...args),
    quoteSummary: (...args: unknown[]) => mockQuoteSummary(...args),
  },
}));

import { isRateLimitLike, MarketDataUnavailableError } from "../market-data.errors";
import { YahooMarketDataService } from "../yahoo-market-data.service";

describe("YahooMarketDataService", () => {
  const service = new YahooMarketDataService();
  const from = new Date("2024-01-01T00:00:00Z");
  const to = new Date("2024-01-31T00:00:00Z");

  beforeEach(() => jest.clearAllMocks());

  describe("getDailyHistory", () => {
    it("should map rows to daily bars and drop rows without a close", async () => {
      mockHistorical.mockResolvedValueOnce([
        { date: new Date("2024-01-02T00:00:00Z"), open: 1, high: 2, low: 0.5, close: 1.5, volume: 1000, adjClose: 1.5 },
        { date: new Date("2024-01-03T00:00:00Z"), open: 1, high: 2, low: 0.5, close: Number.NaN, volume: 0 },
      ]);

      const bars = await service.getDailyHistory("AAPL", from, to);

      expect(mockHistorical).toHaveBeenCalledWith("AAPL", { period1: from, period2: to, interval: "1d" });
      expect(bars).toEqual([{ date: "2024-01-02", open: 1, high: 2, low: 0.5, close: 1.5, volume: 1000 }]);
    });

    it("should treat an empty history as unavailable data", async () => {
      mockHistorical.mockResolvedValueOnce([]);

      await expect(service.getDailyHistory("AAPL", from, to)).rejects.toThrow(
        new MarketDataUnavailableError("AAPL", "No historical data available"),
      );
    });

    it("should mark throttling as unavailable data", async () => {
      mockHistorical.mockRejectedValueOnce(new Error("Too Many Requests"));

      await expect(service.getDailyHistory("AAPL", from, to)).rejects.toBeInstanceOf(MarketDataUnavailableError);
    });

    it("should pass other failures through unchanged", async () => {
      const failure = new Error("getaddrinfo ENOTFOUND query1.finance.yahoo.com");
      mockHistorical.mockRejectedValueOnce(failure);

      await expect(service.getDailyHistory("AAPL", from, to)).rejects.toBe(failure);
    });
  });

  describe("getProfile", () => {
    it("should prefer the long name", async () => {
      mockQuoteSummary.mockResolvedValueOnce({
        price: { longName: "Apple Inc.", shortName: "Apple" },
        assetProfile: { sector: "Technology" },
      });

      expect(await service.getProfile("AAPL")).toEqual({ name: "Apple Inc.", sector: "Technology" });
    });

    it("should fall back to the short name and leave a missing sector undefined", async () => {
      mockQuoteSummary.mockResolvedValueOnce({ price: { shortName: "Apple" } });

      expect(await service.getProfile("AAPL")).toEqual({ name: "Apple", sector: undefined });
    });

    it("should mark an HTML error page as unavailable data", async () => {
      mockQuoteSummary.mockRejectedValueOnce(new SyntaxError("Unexpected token '<', \"<!DOCTYPE \"... is not valid JSON"));

      await expect(service.getProfile("AAPL")).rejects.toBeInstanceOf(MarketDataUnavailableError);
    });
  });
});

describe("isRateLimitLike", () => {
  it("should recognise a 429 status code", () => {
    expect(isRateLimitLike({ code: 429 })).toBe(true);
    expect(isRateLimitLike({ status: 429 })).toBe(true);
  });

  it("should recognise throttling and parse failures by message", () => {
    expect(isRateLimitLike(new Error("HTTP 429"))).toBe(true);
    expect(isRateLimitLike(new Error("Unexpected end of JSON input"))).toBe(true);
  });

  it("should leave other failures alone", () => {
    expect(isRateLimitLike(new Error("ECONNRESET"))).toBe(false);
    expect(isRateLimitLike({ code: 500 })).toBe(false);
  });
});
