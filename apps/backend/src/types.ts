export interface DailyBar {
  date: string;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}

export interface TickerProfile {
  name?: string;
  sector?: string;
}

export interface CatalogEntry {
  name: string;
  sector: string;
  basePrice: number;
}

export const MARKET_DATA_PROVIDER = "MARKET_DATA_PROVIDER";

export interface MarketDataProvider {
  readonly name: string;
  getProfile(symbol: string): Promise<TickerProfile>;
  getDailyHistory(symbol: string, from: Date, to: Date): Promise<DailyBar[]>;
}

export interface AccessTokenPayload {
  sub: string;
  email: string;
}
