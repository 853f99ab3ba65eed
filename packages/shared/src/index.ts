export interface PaginationQuery {
  page?: number;
  pageSize?: number;
}

export interface Paginated<T> {
  items: T[];
  total: number;
  page: number;
  pageSize: number;
}

export interface TokenResponse {
  access_token: string;
  token_type: "bearer";
}

export type SocialProvider = "google" | "facebook";

export interface SocialTokenResponse extends TokenResponse {
  provider: SocialProvider;
}

export interface PortfolioHoldingView {
  ticker: string;
  name: string;
  qty: number;
  price: number;
  dailyChangePct: number;
  value: number;
}

export interface PortfolioView {
  holdings: PortfolioHoldingView[];
  totalValue: number;
}

export interface HealthStatus {
  ok: boolean;
  database: "connected" | "disconnected";
}

export type IngestionTrigger = "startup" | "schedule" | "manual";
export type IngestionSource = "provider" | "synthetic";

export interface SymbolIngestionResult {
  symbol: string;
  status: "success" | "error";
  source: IngestionSource;
  inserted: number;
  error?: string;
}

export interface IngestionSummary {
  runId: string;
  trigger: IngestionTrigger;
  mode: IngestionSource;
  symbols: string[];
  successCount: number;
  errorCount: number;
  insertedCount: number;
  durationMs: number;
  results: SymbolIngestionResult[];
}
