export { Holding } from "./holding.entity";
export { IngestionRun } from "./ingestion-run.entity";
export { PricePoint } from "./price-point.entity";
export { Ticker } from "./ticker.entity";
export { User } from "./user.entity";
