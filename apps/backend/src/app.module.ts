import { Module } from "@nestjs/common";
import { ConfigModule, ConfigService } from "@nestjs/config";
import { JwtModule } from "@nestjs/jwt";
import { ScheduleModule } from "@nestjs/schedule";
import { TypeOrmModule } from "@nestjs/typeorm";
import { AuthController } from "./auth/auth.controller";
import { JwtAuthGuard } from "./auth/jwt-auth.guard";
import { Holding, IngestionRun, PricePoint, Ticker, User } from "./entities";
import { IngestionController } from "./ingestion/ingestion.controller";
import { HealthController } from "./monitoring/health.controller";
import { PortfolioController } from "./portfolio/portfolio.controller";
import { AuthService } from "./services/auth.service";
import { IngestionSchedulerService } from "./services/ingestion-scheduler.service";
import { PortfolioAssignorService } from "./services/portfolio-assignor.service";
import { PortfolioService } from "./services/portfolio.service";
import { PriceIngestionService } from "./services/price-ingestion.service";
import { YahooMarketDataService } from "./services/yahoo-market-data.service";
import { MARKET_DATA_PROVIDER } from "./types";

const isTrue = (value?: string) => value?.toLowerCase() === "true";

export const ENTITIES = [User, Ticker, PricePoint, Holding, IngestionRun];

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: [".env.local", ".env"],
    }),
    ScheduleModule.forRoot(),
    TypeOrmModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (config: ConfigService) => {
        const sslEnabled = isTrue(config.get<string>("DB_SSL"));
        const sslIgnore = isTrue(config.get<string>("DB_SSL_IGNORE"));

        return {
          type: "postgres" as const,
          host: config.get<string>("DB_HOST") ?? "localhost",
          port: Number(config.get<string>("DB_PORT") ?? "5432"),
          username: config.get<string>("DB_USER") ?? "portfolio",
          password: config.get<string>("DB_PASSWORD") ?? "portfolio",
          database: config.get<string>("DB_NAME") ?? "portfolio",
          entities: ENTITIES,
          synchronize: (config.get<string>("DB_SYNCHRONIZE") ?? "true") === "true",
          ssl: sslEnabled
            ? {
                rejectUnauthorized: !sslIgnore,
              }
            : false,
        };
      },
    }),
    TypeOrmModule.forFeature(ENTITIES),
    JwtModule.registerAsync({
      inject: [ConfigService],
      useFactory: (config: ConfigService) => ({
        secret: config.get<string>("JWT_SECRET") ?? "change-me-in-production",
        signOptions: {
          algorithm: "HS256" as const,
          expiresIn: Number(config.get<string>("ACCESS_TOKEN_EXPIRE_MINUTES") ?? "30") * 60,
        },
        verifyOptions: {
          algorithms: ["HS256" as const],
        },
      }),
    }),
  ],
  controllers: [AuthController, PortfolioController, HealthController, IngestionController],
  providers: [
    AuthService,
    JwtAuthGuard,
    PortfolioAssignorService,
    PortfolioService,
    PriceIngestionService,
    IngestionSchedulerService,
    { provide: MARKET_DATA_PROVIDER, useClass: YahooMarketDataService },
  ],
})
export class AppModule {}
