import "reflect-metadata";
import { NestFactory } from "@nestjs/core";
import { AppModule } from "./app.module";
import { configureApp, createAppLogger } from "./app.setup";
import { DailyFileLogger } from "./logger/daily-file-logger";

async function bootstrap() {
  const logger = await createAppLogger();
  const app = await NestFactory.create(AppModule, { logger });
  app.enableShutdownHooks();
  configureApp(app);

  const port = Number(process.env.PORT ?? 8000);
  await app.listen(port);
  logger.log(`Portfolio API listening on port ${port}`, "Bootstrap");
}

bootstrap().catch((error: unknown) => {
  DailyFileLogger.fromEnv().error(
    `Bootstrap failed: ${String(error)}`,
    error instanceof Error ? error.stack : undefined,
    "Bootstrap",
  );
  process.exitCode = 1;
});

process.on("unhandledRejection", (reason) => {
  DailyFileLogger.fromEnv().error(`unhandledRejection ${String(reason)}`, undefined, "Process");
});

process.on("uncaughtException", (error) => {
  DailyFileLogger.fromEnv().error(`uncaughtException ${error.message}`, error.stack, "Process");
});
