import { INestApplication, ValidationPipe } from "@nestjs/common";
import { ConfigModule } from "@nestjs/config";
import { DailyFileLogger } from "./logger/daily-file-logger";

/** Application logger, built once `ConfigModule` has merged the env files into `process.env`. */
export async function createAppLogger(): Promise<DailyFileLogger> {
  await ConfigModule.envVariablesLoaded;
  return DailyFileLogger.fromEnv();
}

/** HTTP pipeline shared by the server and the end-to-end tests. */
export function configureApp(app: INestApplication) {
  app.useGlobalPipes(
    new ValidationPipe({
      transform: true,
      whitelist: true,
      forbidUnknownValues: false,
    }),
  );
  return app;
}
