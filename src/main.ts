import "dotenv/config";
import "reflect-metadata";

import { Logger } from "@nestjs/common";
import { NestFactory } from "@nestjs/core";

import { AppModule } from "./app.module.js";
import { readNumberEnv } from "./core/index.js";

async function bootstrap(): Promise<void> {
  const app = await NestFactory.create(AppModule);
  app.enableShutdownHooks();

  const port = readNumberEnv("PORT", 3000) || 3000;
  await app.listen(port);

  Logger.log(`prguard demo service listening on port ${port}`, "Bootstrap");
}

bootstrap().catch((error: unknown) => {
  Logger.error(
    `Failed to bootstrap application: ${error instanceof Error ? error.message : String(error)}`,
    "",
    "Bootstrap",
  );
  process.exit(1);
});
