/**
 * Achievement verification service - bootstrap
 *
 * The service is identity-agnostic: callers are authenticated upstream and
 * persist the returned outcome alongside the submitted claim.
 */

// Load .env file BEFORE importing any other modules
import dotenv from "dotenv";
dotenv.config();

import "reflect-metadata";
import { NestFactory } from "@nestjs/core";
import { ExpressAdapter } from "@nestjs/platform-express";
import express from "express";
import { AppModule } from "./app.module";
import { API_PREFIX, configureApp } from "./app.bootstrap";
import { loadEnvironment } from "./config/environment";

async function bootstrap() {
  // Fails fast with every configuration problem before any model is opened.
  const env = loadEnvironment();
  const server = express();
  const app = await NestFactory.create(AppModule, new ExpressAdapter(server));
  await configureApp(app);
  const port = env.service.port;

  await app.listen(port);

  console.log(`Application is running on http://localhost:${port}`);
  console.log(`  - Health: http://localhost:${port}/${API_PREFIX}/health`);
  console.log(`  - Metrics: http://localhost:${port}/metrics`);
  console.log(
    `  - Verify: POST http://localhost:${port}/${API_PREFIX}/verifications/{college-id,certificate}`,
  );

  const gracefulShutdown = async (signal: string) => {
    console.log(`\n${signal} received, initiating graceful shutdown...`);

    try {
      // Stops accepting connections, then closes capability pools and models.
      await app.close();
      console.log("Exiting gracefully");
      process.exit(0);
    } catch (error) {
      console.error("Error during graceful shutdown:", error);
      process.exit(1);
    }
  };

  process.on("SIGTERM", () => void gracefulShutdown("SIGTERM"));
  process.on("SIGINT", () => void gracefulShutdown("SIGINT"));
}

bootstrap().catch((error) => {
  console.error("Failed to start application:", error);
  process.exit(1);
});
