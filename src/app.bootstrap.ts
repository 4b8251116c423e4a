import { INestApplication, ValidationPipe } from "@nestjs/common";
import type { Express, NextFunction, Request, Response } from "express";
import { VerificationErrorFilter } from "./common/filters/verification-error.filter";
import { getEnv } from "./config/environment";
import {
  requestIdMiddleware,
  requestLoggingMiddleware,
} from "./middleware/logging";
import { apiLimiter, uploadLimiter } from "./middleware/rateLimiter";
import { TelemetryMetrics } from "./observability/metrics-registry";
import { createPrometheusMetricsHandler } from "./observability/prometheus-endpoint";
import { CapabilityLifecycleService } from "./verification/capabilities/capability-lifecycle.service";

const DEFAULT_CORS_ORIGINS = ["http://localhost:3000"] as const;
const METRICS_ROUTE_FLAG = Symbol.for("__metrics_route_registered__");
export const API_PREFIX = "api/v1";

/**
 * Applies the HTTP configuration shared by main.ts and the e2e harness
 * (prefix, middleware stack, CORS, validation, error mapping).
 */
export async function configureApp(app: INestApplication): Promise<void> {
  const env = getEnv();
  TelemetryMetrics.refreshEnvironment();

  app.use(requestIdMiddleware);
  app.use(requestLoggingMiddleware);

  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      forbidNonWhitelisted: true,
      transform: true,
    }),
  );
  app.useGlobalFilters(new VerificationErrorFilter());

  const corsOrigins = env.service.corsOrigins.length
    ? [...env.service.corsOrigins]
    : [...DEFAULT_CORS_ORIGINS];

  app.enableCors({
    origin: corsOrigins,
    credentials: true,
    methods: ["GET", "POST", "OPTIONS"],
    allowedHeaders: ["Content-Type", "Authorization", "X-Request-ID"],
    exposedHeaders: [
      "X-Request-ID",
      "Retry-After",
      "RateLimit-Limit",
      "RateLimit-Remaining",
      "RateLimit-Reset",
    ],
    maxAge: 3600,
  });

  app.use((_req: Request, res: Response, next: NextFunction) => {
    res.setHeader(
      "Strict-Transport-Security",
      "max-age=31536000; includeSubDomains; preload",
    );
    res.setHeader("X-Content-Type-Options", "nosniff");
    res.setHeader("X-Frame-Options", "DENY");
    res.setHeader("Referrer-Policy", "strict-origin-when-cross-origin");
    res.setHeader(
      "Permissions-Policy",
      "geolocation=(), microphone=(), camera=()",
    );
    next();
  });

  app.use(apiLimiter);
  app.use(`/${API_PREFIX}/verifications`, uploadLimiter);

  const server: Express = app.getHttpAdapter().getInstance();
  if (env.telemetry.metricsEnabled && !Reflect.get(server, METRICS_ROUTE_FLAG)) {
    const capabilities = app.get(CapabilityLifecycleService);
    const metricsHandler = createPrometheusMetricsHandler(() =>
      capabilities.snapshots(),
    );
    server.get("/metrics", (req, res, next) => {
      metricsHandler(req, res).catch(next);
    });
    Reflect.set(server, METRICS_ROUTE_FLAG, true);
  }

  app.setGlobalPrefix(API_PREFIX);
}
