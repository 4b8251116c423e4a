import { Request, Response, NextFunction } from "express";
import { v4 as uuidv4 } from "uuid";
import { StructuredLogger } from "../common/logging/structured-logger";
import { resolveCorrelationId } from "../common/logging/correlation";

/**
 * Request Logging Middleware
 *
 * Request IDs for tracing, plus one sampled structured line per request and
 * response. Uploaded bytes and claimed field values are never logged.
 */

declare global {
  namespace Express {
    interface Request {
      requestId?: string;
      startTime?: number;
      correlationId?: string;
    }
  }
}

/**
 * Generate request ID and attach to request
 */
export function requestIdMiddleware(
  req: Request,
  res: Response,
  next: NextFunction,
): void {
  req.requestId = resolveCorrelationId(req.headers["x-request-id"], uuidv4());
  req.startTime = Date.now();
  req.correlationId = resolveCorrelationId(
    req.headers["x-correlation-id"],
    req.requestId,
  );

  res.setHeader("X-Request-ID", req.requestId);
  res.setHeader("X-Correlation-ID", req.correlationId);

  next();
}

export function requestLoggingMiddleware(
  req: Request,
  res: Response,
  next: NextFunction,
): void {
  const { method, originalUrl, ip } = req;
  const requestId = req.requestId;
  const correlationId = req.correlationId;
  const userAgent = req.get("user-agent");

  StructuredLogger.info("http.request", {
    requestId,
    correlationId,
    endpoint: `${method} ${originalUrl}`,
    status: "received",
    data: { method, url: originalUrl, ip, userAgent },
  });

  res.once("finish", () => {
    StructuredLogger.info("http.response", {
      requestId,
      correlationId,
      endpoint: `${method} ${originalUrl}`,
      status: res.statusCode,
      durationMs: Date.now() - (req.startTime ?? Date.now()),
      data: {
        method,
        url: originalUrl,
        ip,
        statusCode: res.statusCode,
        userAgent,
      },
    });
  });

  next();
}
