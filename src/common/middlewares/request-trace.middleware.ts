import { randomUUID } from "node:crypto";
import { Injectable, Logger, NestMiddleware } from "@nestjs/common";
import type { NextFunction, Request, Response } from "express";

export const REQUEST_ID_HEADER = "x-request-id";

/**
 * Tags each inbound request with an id (kept from the caller when present)
 * and logs method, path, status and latency once the response is sent.
 */
@Injectable()
export class RequestTraceMiddleware implements NestMiddleware {
  private readonly logger = new Logger("HTTP");

  use(req: Request, res: Response, next: NextFunction): void {
    const requestId = req.get(REQUEST_ID_HEADER) || randomUUID();
    req.headers[REQUEST_ID_HEADER] = requestId;
    res.setHeader(REQUEST_ID_HEADER, requestId);

    const startedAt = Date.now();
    res.on("finish", () => {
      this.logger.debug(
        `${req.method} ${req.originalUrl} ${res.statusCode} - ${Date.now() - startedAt}ms [${requestId}]`,
      );
    });

    next();
  }
}
