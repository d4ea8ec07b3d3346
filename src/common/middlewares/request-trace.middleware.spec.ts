import { EventEmitter } from "node:events";
import { Logger } from "@nestjs/common";
import type { NextFunction, Request, Response } from "express";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { REQUEST_ID_HEADER, RequestTraceMiddleware } from "./request-trace.middleware";

describe("RequestTraceMiddleware", () => {
  let middleware: RequestTraceMiddleware;
  let req: Request;
  let res: Response;
  let next: NextFunction;
  let emitter: EventEmitter;

  let getHeader: ReturnType<typeof vi.fn>;
  let setHeader: ReturnType<typeof vi.fn>;

  beforeEach(() => {
    middleware = new RequestTraceMiddleware();
    getHeader = vi.fn();
    setHeader = vi.fn();
    next = vi.fn();
    emitter = new EventEmitter();

    req = {
      get: getHeader,
      headers: {},
      method: "POST",
      originalUrl: "/routes",
    } as unknown as Request;

    res = {
      setHeader,
      statusCode: 200,
      on: emitter.on.bind(emitter),
    } as unknown as Response;
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should generate a new request ID when none is provided", () => {
    getHeader.mockReturnValue(undefined);

    middleware.use(req, res, next);

    expect(typeof req.headers[REQUEST_ID_HEADER]).toBe("string");
    expect(req.headers[REQUEST_ID_HEADER]).toHaveLength(36);
    expect(setHeader).toHaveBeenCalledWith(REQUEST_ID_HEADER, req.headers[REQUEST_ID_HEADER]);
    expect(next).toHaveBeenCalledTimes(1);
  });

  it("should preserve an existing request ID from the header", () => {
    getHeader.mockReturnValue("caller-request-id");

    middleware.use(req, res, next);

    expect(req.headers[REQUEST_ID_HEADER]).toBe("caller-request-id");
    expect(setHeader).toHaveBeenCalledWith(REQUEST_ID_HEADER, "caller-request-id");
    expect(next).toHaveBeenCalledTimes(1);
  });

  it("should log the request once the response finishes", () => {
    const debug = vi.spyOn(Logger.prototype, "debug").mockImplementation(() => undefined);
    getHeader.mockReturnValue("caller-request-id");

    middleware.use(req, res, next);
    expect(debug).not.toHaveBeenCalled();

    emitter.emit("finish");

    expect(debug).toHaveBeenCalledTimes(1);
    expect(debug).toHaveBeenCalledWith(
      expect.stringMatching(/^POST \/routes 200 - \d+ms \[caller-request-id\]$/),
    );
  });
});
