import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
  Logger,
} from "@nestjs/common";
import { HttpAdapterHost } from "@nestjs/core";
import type { Request } from "express";
import { AppException } from "../errors/app.exception";
import type { ProblemDetails } from "../errors/problem-details.interface";

type ProblemResponseBody = ProblemDetails & Record<string, unknown>;

const GENERIC_SERVER_ERROR = "Internal server error";

/**
 * Global exception filter that turns every exception into an RFC 7807 body.
 *
 * - AppException bodies are already problem documents and pass through.
 * - Other HttpExceptions (including ZodValidationPipe failures) are normalised.
 * - Anything else becomes a generic 500 so internal messages never reach the caller.
 */
@Catch()
export class GlobalExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(GlobalExceptionFilter.name);

  constructor(private readonly httpAdapterHost: HttpAdapterHost) {}

  catch(exception: unknown, host: ArgumentsHost): void {
    const { httpAdapter } = this.httpAdapterHost;

    const ctx = host.switchToHttp();
    const request = ctx.getRequest<Request>();
    const instance = String(httpAdapter.getRequestUrl(request));

    const status =
      exception instanceof HttpException
        ? exception.getStatus()
        : HttpStatus.INTERNAL_SERVER_ERROR;

    const errorCode = exception instanceof AppException ? exception.getErrorCode() : undefined;

    this.logError(exception, request, status, errorCode);

    const responseBody: ProblemResponseBody = {
      ...this.toProblem(exception, status),
      instance,
    };

    httpAdapter.reply(ctx.getResponse(), responseBody, status);
  }

  private toProblem(exception: unknown, status: number): ProblemResponseBody {
    if (!(exception instanceof HttpException)) {
      return {
        type: "INTERNAL_SERVER_ERROR",
        title: "Internal Server Error",
        status,
        detail: GENERIC_SERVER_ERROR,
      };
    }

    const response = exception.getResponse();
    const statusName = HttpStatus[status] ?? "ERROR";

    if (typeof response === "string") {
      return { type: statusName, title: statusName, status, detail: response };
    }

    if (this.isProblemDetails(response)) {
      return response;
    }

    const { message, error: _error, statusCode: _statusCode, ...rest } = Object.fromEntries(
      Object.entries(response),
    );

    return {
      ...rest,
      type: statusName,
      title: statusName,
      status,
      detail: this.extractMessage(message) ?? exception.message,
    };
  }

  private isProblemDetails(value: unknown): value is ProblemResponseBody {
    return (
      typeof value === "object" &&
      value !== null &&
      "type" in value &&
      typeof value.type === "string" &&
      "title" in value &&
      typeof value.title === "string" &&
      "status" in value &&
      typeof value.status === "number" &&
      "detail" in value &&
      typeof value.detail === "string"
    );
  }

  private extractMessage(message: unknown): string | undefined {
    if (typeof message === "string") {
      return message;
    }
    if (Array.isArray(message)) {
      return message.map(String).join(", ");
    }
    return undefined;
  }

  private logError(
    exception: unknown,
    request: Request,
    status: number,
    errorCode?: string,
  ): void {
    const url = request.url || "unknown";
    const method = request.method || "unknown";
    const errorCodePrefix = errorCode ? `[${errorCode}] ` : "";

    if (status >= 500) {
      if (exception instanceof Error) {
        this.logger.error(`${errorCodePrefix}${method} ${url} - ${exception.message}`, exception.stack);
      } else {
        this.logger.error(`${errorCodePrefix}${method} ${url} - Unknown error`, String(exception));
      }
    } else if (status >= 400) {
      const message = exception instanceof Error ? exception.message : String(exception);
      this.logger.warn(`${errorCodePrefix}${method} ${url} - ${message}`);
    }
  }
}
