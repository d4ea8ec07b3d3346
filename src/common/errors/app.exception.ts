import { HttpException, HttpStatus } from "@nestjs/common";
import type { ProblemDetails } from "./problem-details.interface";

export interface AppExceptionOptions {
  title?: string;
}

export type AppProblemDetails = ProblemDetails & {
  errorCode: string;
};

/**
 * Base exception class for all application-specific errors.
 * The response body follows RFC 7807 with the error code kept as `type`
 * and repeated as `errorCode` for clients that key on it.
 *
 * Each module defines its own error codes next to its domain logic
 * (e.g. `GoogleMapsErrorCode`).
 */
export class AppException extends HttpException {
  constructor(
    public readonly errorCode: string,
    message: string,
    status: HttpStatus,
    options: AppExceptionOptions = {},
  ) {
    const body: AppProblemDetails = {
      type: errorCode,
      title: options.title ?? errorCode,
      status,
      detail: message,
      errorCode,
    };
    super(body, status);
    this.message = message;
  }

  getErrorCode(): string {
    return this.errorCode;
  }
}
