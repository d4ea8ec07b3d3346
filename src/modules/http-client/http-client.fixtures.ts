import { HttpStatus } from "@nestjs/common";
import { AxiosError, AxiosHeaders, type InternalAxiosRequestConfig } from "axios";
import { vi } from "vitest";
import { HttpClientService } from "./http-client.service";

export type MockAxiosInstance = {
  post: ReturnType<typeof vi.fn>;
  get: ReturnType<typeof vi.fn>;
  interceptors: {
    request: { use: ReturnType<typeof vi.fn> };
    response: { use: ReturnType<typeof vi.fn> };
  };
};

/**
 * Create a mock AxiosInstance for testing
 */
export function createMockAxiosInstance(): MockAxiosInstance {
  return {
    post: vi.fn(),
    get: vi.fn(),
    interceptors: {
      request: { use: vi.fn() },
      response: { use: vi.fn() },
    },
  };
}

/**
 * Create a mock HttpClientService whose createClient hands out the given axios mock.
 * handleError delegates to the real classifier so services log what they would in production.
 */
export function createMockHttpClientService(mockAxiosInstance: MockAxiosInstance = createMockAxiosInstance()): {
  createClient: ReturnType<typeof vi.fn>;
  handleError: ReturnType<typeof vi.fn>;
} {
  const real = new HttpClientService();

  return {
    createClient: vi.fn().mockReturnValue(mockAxiosInstance),
    handleError: vi.fn((error: unknown, operation: string, serviceName: string) =>
      real.handleError(error, operation, serviceName),
    ),
  };
}

const HTTP_STATUS_TEXTS: Partial<Record<HttpStatus, string>> = {
  [HttpStatus.BAD_REQUEST]: "Bad Request",
  [HttpStatus.FORBIDDEN]: "Forbidden",
  [HttpStatus.TOO_MANY_REQUESTS]: "Too Many Requests",
  [HttpStatus.INTERNAL_SERVER_ERROR]: "Internal Server Error",
  [HttpStatus.SERVICE_UNAVAILABLE]: "Service Unavailable",
};

function createRequestConfig(): InternalAxiosRequestConfig {
  return { headers: new AxiosHeaders() };
}

/**
 * Create an AxiosError carrying a provider response (non-2xx status)
 */
export function createAxiosErrorWithResponse<T = unknown>(
  status: HttpStatus,
  data: T,
): AxiosError<T> {
  const statusText = HTTP_STATUS_TEXTS[status] ?? "Error";
  const config = createRequestConfig();
  return new AxiosError<T>(statusText, AxiosError.ERR_BAD_RESPONSE, config, {}, {
    status,
    statusText,
    data,
    headers: {},
    config,
  });
}

/**
 * Create an AxiosError for a request that never got a response
 * (connection refused, DNS failure, socket reset)
 */
export function createAxiosErrorWithRequest(message: string, code = "ECONNREFUSED"): AxiosError {
  return new AxiosError(message, code, createRequestConfig(), {});
}

/**
 * Create an AxiosError for a request aborted by the client timeout
 */
export function createAxiosTimeoutError(timeoutMs: number): AxiosError {
  return new AxiosError(
    `timeout of ${timeoutMs}ms exceeded`,
    AxiosError.ECONNABORTED,
    createRequestConfig(),
    {},
  );
}
