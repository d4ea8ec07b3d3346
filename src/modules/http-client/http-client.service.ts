import { Injectable, Logger } from "@nestjs/common";
import axios, { AxiosError, type AxiosInstance, type CreateAxiosDefaults } from "axios";

export const DEFAULT_HTTP_TIMEOUT_MS = 30000;

export interface HttpClientConfig {
  timeout?: number;
  headers?: Record<string, string>;
  serviceName: string; // For logging purposes
}

export type HttpErrorKind = "response" | "network" | "timeout" | "unexpected";

export interface ErrorInfo {
  kind: HttpErrorKind;
  message: string;
  status?: number;
  code?: string;
}

const TIMEOUT_CODES = new Set(["ECONNABORTED", "ETIMEDOUT"]);

@Injectable()
export class HttpClientService {
  private readonly logger = new Logger(HttpClientService.name);

  /**
   * Create a configured axios instance with interceptors for logging.
   * Requests are sent once; nothing here retries.
   */
  createClient(config: HttpClientConfig): AxiosInstance {
    const axiosConfig: CreateAxiosDefaults = {
      timeout: config.timeout ?? DEFAULT_HTTP_TIMEOUT_MS,
      headers: {
        "Content-Type": "application/json",
        ...config.headers,
      },
    };

    const client = axios.create(axiosConfig);

    client.interceptors.request.use(
      (requestConfig) => {
        this.logger.log(
          `${config.serviceName} request: ${requestConfig.method?.toUpperCase()} ${requestConfig.url}`,
        );
        return requestConfig;
      },
      (error: unknown) => {
        const normalized = error instanceof Error ? error : new Error(String(error));
        this.logger.error(`${config.serviceName} request error: ${normalized.message}`);
        return Promise.reject(normalized);
      },
    );

    client.interceptors.response.use(
      (response) => {
        this.logger.debug(
          `${config.serviceName} response: ${response.config.method?.toUpperCase()} ${response.config.url} - Status: ${response.status}`,
        );
        return response;
      },
      (error: unknown) => {
        const normalized = error instanceof Error ? error : new Error(String(error));
        this.logger.error(`${config.serviceName} response error: ${normalized.message}`);
        return Promise.reject(normalized);
      },
    );

    return client;
  }

  /**
   * Classify an axios failure without leaking the response body into logs.
   */
  handleError(error: unknown, operation: string, serviceName: string): ErrorInfo {
    const errorMessage = error instanceof Error ? error.message : "Unknown error";

    this.logger.error(`${serviceName} ${operation} failed: ${errorMessage}`);

    if (error instanceof AxiosError && error.response) {
      const { status, statusText } = error.response;
      return {
        kind: "response",
        message: `HTTP ${status}: ${statusText}`,
        status,
        code: error.code,
      };
    }

    if (error instanceof AxiosError && error.code && TIMEOUT_CODES.has(error.code)) {
      return {
        kind: "timeout",
        message: `Timeout: ${errorMessage}`,
        code: error.code,
      };
    }

    if (error instanceof AxiosError && error.request) {
      return {
        kind: "network",
        message: "Network error: Unable to reach server",
        code: this.resolveSystemCode(error) ?? "NETWORK_ERROR",
      };
    }

    return {
      kind: "unexpected",
      message: `Unexpected error: ${errorMessage}`,
      code: "UNEXPECTED_ERROR",
    };
  }

  private resolveSystemCode(error: AxiosError): string | undefined {
    if (error.code && error.code !== AxiosError.ERR_NETWORK) {
      return error.code;
    }
    const cause = error.cause;
    if (cause && typeof cause === "object" && "code" in cause && typeof cause.code === "string") {
      return cause.code;
    }
    return undefined;
  }
}
