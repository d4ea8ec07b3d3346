import { createServer, type IncomingHttpHeaders, type Server } from "node:http";
import { type INestApplication } from "@nestjs/common";
import { HttpAdapterHost } from "@nestjs/core";
import { Test } from "@nestjs/testing";
import { AppModule } from "../src/app.module";
import { GlobalExceptionFilter } from "../src/common/filters/global-exception.filter";
import type { GoogleMapsContext } from "../src/modules/google-maps/google-maps.interface";
import { GOOGLE_MAPS_CONTEXT } from "../src/modules/google-maps/google-maps.tokens";

export interface RecordedRequest {
  method?: string;
  url?: string;
  headers: IncomingHttpHeaders;
  body: unknown;
}

interface StubResponse {
  status: number;
  body: string;
}

/**
 * In-process stand-in for the Google Maps endpoints. Records every request
 * and answers with whatever was queued for its path.
 */
export class FakeGoogleMapsServer {
  readonly requests: RecordedRequest[] = [];
  private readonly responses = new Map<string, StubResponse>();
  private server?: Server;
  private port = 0;

  async start(): Promise<void> {
    this.server = createServer((req, res) => {
      const chunks: Buffer[] = [];
      req.on("data", (chunk: Buffer) => chunks.push(chunk));
      req.on("end", () => {
        const raw = Buffer.concat(chunks).toString("utf8");
        this.requests.push({
          method: req.method,
          url: req.url,
          headers: req.headers,
          body: raw.length > 0 ? JSON.parse(raw) : undefined,
        });

        const stub = this.responses.get(req.url ?? "") ?? { status: 404, body: "{}" };
        res.writeHead(stub.status, { "Content-Type": "application/json" });
        res.end(stub.body);
      });
    });

    const server = this.server;
    await new Promise<void>((resolve) => {
      server.listen(0, "127.0.0.1", () => {
        const address = server.address();
        if (address && typeof address !== "string") {
          this.port = address.port;
        }
        resolve();
      });
    });
  }

  async stop(): Promise<void> {
    const server = this.server;
    if (!server) {
      return;
    }
    await new Promise<void>((resolve, reject) => {
      server.close((error) => {
        if (error) {
          reject(error);
          return;
        }
        resolve();
      });
    });
  }

  url(path: string): string {
    return `http://127.0.0.1:${this.port}${path}`;
  }

  respondWith(path: string, status: number, body: unknown): void {
    this.responses.set(path, { status, body: JSON.stringify(body) });
  }

  respondWithRaw(path: string, status: number, body: string): void {
    this.responses.set(path, { status, body });
  }

  reset(): void {
    this.requests.length = 0;
    this.responses.clear();
  }
}

/**
 * Reserve a port on loopback and release it so connections to it are refused.
 */
export async function getClosedPortUrl(path: string): Promise<string> {
  const server = createServer();
  const port = await new Promise<number>((resolve) => {
    server.listen(0, "127.0.0.1", () => {
      const address = server.address();
      resolve(address && typeof address !== "string" ? address.port : 0);
    });
  });
  await new Promise<void>((resolve) => server.close(() => resolve()));
  return `http://127.0.0.1:${port}${path}`;
}

export const PLACES_PATH = "/v1/places:searchText";
export const ROUTES_PATH = "/directions/v2:computeRoutes";

/**
 * Boot the full application with the provider context pointed at the given endpoints.
 */
export async function createTestApp(
  context: Pick<GoogleMapsContext, "placesUrl" | "routesUrl">,
): Promise<INestApplication> {
  const moduleFixture = await Test.createTestingModule({
    imports: [AppModule],
  })
    .overrideProvider(GOOGLE_MAPS_CONTEXT)
    .useValue({
      apiKey: "test-api-key",
      timeoutMs: 5000,
      ...context,
    } satisfies GoogleMapsContext)
    .compile();

  const app = moduleFixture.createNestApplication({ logger: false });
  const httpAdapterHost = app.get(HttpAdapterHost);
  app.useGlobalFilters(new GlobalExceptionFilter(httpAdapterHost));

  await app.init();
  return app;
}
