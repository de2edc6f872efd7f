import { request as httpRequest } from "node:http";
import { request as httpsRequest } from "node:https";
import { URL } from "node:url";

export interface HttpRequestOptions {
  readonly headers?: Record<string, string | number | undefined>;
  readonly timeoutMs?: number;
}

export interface HttpResponse {
  readonly statusCode: number;
  readonly body: string;
  readonly headers: Record<string, string | string[] | undefined>;
}

export interface HttpClient {
  post(url: string, body: string, options?: HttpRequestOptions): Promise<HttpResponse>;
}

export class HttpStatusError extends Error {
  public readonly statusCode: number;

  public constructor(statusCode: number, url: string, body: string) {
    super(`HTTP ${statusCode} from ${url}: ${body.slice(0, 200)}`);
    this.name = "HttpStatusError";
    this.statusCode = statusCode;
  }
}

export const isSuccessStatus = (statusCode: number): boolean => statusCode >= 200 && statusCode < 300;

const send = (url: string, body: string, options: HttpRequestOptions): Promise<HttpResponse> => {
  const target = new URL(url);
  const requestFactory = target.protocol === "http:" ? httpRequest : httpsRequest;
  const headers: Record<string, string | number> = {};
  for (const [key, value] of Object.entries(options.headers ?? {})) {
    if (value !== undefined) {
      headers[key] = value;
    }
  }
  headers["Content-Length"] = Buffer.byteLength(body);

  return new Promise<HttpResponse>((resolve, reject) => {
    const req = requestFactory(
      {
        method: "POST",
        hostname: target.hostname,
        path: `${target.pathname}${target.search}`,
        port: target.port || undefined,
        headers,
      },
      (res) => {
        const chunks: Buffer[] = [];
        res.on("data", (chunk: Buffer) => {
          chunks.push(chunk);
        });
        res.on("error", (error) => reject(error));
        res.on("end", () => {
          resolve({
            statusCode: res.statusCode ?? 0,
            body: Buffer.concat(chunks).toString("utf-8"),
            headers: res.headers,
          });
        });
      },
    );

    req.on("error", (error) => reject(error));

    if (options.timeoutMs) {
      req.setTimeout(options.timeoutMs, () => {
        req.destroy(new Error("request timed out"));
      });
    }

    req.write(body);
    req.end();
  });
};

/**
 * Minimal HTTP client wrapper so market-data clients can be tested without real network calls.
 */
export const createHttpClient = (): HttpClient => {
  return {
    post: (url, body, options = {}) => send(url, body, options),
  };
};
