/**
 * REST helpers for the endpoints without an ARM SDK client (Microsoft Graph,
 * Kudu, branding downloads). Responses are checked against TypeBox schemas.
 */

import type { Static, TSchema } from "@sinclair/typebox";
import { Type } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

export class HttpError extends Error {
  readonly statusCode: number;
  readonly code?: string;
  readonly url: string;

  constructor(statusCode: number, message: string, url: string, code?: string) {
    super(message);
    this.name = "HttpError";
    this.statusCode = statusCode;
    this.code = code;
    this.url = url;
    Error.captureStackTrace?.(this, HttpError);
  }
}

export type RequestOptions = {
  method?: "GET" | "POST" | "PUT" | "PATCH" | "DELETE";
  token?: string;
  json?: unknown;
  body?: Uint8Array;
  contentType?: string;
  headers?: Record<string, string>;
};

// Graph and ARM both wrap failures as { error: { code, message } }.
const errorBodySchema = Type.Object({
  error: Type.Object({ code: Type.Optional(Type.String()), message: Type.Optional(Type.String()) }),
});

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

async function describeFailure(response: Response, url: string): Promise<HttpError> {
  const text = await response.text();
  const parsed = parseJson(text);
  if (Value.Check(errorBodySchema, parsed)) {
    return new HttpError(
      response.status,
      parsed.error.message ?? `${response.status} ${response.statusText}`,
      url,
      parsed.error.code,
    );
  }
  const detail = text.trim() || response.statusText;
  return new HttpError(response.status, `${response.status} ${detail}`, url);
}

/** Issue a request, throwing `HttpError` on any non-2xx status. */
export async function request(url: string, options: RequestOptions = {}): Promise<Response> {
  const headers: Record<string, string> = { ...options.headers };
  if (options.token) headers.Authorization = `Bearer ${options.token}`;

  let body: string | Uint8Array | undefined;
  if (options.json !== undefined) {
    body = JSON.stringify(options.json);
    headers["Content-Type"] = "application/json";
  } else if (options.body) {
    body = options.body;
    headers["Content-Type"] = options.contentType ?? "application/octet-stream";
  }

  const response = await fetch(url, { method: options.method ?? "GET", headers, body });
  if (!response.ok) throw await describeFailure(response, url);
  return response;
}

/** Issue a request and validate the JSON response body. */
export async function requestJson<S extends TSchema>(url: string, schema: S, options?: RequestOptions): Promise<Static<S>> {
  const response = await request(url, options);
  const data: unknown = await response.json();
  if (!Value.Check(schema, data)) {
    const first = Value.Errors(schema, data).First();
    throw new HttpError(
      response.status,
      `Unexpected response shape from ${url}${first ? `: ${first.path} ${first.message}` : ""}`,
      url,
    );
  }
  return data;
}
