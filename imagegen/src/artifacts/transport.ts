import type { Readable } from "node:stream";
import { Agent, request } from "undici";

export type HttpResponse = {
  statusCode: number;
  body: Readable;
};

/** Streaming GET. Implementations must not buffer the body. */
export type HttpTransport = (url: string) => Promise<HttpResponse>;

const MAX_REDIRECTIONS = 5;

/** Transport on undici; TLS verification follows `sslVerify`, both timeouts follow `timeoutMs`. */
export function createHttpTransport(opts: { sslVerify: boolean; timeoutMs: number }): HttpTransport {
  const dispatcher = new Agent({
    connect: { rejectUnauthorized: opts.sslVerify },
    headersTimeout: opts.timeoutMs,
    bodyTimeout: opts.timeoutMs,
  });

  return async (url) => {
    const res = await request(url, { method: "GET", dispatcher, maxRedirections: MAX_REDIRECTIONS });
    return { statusCode: res.statusCode, body: res.body };
  };
}
