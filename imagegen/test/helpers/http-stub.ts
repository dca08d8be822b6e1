import { Readable } from "node:stream";
import type { HttpTransport } from "../../src/artifacts/transport.js";

/**
 * In-process stand-in for the HTTP transport: serves fixed bodies by URL,
 * 404 for anything else, and records every requested URL.
 */
export function stubTransport(files: Record<string, string | Buffer>): { transport: HttpTransport; calls: string[] } {
  const calls: string[] = [];
  const transport: HttpTransport = async (url) => {
    calls.push(url);
    const body = files[url];
    if (body === undefined) {
      return { statusCode: 404, body: Readable.from([Buffer.from("not found")]) };
    }
    return { statusCode: 200, body: Readable.from([Buffer.from(body)]) };
  };
  return { transport, calls };
}
