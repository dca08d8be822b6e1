import { randomUUID } from "node:crypto";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { pipeline } from "node:stream/promises";
import { errorMessage, FetchError } from "../errors.js";
import { silentLogger, type Logger } from "../logger.js";
import { type Artifact, resolveArtifactUrl } from "./artifact.js";
import { SUPPORTED_HASH_ALGORITHMS, verifyChecksum } from "./checksum.js";
import { createHttpTransport, type HttpResponse, type HttpTransport } from "./transport.js";

export const DEFAULT_FETCH_TIMEOUT_MS = 60_000;

const WRITE_CHUNK_SIZE = 64 * 1024;

export type ArtifactFetcherOptions = {
  /** Directory artifacts are staged into. */
  targetDir: string;
  sslVerify?: boolean;
  checkIntegrity?: boolean;
  /** Cache URL pattern (see resolveArtifactUrl). */
  artifactCache?: string;
  timeoutMs?: number;
  transport?: HttpTransport;
  logger?: Logger;
};

/**
 * Artifact fetcher — downloads declared artifacts into the target directory and
 * verifies every declared checksum.
 *
 * An artifact whose destination file already exists is reused as-is: no request
 * is made and its checksums are not re-verified.
 */
export class ArtifactFetcher {
  private readonly targetDir: string;
  private readonly checkIntegrity: boolean;
  private readonly artifactCache: string | undefined;
  private readonly transport: HttpTransport;
  private readonly logger: Logger;

  constructor(opts: ArtifactFetcherOptions) {
    this.targetDir = opts.targetDir;
    this.checkIntegrity = opts.checkIntegrity ?? true;
    this.artifactCache = opts.artifactCache || undefined;
    this.transport =
      opts.transport ??
      createHttpTransport({
        sslVerify: opts.sslVerify ?? true,
        timeoutMs: opts.timeoutMs ?? DEFAULT_FETCH_TIMEOUT_MS,
      });
    this.logger = opts.logger ?? silentLogger;
  }

  /** Destination path of an artifact inside the target directory. */
  destinationFor(artifact: Artifact): string {
    return path.join(this.targetDir, artifact.name);
  }

  async fetch(artifact: Artifact): Promise<string> {
    const destination = this.destinationFor(artifact);

    if (fs.existsSync(destination)) {
      this.logger.debug(`Using fetched artifact '${destination}' for '${artifact.name}'.`);
      return destination;
    }

    const url = resolveArtifactUrl(artifact, this.artifactCache);
    this.logger.debug(`Fetching '${url}' as ${destination}`);

    fs.mkdirSync(this.targetDir, { recursive: true });
    await this.download(url, destination);
    this.verify(artifact, destination);

    return destination;
  }

  /**
   * Download an arbitrary file (custom template, additional script).
   * Without a destination the file lands in a fresh temporary path.
   */
  async fetchFile(url: string, destination?: string): Promise<string> {
    const target = destination ?? path.join(os.tmpdir(), `${randomUUID()}-imagegen`);

    this.logger.info(`Fetching '${url}' file...`);
    this.logger.info(`Fetched file will be saved as '${target}'...`);

    fs.mkdirSync(path.dirname(target), { recursive: true });
    await this.download(url, target);
    return target;
  }

  private verify(artifact: Artifact, filePath: string): void {
    if (!this.checkIntegrity) return;

    for (const algorithm of SUPPORTED_HASH_ALGORITHMS) {
      const expected = artifact.sums[algorithm];
      if (expected === undefined) continue;
      this.logger.debug(`Checking '${artifact.name}' ${algorithm} hash...`);
      verifyChecksum(filePath, algorithm, expected);
    }
  }

  private async download(url: string, destination: string): Promise<void> {
    let response: HttpResponse;
    try {
      response = await this.transport(url);
    } catch (e) {
      throw new FetchError(`Could not download file from ${url}: ${errorMessage(e)}`, url);
    }

    if (response.statusCode !== 200) {
      response.body.destroy();
      throw new FetchError(`Could not download file from ${url} (HTTP ${response.statusCode})`, url);
    }

    try {
      await pipeline(response.body, fs.createWriteStream(destination, { highWaterMark: WRITE_CHUNK_SIZE }));
    } catch (e) {
      // a truncated file would otherwise be trusted on the next run
      fs.rmSync(destination, { force: true });
      throw new FetchError(`Could not download file from ${url}: ${errorMessage(e)}`, url);
    }
  }
}
