import { createWriteStream } from "node:fs";
import { mkdir } from "node:fs/promises";
import { dirname } from "node:path";
import { pipeline } from "node:stream/promises";
import fetch, { type Response } from "node-fetch";
import { BiliError } from "./errors.js";
import type { Logger } from "./logger.js";

/**
 * The two network operations the pipeline depends on.
 */
export interface Transport {
  fetchBody(url: string): Promise<Buffer>;
  downloadTo(url: string, path: string): Promise<void>;
}

export interface CrawlerOptions {
  logger: Logger;
  sessData?: string; // login cookie, unlocks the higher quality tiers
  timeout?: number; // optional timeout (default: 10000 ms)
}

const USER_AGENT =
  "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36";
const REFERER = "https://www.bilibili.com";

// Crawler Class

export class Crawler implements Transport {
  private readonly logger: Logger;
  private readonly sessData: string;
  private readonly timeout: number;

  constructor(options: CrawlerOptions) {
    this.logger = options.logger;
    this.sessData = options.sessData ?? "";
    this.timeout = options.timeout ?? 10000;
  }

  /**
   * Request headers for both pages and media. The referer is required by the CDN.
   */

  headers(): Record<string, string> {
    let cookie = "CURRENT_QUALITY=32;";
    if (this.sessData !== "") {
      cookie += `SESSDATA=${this.sessData};`;
    }
    return {
      "user-agent": USER_AGENT,
      referer: REFERER,
      cookie,
    };
  }

  async fetchBody(url: string): Promise<Buffer> {
    const response = await this.request(url);
    try {
      return Buffer.from(await response.arrayBuffer());
    } catch (error) {
      throw new BiliError("FETCH_ERROR", `Failed reading body of '${url}'`, { cause: error });
    }
  }

  async downloadTo(url: string, path: string): Promise<void> {
    await mkdir(dirname(path), { recursive: true });
    this.logger.verbose(`downloading '${url}'`);

    const response = await this.request(url);
    if (!response.body) {
      throw new BiliError("FETCH_ERROR", `Empty response body for '${url}'`);
    }

    this.logger.verbose(`writing to '${path}'`);
    try {
      await pipeline(response.body, createWriteStream(path));
    } catch (error) {
      throw new BiliError("FETCH_ERROR", `Failed writing '${url}' to '${path}'`, { cause: error });
    }
  }

  // Private Helper Methods

  /**
   * Wraps fetch with AbortController for timeout handling. The timer covers the wait
   * for response headers; bodies stream for as long as they need.
   */

  private async request(url: string): Promise<Response> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeout);

    try {
      const response = await fetch(url, {
        headers: this.headers(),
        signal: controller.signal,
      });

      if (!response.ok) {
        throw new BiliError("FETCH_ERROR", `HTTP ${response.status}: ${response.statusText}`);
      }

      this.logger.verbose(`status for '${url}': ${response.status}`);
      return response;
    } catch (error) {
      if (error instanceof BiliError) {
        throw error;
      }
      if (error instanceof Error && error.name === "AbortError") {
        throw new BiliError("FETCH_ERROR", "Request timeout", { cause: error });
      }
      throw new BiliError("FETCH_ERROR", `Request to '${url}' failed`, { cause: error });
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
