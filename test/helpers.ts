import { mkdir, mkdtemp, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import chalk from "chalk";
import { Logger } from "../src/logger.js";
import type { Transport } from "../src/transport.js";
import type { QualityCatalog, RawVariant } from "../src/types.js";

chalk.level = 0;

export function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error("expected function to throw");
}

export function tempDir(prefix = "bilifetch-"): Promise<string> {
  return mkdtemp(join(tmpdir(), prefix));
}

export function recordingLogger(level = 7): { logger: Logger; lines: string[] } {
  const lines: string[] = [];
  return { logger: new Logger(level, (line) => lines.push(line)), lines };
}

export function makeCatalog(overrides: Partial<QualityCatalog> = {}): QualityCatalog {
  const videoVariants: RawVariant[] = [
    { qualityId: 120, sourceUrl: "v_1200", bandwidth: 1200 },
    { qualityId: 120, sourceUrl: "v_1201", bandwidth: 1201 },
    { qualityId: 116, sourceUrl: "v_116", bandwidth: 116 },
  ];
  const audioVariants: RawVariant[] = [
    { sourceUrl: "a1", bandwidth: 30280 },
    { sourceUrl: "a2", bandwidth: 30216 },
  ];
  return {
    acceptedQualityIds: [120, 116, 80],
    acceptedLabels: ["4K", "1080P60", "1080P"],
    videoVariants,
    audioVariants,
    ...overrides,
  };
}

export const PLAYINFO_JSON =
  '{"data":{"accept_description":["1080P"],"accept_quality":[80],"dash":{"video":[{"id":80,"base_url":"v1","bandwidth":100}],"audio":[{"base_url":"a1","bandwidth":50}]}}}';

/**
 * Writes an executable stand-in for ffmpeg that copies nothing and writes "merged"
 * to its last argument.
 */
export async function fakeFfmpeg(dir: string, body = 'for last; do :; done\nprintf merged > "$last"\n'): Promise<string> {
  const path = join(dir, "fake-ffmpeg.sh");
  await writeFile(path, `#!/bin/sh\n${body}`, { mode: 0o755 });
  return path;
}

type Reply = string | Error | { dir: true };

/**
 * In-memory Transport. Page bodies and download payloads are looked up by URL.
 */
export class FakeTransport implements Transport {
  readonly requested: string[] = [];
  private readonly replies: Map<string, Reply>;
  private readonly delays: Map<string, number>;

  constructor(replies: Record<string, Reply>, delays: Record<string, number> = {}) {
    this.replies = new Map(Object.entries(replies));
    this.delays = new Map(Object.entries(delays));
  }

  async fetchBody(url: string): Promise<Buffer> {
    const reply = await this.reply(url);
    if (typeof reply !== "string") {
      throw new Error(`${url} is not a body`);
    }
    return Buffer.from(reply, "utf8");
  }

  async downloadTo(url: string, path: string): Promise<void> {
    const reply = await this.reply(url);
    if (typeof reply === "string") {
      await writeFile(path, reply);
    } else {
      await mkdir(path, { recursive: true });
    }
  }

  private async reply(url: string): Promise<string | { dir: true }> {
    this.requested.push(url);
    const delay = this.delays.get(url);
    if (delay !== undefined) {
      await new Promise((resolve) => setTimeout(resolve, delay));
    }
    const reply = this.replies.get(url);
    if (reply === undefined) {
      throw new Error(`unexpected request to ${url}`);
    }
    if (reply instanceof Error) {
      throw reply;
    }
    return reply;
  }
}
