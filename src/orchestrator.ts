// orchestrator.ts
// Downloads the chosen video and audio streams side by side, then merges them.
//
//   idle -> fetching -> merging -> succeeded
//              |           |
//              +-----------+-----> failed
//
// Merge never starts before both downloads have settled, and temporary files are only
// removed once nothing is writing to or reading from them.

import { mkdir, rm } from "node:fs/promises";
import { join } from "node:path";
import { BiliError, formatError, isBiliError } from "./errors.js";
import type { Logger } from "./logger.js";
import { mergeStreams, type MergeStep } from "./merge.js";
import type { Transport } from "./transport.js";
import type { ResolvedSelection } from "./types.js";

export type OrchestratorState = "idle" | "fetching" | "merging" | "succeeded" | "failed";

export interface OrchestratorOptions {
  transport: Transport;
  logger: Logger;
  ffmpegPath?: string;
  merge?: MergeStep; // default: mergeStreams
}

export interface OutputPaths {
  videoPath: string;
  audioPath: string;
  outputPath: string;
}

const EXTENSION = "mp4";

/**
 * Output and temporary file names for a title inside the download directory.
 */
export function outputPaths(dir: string, title: string): OutputPaths {
  return {
    videoPath: join(dir, `${title}_video.${EXTENSION}`),
    audioPath: join(dir, `${title}_audio.${EXTENSION}`),
    outputPath: join(dir, `${title}.${EXTENSION}`),
  };
}

export class FetchOrchestrator {
  private readonly transport: Transport;
  private readonly logger: Logger;
  private readonly ffmpegPath: string;
  private readonly merge: MergeStep;
  private current: OrchestratorState = "idle";

  constructor(options: OrchestratorOptions) {
    this.transport = options.transport;
    this.logger = options.logger;
    this.ffmpegPath = options.ffmpegPath ?? "ffmpeg";
    this.merge = options.merge ?? mergeStreams;
  }

  get state(): OrchestratorState {
    return this.current;
  }

  /**
   * Fetches both streams, merges them and returns the output file path.
   */
  async run(selection: ResolvedSelection, downloadDir: string): Promise<string> {
    const paths = outputPaths(downloadDir, selection.title);

    try {
      this.current = "fetching";
      await this.prepareDir(downloadDir);
      this.logger.info(`downloading '${selection.title}' (${selection.qualityLabel})`);
      await this.fetchBoth(selection, paths);

      this.current = "merging";
      try {
        const output = await this.merge({ ffmpegPath: this.ffmpegPath, ...paths });
        this.logger.verbose(`ffmpeg stdout: ${output.stdout}`);
        this.logger.verbose(`ffmpeg stderr: ${output.stderr}`);
      } finally {
        await this.cleanup(paths);
      }

      this.current = "succeeded";
      this.logger.info(`${selection.title} downloaded to '${paths.outputPath}'`);
      return paths.outputPath;
    } catch (error) {
      this.current = "failed";
      throw error;
    }
  }

  private async prepareDir(downloadDir: string): Promise<void> {
    try {
      await mkdir(downloadDir, { recursive: true });
    } catch (error) {
      throw new BiliError("FETCH_ERROR", `Can't create download directory '${downloadDir}': ${formatError(error)}`, {
        cause: error,
      });
    }
  }

  /**
   * Starts both downloads together and waits for both. Rethrows the first failure
   * observed after removing whatever either download left behind.
   */
  private async fetchBoth(selection: ResolvedSelection, paths: OutputPaths): Promise<void> {
    const failures: unknown[] = [];
    const track = (what: string, promise: Promise<void>): Promise<void> =>
      promise.catch((error: unknown) => {
        this.logger.debug(`${what} download failed: ${formatError(error)}`);
        failures.push(error);
      });

    await Promise.all([
      track("video", this.transport.downloadTo(selection.videoUrl, paths.videoPath)),
      track("audio", this.transport.downloadTo(selection.audioUrl, paths.audioPath)),
    ]);

    if (failures.length === 0) {
      return;
    }

    const firstError = failures[0];
    await this.cleanup(paths);
    if (isBiliError(firstError)) {
      throw firstError;
    }
    throw new BiliError("FETCH_ERROR", formatError(firstError), { cause: firstError });
  }

  /**
   * Removes the temporary inputs. Failures are logged only.
   */
  private async cleanup(paths: OutputPaths): Promise<void> {
    for (const path of [paths.videoPath, paths.audioPath]) {
      try {
        await rm(path, { force: true });
      } catch (error) {
        this.logger.warn(`failed to remove '${path}': ${formatError(error)}`);
      }
    }
  }
}
