import type { CheerioAPI } from "cheerio";
import { decodeCatalog, decodeInitialState } from "./decoder.js";
import { BiliError, formatError, isBiliError } from "./errors.js";
import type { Logger } from "./logger.js";
import { FetchOrchestrator } from "./orchestrator.js";
import {
  INITIAL_STATE_SOURCE,
  PLAYINFO_SOURCE,
  extractMetadata,
  extractTitle,
  loadDocument,
} from "./pageExtractor.js";
import { availableQualities, findQualityId, resolveSelection } from "./resolver.js";
import type { Transport } from "./transport.js";
import type {
  BatchReport,
  DownloaderOptions,
  QualityCatalog,
  QualityPicker,
  ResolvedSelection,
} from "./types.js";
import { extractVideoId, toPlayUrlApi, toVideoPageUrl } from "./url-utils.js";

// Downloader Class

export class Downloader {
  readonly downloadDir: string;
  private readonly transport: Transport;
  private readonly logger: Logger;
  private readonly quality?: string;
  private readonly qualityPicker?: QualityPicker;
  private readonly orchestrator: FetchOrchestrator;

  constructor(options: DownloaderOptions) {
    this.transport = options.transport;
    this.logger = options.logger;
    this.downloadDir = options.downloadDir ?? "download";
    this.quality = options.quality;
    this.qualityPicker = options.qualityPicker;
    this.orchestrator = new FetchOrchestrator({
      transport: options.transport,
      logger: options.logger,
      ffmpegPath: options.ffmpegPath,
    });
  }

  /**
   * Fetches and parses the video page. Accepts a bare id or a page URL.
   */

  async fetchPage(input: string): Promise<CheerioAPI> {
    const videoId = extractVideoId(input);
    if (!videoId) {
      throw new BiliError("INVALID_VIDEO_ID", `'${input}' is not a video id or video URL`);
    }

    const body = await this.transport.fetchBody(toVideoPageUrl(videoId));
    return loadDocument(body.toString("utf8"));
  }

  /**
   * Reads the quality catalog from the page.
   *
   * Priority:
   * 1. `window.__playinfo__` emitted as the whole script block
   * 2. `window.__INITIAL_STATE__` inside a larger script, then the play-url API
   */

  async fetchCatalog($: CheerioAPI): Promise<QualityCatalog> {
    try {
      return decodeCatalog(extractMetadata($, PLAYINFO_SOURCE, this.logger));
    } catch (error) {
      if (!isBiliError(error, "METADATA_NOT_FOUND")) {
        throw error;
      }
      this.logger.verbose("no inline play info, falling back to the play-url API");
    }

    const ref = decodeInitialState(extractMetadata($, INITIAL_STATE_SOURCE, this.logger));
    this.logger.debug(`bvid=${ref.bvid} cid=${ref.cid}`);

    const body = await this.transport.fetchBody(toPlayUrlApi(ref.bvid, ref.cid));
    return decodeCatalog(body.toString("utf8"));
  }

  /**
   * Resolves a video id to its title and the video/audio URLs to download.
   */

  async resolve(input: string): Promise<ResolvedSelection> {
    const $ = await this.fetchPage(input);
    const title = extractTitle($);
    this.logger.info(`title found as '${title}'`);

    const catalog = await this.fetchCatalog($);
    const qualityId = await this.chooseQuality(catalog);
    const selection = resolveSelection(catalog, title, qualityId);

    this.logger.info(`use quality: ${selection.qualityLabel}`);
    this.logger.verbose(`video url for '${selection.qualityLabel}' is '${selection.videoUrl}'`);
    this.logger.verbose(`audio url is '${selection.audioUrl}'`);
    return selection;
  }

  /**
   * Downloads one video and returns the merged file's path.
   */

  async download(input: string): Promise<string> {
    const selection = await this.resolve(input);
    return this.orchestrator.run(selection, this.downloadDir);
  }

  /**
   * Downloads every id in order. A failure is logged and recorded, and the batch moves on.
   */

  async downloadAll(inputs: string[]): Promise<BatchReport> {
    const report: BatchReport = { succeeded: [], failed: [] };

    for (const videoId of inputs) {
      try {
        await this.download(videoId);
        report.succeeded.push(videoId);
      } catch (error) {
        this.logger.fatal(`failed to download '${videoId}'`);
        this.logger.fatal(formatError(error));
        report.failed.push({ videoId, error });
      }
    }

    return report;
  }

  // Private Helper Methods

  /**
   * Explicit quality first, then the interactive picker; undefined means best.
   */

  private async chooseQuality(catalog: QualityCatalog): Promise<number | undefined> {
    if (this.quality !== undefined) {
      return findQualityId(catalog, this.quality);
    }
    if (this.qualityPicker) {
      return this.qualityPicker(availableQualities(catalog));
    }
    return undefined;
  }
}

export default Downloader;

export * from "./config.js";
export * from "./decoder.js";
export * from "./errors.js";
export * from "./logger.js";
export * from "./merge.js";
export * from "./orchestrator.js";
export * from "./pageExtractor.js";
export * from "./resolver.js";
export * from "./scriptLocator.js";
export * from "./transport.js";
export * from "./types.js";
export * from "./url-utils.js";
