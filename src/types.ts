// TypeScript interfaces for page metadata and the play-url API

import type { Logger } from "./logger.js";
import type { Transport } from "./transport.js";

// Raw wire shapes, as embedded in the page or returned by the API

export interface PlayInfoJson {
  data: {
    accept_description: string[];
    accept_quality: number[];
    dash: {
      video: Array<{
        id: number;
        base_url: string;
        bandwidth: number;
      }>;
      audio: Array<{
        base_url: string;
        bandwidth: number;
      }>;
    };
  };
}

export interface InitialStateJson {
  videoData: {
    bvid: string;
    cid: number;
  };
}

// Decoded model

export interface RawVariant {
  qualityId?: number; // video only
  sourceUrl: string;
  bandwidth: number;
}

export interface QualityCatalog {
  readonly acceptedQualityIds: readonly number[]; // most-preferred first
  readonly acceptedLabels: readonly string[]; // index-aligned with acceptedQualityIds
  readonly videoVariants: readonly RawVariant[];
  readonly audioVariants: readonly RawVariant[];
}

export interface VideoRef {
  bvid: string;
  cid: number;
}

export interface QualityTier {
  id: number;
  label: string;
}

export interface ResolvedSelection {
  title: string;
  qualityId: number;
  qualityLabel: string;
  videoUrl: string;
  audioUrl: string;
}

// Options

export type QualityPicker = (tiers: QualityTier[]) => Promise<number>;

export interface DownloaderOptions {
  transport: Transport;
  logger: Logger;
  downloadDir?: string; // default: "download"
  ffmpegPath?: string; // default: "ffmpeg"
  quality?: string; // accepted quality id or exact label
  qualityPicker?: QualityPicker; // consulted when no quality is given
}

export interface BatchFailure {
  videoId: string;
  error: unknown;
}

export interface BatchReport {
  succeeded: string[];
  failed: BatchFailure[];
}
