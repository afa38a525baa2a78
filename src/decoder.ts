// decoder.ts
// Strict decoding of metadata JSON. Either the whole structure checks out or a
// DECODE_ERROR names the first offending field; unknown keys are ignored.

import { BiliError } from "./errors.js";
import type { InitialStateJson, PlayInfoJson, QualityCatalog, RawVariant, VideoRef } from "./types.js";

type JsonObject = { [key: string]: unknown };

function fail(path: string, expected: string, value: unknown): never {
  const actual = value === null ? "null" : Array.isArray(value) ? "array" : typeof value;
  throw new BiliError("DECODE_ERROR", `${path}: expected ${expected}, got ${actual}`, { path });
}

function isObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function object(value: unknown, path: string): JsonObject {
  if (!isObject(value)) fail(path, "object", value);
  return value;
}

function field(parent: JsonObject, key: string, path: string): unknown {
  if (!(key in parent)) {
    throw new BiliError("DECODE_ERROR", `${path}.${key}: missing required field`, {
      path: `${path}.${key}`,
    });
  }
  return parent[key];
}

function string(value: unknown, path: string): string {
  if (typeof value !== "string") fail(path, "string", value);
  return value;
}

function integer(value: unknown, path: string): number {
  if (typeof value !== "number" || !Number.isInteger(value)) fail(path, "integer", value);
  return value;
}

function unsigned(value: unknown, path: string): number {
  const n = integer(value, path);
  if (n < 0) {
    throw new BiliError("DECODE_ERROR", `${path}: expected unsigned integer, got ${n}`, { path });
  }
  return n;
}

function array<T>(value: unknown, path: string, item: (value: unknown, path: string) => T): T[] {
  if (!Array.isArray(value)) fail(path, "array", value);
  return value.map((entry, i) => item(entry, `${path}[${i}]`));
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new BiliError("DECODE_ERROR", `$: invalid JSON (${error instanceof Error ? error.message : String(error)})`, {
      path: "$",
      cause: error,
    });
  }
}

/**
 * Validates play-info JSON (page `__playinfo__` or play-url API body).
 */
export function decodePlayInfo(text: string): PlayInfoJson {
  const root = object(parseJson(text), "$");
  const data = object(field(root, "data", "$"), "$.data");

  const acceptDescription = array(
    field(data, "accept_description", "$.data"),
    "$.data.accept_description",
    string,
  );
  const acceptQuality = array(field(data, "accept_quality", "$.data"), "$.data.accept_quality", integer);

  if (acceptDescription.length !== acceptQuality.length) {
    throw new BiliError(
      "DECODE_ERROR",
      `$.data.accept_description: ${acceptDescription.length} labels for ${acceptQuality.length} quality ids`,
      { path: "$.data.accept_description" },
    );
  }

  const dash = object(field(data, "dash", "$.data"), "$.data.dash");

  const video = array(field(dash, "video", "$.data.dash"), "$.data.dash.video", (entry, path) => {
    const v = object(entry, path);
    return {
      id: integer(field(v, "id", path), `${path}.id`),
      base_url: string(field(v, "base_url", path), `${path}.base_url`),
      bandwidth: unsigned(field(v, "bandwidth", path), `${path}.bandwidth`),
    };
  });

  const audio = array(field(dash, "audio", "$.data.dash"), "$.data.dash.audio", (entry, path) => {
    const a = object(entry, path);
    return {
      base_url: string(field(a, "base_url", path), `${path}.base_url`),
      bandwidth: unsigned(field(a, "bandwidth", path), `${path}.bandwidth`),
    };
  });

  return {
    data: {
      accept_description: acceptDescription,
      accept_quality: acceptQuality,
      dash: { video, audio },
    },
  };
}

/**
 * Decodes play-info JSON into an immutable catalog.
 */
export function decodeCatalog(text: string): QualityCatalog {
  const { data } = decodePlayInfo(text);

  const videoVariants: RawVariant[] = data.dash.video.map((v) =>
    Object.freeze({ qualityId: v.id, sourceUrl: v.base_url, bandwidth: v.bandwidth }),
  );
  const audioVariants: RawVariant[] = data.dash.audio.map((a) =>
    Object.freeze({ sourceUrl: a.base_url, bandwidth: a.bandwidth }),
  );

  return Object.freeze({
    acceptedQualityIds: Object.freeze([...data.accept_quality]),
    acceptedLabels: Object.freeze([...data.accept_description]),
    videoVariants: Object.freeze(videoVariants),
    audioVariants: Object.freeze(audioVariants),
  });
}

/**
 * Decodes the page's `__INITIAL_STATE__` down to the ids the play-url API needs.
 */
export function decodeInitialState(text: string): VideoRef {
  const root = object(parseJson(text), "$");
  const videoData = object(field(root, "videoData", "$"), "$.videoData");

  const state: InitialStateJson = {
    videoData: {
      bvid: string(field(videoData, "bvid", "$.videoData"), "$.videoData.bvid"),
      cid: integer(field(videoData, "cid", "$.videoData"), "$.videoData.cid"),
    },
  };

  return { bvid: state.videoData.bvid, cid: state.videoData.cid };
}
