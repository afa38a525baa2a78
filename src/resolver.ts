// Stream selection over a decoded catalog. All inputs are already fetched and decoded,
// so every failure here means the page advertised something it does not carry.

import { BiliError } from "./errors.js";
import type { QualityCatalog, QualityTier, RawVariant, ResolvedSelection } from "./types.js";

/**
 * Index of the numerically largest accepted quality id. Ties keep the first.
 */
export function bestQualityIndex(catalog: QualityCatalog): number {
  let bestIdx = 0;
  for (const [idx, id] of catalog.acceptedQualityIds.entries()) {
    if (id > catalog.acceptedQualityIds[bestIdx]) {
      bestIdx = idx;
    }
  }
  return bestIdx;
}

/**
 * Variant with the strictly largest bandwidth. Ties keep the first.
 */
export function bestResource(candidates: readonly RawVariant[], what: string): RawVariant {
  if (candidates.length === 0) {
    throw new BiliError("RESOURCE_NOT_FOUND", `No ${what} stream available`);
  }

  let best = candidates[0];
  for (const candidate of candidates) {
    if (candidate.bandwidth > best.bandwidth) {
      best = candidate;
    }
  }
  return best;
}

/**
 * Human-readable label for a quality id, via the index-aligned accepted lists.
 */
export function qualityLabel(catalog: QualityCatalog, qualityId: number): string {
  const idx = catalog.acceptedQualityIds.indexOf(qualityId);
  const label = idx === -1 ? undefined : catalog.acceptedLabels[idx];

  if (label === undefined) {
    throw new BiliError("QUALITY_LABEL_MISSING", `No description found for quality id ${qualityId}`);
  }
  return label;
}

/**
 * Quality tiers that actually have a video stream, highest id first.
 */
export function availableQualities(catalog: QualityCatalog): QualityTier[] {
  const ids = new Set<number>();
  for (const variant of catalog.videoVariants) {
    if (variant.qualityId !== undefined) ids.add(variant.qualityId);
  }

  return [...ids]
    .sort((a, b) => b - a)
    .map((id) => ({ id, label: qualityLabel(catalog, id) }));
}

/**
 * Maps user input (an accepted id or an exact label) to a quality id.
 */
export function findQualityId(catalog: QualityCatalog, input: string): number {
  const trimmed = input.trim();

  if (/^\d+$/.test(trimmed)) {
    const id = Number(trimmed);
    if (catalog.acceptedQualityIds.includes(id)) return id;
  }

  const idx = catalog.acceptedLabels.indexOf(trimmed);
  if (idx !== -1) return catalog.acceptedQualityIds[idx];

  throw new BiliError(
    "UNKNOWN_QUALITY",
    `Unknown quality '${input}', expected one of: ${catalog.acceptedLabels.join(", ")}`,
  );
}

/**
 * Picks the video and audio URLs for a tier (default: the best accepted quality).
 */
export function resolveSelection(
  catalog: QualityCatalog,
  title: string,
  requested?: number,
): ResolvedSelection {
  if (requested === undefined && catalog.acceptedQualityIds.length === 0) {
    throw new BiliError("RESOURCE_NOT_FOUND", "Page advertises no quality tiers");
  }

  // Every variant must belong to an advertised tier, whichever tier is chosen
  for (const variant of catalog.videoVariants) {
    if (variant.qualityId !== undefined) qualityLabel(catalog, variant.qualityId);
  }

  const qualityId = requested ?? catalog.acceptedQualityIds[bestQualityIndex(catalog)];
  const label = qualityLabel(catalog, qualityId);

  const video = bestResource(
    catalog.videoVariants.filter((v) => v.qualityId === qualityId),
    `video (${label})`,
  );
  const audio = bestResource(catalog.audioVariants, "audio");

  return {
    title,
    qualityId,
    qualityLabel: label,
    videoUrl: video.sourceUrl,
    audioUrl: audio.sourceUrl,
  };
}
