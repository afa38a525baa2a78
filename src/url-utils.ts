// URL Parser Helper Functions for bilibili video pages

const BVID_PATTERN = /^BV[0-9A-Za-z]{10}$/;
const AVID_PATTERN = /^av\d+$/i;

/**
 * Drops the query string. Links copied from the share button end in
 * `?spm_id_from=...&vd_source=...`, which never identifies the video.
 */
export function stripQuery(url: string): string {
  const q = url.indexOf("?");
  return q === -1 ? url : url.substring(0, q);
}

/**
 * Tests if URL points at a bilibili video page.
 */
export function isBilibiliUrl(url: string): boolean {
  return /^https?:\/\/(www\.|m\.)?bilibili\.com\/video\//.test(stripQuery(url));
}

/**
 * Extracts the video ID from a bare id or a video page URL.
 */
export function extractVideoId(input: string): string | null {
  const trimmed = input.trim();

  // Bare id: BV1xx411c7mD or av170001
  if (BVID_PATTERN.test(trimmed) || AVID_PATTERN.test(trimmed)) {
    return trimmed;
  }

  if (!isBilibiliUrl(trimmed)) {
    return null;
  }

  // Page URL: /video/ID/
  const match = stripQuery(trimmed).match(/\/video\/([^/?#]+)/);
  if (!match) return null;

  const id = match[1];
  return BVID_PATTERN.test(id) || AVID_PATTERN.test(id) ? id : null;
}

/**
 * Builds the page URL the metadata is scraped from.
 */
export function toVideoPageUrl(videoId: string): string {
  return `https://www.bilibili.com/video/${videoId}/`;
}

/**
 * Builds the play-url API endpoint for pages that only embed the initial state.
 * fnval=4048 asks for every DASH stream kind.
 */
export function toPlayUrlApi(bvid: string, cid: number): string {
  return `https://api.bilibili.com/x/player/wbi/playurl?bvid=${encodeURIComponent(bvid)}&cid=${cid}&fnval=4048`;
}
