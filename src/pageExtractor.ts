// Metadata and title extraction from a parsed video page

import { load, type CheerioAPI } from "cheerio";
import { BiliError, formatError, isBiliError } from "./errors.js";
import type { Logger } from "./logger.js";
import { locateAssignment } from "./scriptLocator.js";

/**
 * Where a page keeps a piece of metadata, and how to pull it out.
 *
 * - "prefix": the script block is nothing but `<global>.<property>=<json>`; the
 *   remainder after the literal prefix is returned as is.
 * - "ast": the assignment sits among other statements; the block is parsed and the
 *   right-hand side's source text is returned.
 */
export interface MetadataSource {
  mode: "prefix" | "ast";
  global: string;
  property: string;
}

export const PLAYINFO_SOURCE: MetadataSource = {
  mode: "prefix",
  global: "window",
  property: "__playinfo__",
};

export const INITIAL_STATE_SOURCE: MetadataSource = {
  mode: "ast",
  global: "window",
  property: "__INITIAL_STATE__",
};

// Blocks whose type marks them as data (application/json, application/ld+json) never run
const EXECUTABLE_SCRIPTS = "script:not([type*=json])";

export function loadDocument(html: string): CheerioAPI {
  return load(html);
}

/**
 * Replaces characters that cannot appear in a file name.
 */
export function sanitizeFileName(name: string): string {
  return name.replace(/[/\\]/g, "|");
}

/**
 * Returns the text of the page's only <h1>. Zero or several <h1> elements are errors.
 */
export function extractTitle($: CheerioAPI): string {
  const headings = $("h1");

  if (headings.length === 0) {
    throw new BiliError("TITLE_MISSING", "No <h1> tag found in the page");
  }
  if (headings.length > 1) {
    throw new BiliError("TITLE_AMBIGUOUS", `Found ${headings.length} <h1> tags in the page`);
  }

  return sanitizeFileName(headings.first().text());
}

/**
 * Returns raw JSON text for the given metadata source from the first script block that
 * yields it, in document order.
 */
export function extractMetadata($: CheerioAPI, source: MetadataSource, logger: Logger): string {
  const name = `${source.global}.${source.property}`;
  const scripts = $(source.mode === "ast" ? EXECUTABLE_SCRIPTS : "script").toArray();

  for (const [index, element] of scripts.entries()) {
    const content = $(element).text();

    if (source.mode === "prefix") {
      const script = content.trim();
      const prefix = `${name}=`;
      if (script.startsWith(prefix)) {
        logger.debug(`${name} found by prefix in script #${index}`);
        return script.slice(prefix.length);
      }
      continue;
    }

    try {
      const span = locateAssignment(content, source);
      logger.debug(`${name} found in script #${index} at [${span.start}, ${span.end})`);
      return span.text;
    } catch (error) {
      if (isBiliError(error, "PARSE_ERROR") || isBiliError(error, "ASSIGNMENT_NOT_FOUND")) {
        logger.debug(`script #${index} skipped: ${formatError(error)}`);
        continue;
      }
      throw error;
    }
  }

  throw new BiliError("METADATA_NOT_FOUND", `Can't find ${name} in any of ${scripts.length} script blocks`);
}
