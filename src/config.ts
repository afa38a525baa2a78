import { readFile } from "node:fs/promises";
import { formatError } from "./errors.js";
import type { Logger } from "./logger.js";

export const DEFAULT_CONFIG_PATH = "./config.json";

export interface Config {
  sessData: string; // "SESSDATA" cookie; empty means anonymous (lower quality tiers only)
}

/**
 * Reads the session token from a JSON config file. The file is optional: anything
 * unreadable yields an empty token and a warning.
 */
export async function readConfig(path: string, logger: Logger): Promise<Config> {
  let contents: string;
  try {
    contents = await readFile(path, "utf8");
  } catch (error) {
    logger.warn(`config file '${path}' not found, high quality downloads are unavailable`);
    logger.debug(formatError(error));
    return { sessData: "" };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(contents);
  } catch (error) {
    logger.warn(`config file '${path}' is not valid JSON, high quality downloads are unavailable`);
    logger.debug(formatError(error));
    return { sessData: "" };
  }

  if (typeof parsed !== "object" || parsed === null) {
    logger.warn(`config file '${path}' must contain an object`);
    return { sessData: "" };
  }

  const sessData = "SESSDATA" in parsed ? parsed.SESSDATA : "sess_data" in parsed ? parsed.sess_data : undefined;
  if (typeof sessData !== "string") {
    logger.warn(`config file '${path}' has no string SESSDATA, high quality downloads are unavailable`);
    return { sessData: "" };
  }

  logger.debug(`SESSDATA read from '${path}'`);
  return { sessData };
}
