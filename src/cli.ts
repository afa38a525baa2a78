import { createInterface, type Interface } from "node:readline";
import type { Readable, Writable } from "node:stream";
import { DEFAULT_CONFIG_PATH, readConfig } from "./config.js";
import { BiliError, formatError } from "./errors.js";
import { Downloader } from "./index.js";
import { DEFAULT_LOG_LEVEL, Logger } from "./logger.js";
import { Crawler } from "./transport.js";
import type { BatchReport, QualityTier } from "./types.js";

export interface CliArgs {
  logLevel: number;
  selectQuality: boolean;
  quality?: string;
  outputDir: string;
  configPath: string;
  ffmpegPath: string;
  help: boolean;
  videoIds: string[];
}

const USAGE = `Usage: bilifetch [options] <video-id|url...>

Options:
  -l, --log-level <n>      verbosity, 0 (silent) to 7 (debug), default ${DEFAULT_LOG_LEVEL}
  -q, --quality <q>        quality id or label, default: best
  -s, --select-quality     choose the quality interactively
  -o, --output-dir <dir>   download directory, default: download
  -c, --config <path>      config file with SESSDATA, default: ${DEFAULT_CONFIG_PATH}
      --ffmpeg <path>      ffmpeg executable, default: ffmpeg
  -h, --help               show this help`;

function requireValue(flag: string, value: string | undefined): string {
  if (value === undefined || value.startsWith("-")) {
    throw new Error(`${flag} requires a value`);
  }
  return value;
}

/**
 * Parses command-line arguments. Anything that is not an option is a video id.
 */
export function parseCliArgs(argv: string[]): CliArgs {
  const args: CliArgs = {
    logLevel: DEFAULT_LOG_LEVEL,
    selectQuality: false,
    outputDir: "download",
    configPath: DEFAULT_CONFIG_PATH,
    ffmpegPath: "ffmpeg",
    help: false,
    videoIds: [],
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    switch (arg) {
      case "-l":
      case "--log-level": {
        const level = Number(requireValue(arg, argv[++i]));
        if (!Number.isInteger(level) || level < 0) {
          throw new Error(`${arg} expects a non-negative integer`);
        }
        args.logLevel = level;
        break;
      }
      case "-q":
      case "--quality":
        args.quality = requireValue(arg, argv[++i]);
        break;
      case "-s":
      case "--select-quality":
        args.selectQuality = true;
        break;
      case "-o":
      case "--output-dir":
        args.outputDir = requireValue(arg, argv[++i]);
        break;
      case "-c":
      case "--config":
        args.configPath = requireValue(arg, argv[++i]);
        break;
      case "--ffmpeg":
        args.ffmpegPath = requireValue(arg, argv[++i]);
        break;
      case "-h":
      case "--help":
        args.help = true;
        break;
      default:
        if (arg.startsWith("-")) {
          throw new Error(`Unknown option '${arg}'`);
        }
        args.videoIds.push(arg);
    }
  }

  return args;
}

/**
 * Reads answers line by line from one input for the whole batch. Lines that arrive
 * before a question is asked are kept for the next question.
 */
export class LinePrompter {
  private readonly rl: Interface;
  private readonly lines: AsyncIterator<string>;
  private readonly output: Writable;

  constructor(input: Readable, output: Writable) {
    this.rl = createInterface({ input, terminal: false });
    this.lines = this.rl[Symbol.asyncIterator]();
    this.output = output;
  }

  async ask(query: string): Promise<string> {
    this.output.write(query);
    const next = await this.lines.next();
    if (next.done) {
      throw new BiliError("UNKNOWN_QUALITY", "Input closed before an answer was given");
    }
    return next.value;
  }

  close(): void {
    this.rl.close();
  }
}

/**
 * Lists the tiers and reads the user's choice by number.
 */
export async function promptQuality(tiers: QualityTier[], prompter: LinePrompter): Promise<number> {
  const lines = tiers.map((tier, idx) => `  ${idx + 1}) ${tier.label}`);
  const answer = (
    await prompter.ask(`Available qualities:\n${lines.join("\n")}\nSelect quality [1-${tiers.length}]: `)
  ).trim();

  const choice = Number(answer);
  const tier = Number.isInteger(choice) ? tiers[choice - 1] : undefined;
  if (!tier) {
    throw new BiliError("UNKNOWN_QUALITY", `'${answer}' is not one of 1-${tiers.length}`);
  }
  return tier.id;
}

export async function main(argv: string[]): Promise<number> {
  let args: CliArgs;
  try {
    args = parseCliArgs(argv);
  } catch (error) {
    console.error(formatError(error));
    console.error(USAGE);
    return 1;
  }

  if (args.help) {
    console.log(USAGE);
    return 0;
  }
  if (args.videoIds.length === 0) {
    console.error(USAGE);
    return 1;
  }

  const logger = new Logger(args.logLevel);
  logger.debug(`args are: ${JSON.stringify(args)}`);

  const config = await readConfig(args.configPath, logger);
  const prompter = args.selectQuality ? new LinePrompter(process.stdin, process.stdout) : undefined;
  const downloader = new Downloader({
    transport: new Crawler({ logger, sessData: config.sessData }),
    logger,
    downloadDir: args.outputDir,
    ffmpegPath: args.ffmpegPath,
    quality: args.quality,
    qualityPicker: prompter ? (tiers) => promptQuality(tiers, prompter) : undefined,
  });

  let report: BatchReport;
  try {
    report = await downloader.downloadAll(args.videoIds);
  } finally {
    prompter?.close();
  }

  if (report.failed.length > 0) {
    logger.fatal(`failed to download: ${report.failed.map((f) => f.videoId).join(", ")}`);
    return 1;
  }
  return 0;
}
