import { spawn } from "node:child_process";
import { BiliError } from "./errors.js";

export interface MergeRequest {
  ffmpegPath: string;
  videoPath: string;
  audioPath: string;
  outputPath: string;
}

export interface MergeOutput {
  stdout: string;
  stderr: string;
}

export type MergeStep = (request: MergeRequest) => Promise<MergeOutput>;

/**
 * ffmpeg arguments: copy the video stream as is, re-encode audio to AAC.
 */
export function mergeArgs(request: MergeRequest): string[] {
  return [
    "-y",
    "-i",
    request.videoPath,
    "-i",
    request.audioPath,
    "-c:v",
    "copy",
    "-c:a",
    "aac",
    request.outputPath,
  ];
}

/**
 * Runs ffmpeg to mux the two downloaded streams into one file. Rejects with
 * MERGE_ERROR (carrying the captured output) unless ffmpeg exits with code 0.
 */
export function mergeStreams(request: MergeRequest): Promise<MergeOutput> {
  return new Promise((resolve, reject) => {
    const child = spawn(request.ffmpegPath, mergeArgs(request), {
      stdio: ["ignore", "pipe", "pipe"],
    });

    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];
    child.stdout.on("data", (chunk: Buffer) => stdout.push(chunk));
    child.stderr.on("data", (chunk: Buffer) => stderr.push(chunk));

    child.on("error", (error) => {
      reject(
        new BiliError("MERGE_ERROR", `Failed to start '${request.ffmpegPath}': ${error.message}`, {
          cause: error,
          stdout: Buffer.concat(stdout).toString("utf8"),
          stderr: Buffer.concat(stderr).toString("utf8"),
        }),
      );
    });

    child.on("close", (code, signal) => {
      const output = {
        stdout: Buffer.concat(stdout).toString("utf8"),
        stderr: Buffer.concat(stderr).toString("utf8"),
      };

      if (code === 0) {
        resolve(output);
        return;
      }

      const reason = code === null ? `killed by ${signal ?? "unknown signal"}` : `exit code ${code}`;
      reject(
        new BiliError("MERGE_ERROR", `ffmpeg ${reason}, stdout: ${output.stdout}, stderr: ${output.stderr}`, {
          ...output,
          exitCode: code,
          signal,
        }),
      );
    });
  });
}
