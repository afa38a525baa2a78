import { readFile } from "node:fs/promises";
import { join } from "node:path";
import fetch, { Response } from "node-fetch";
import { beforeEach, describe, expect, it, vi } from "vitest";
import { silentLogger } from "../src/logger.js";
import { Crawler } from "../src/transport.js";
import { tempDir } from "./helpers.js";

vi.mock("node-fetch", async (importOriginal) => {
  const actual = await importOriginal<typeof import("node-fetch")>();
  return { ...actual, default: vi.fn() };
});

const fetchMock = vi.mocked(fetch);

function abortError(): Error {
  return Object.assign(new Error("The operation was aborted."), { name: "AbortError" });
}

describe("Crawler", () => {
  beforeEach(() => {
    fetchMock.mockReset();
  });

  it("fetches a body with the platform headers and session cookie", async () => {
    fetchMock.mockResolvedValue(new Response("<html></html>"));
    const crawler = new Crawler({ logger: silentLogger, sessData: "test-secret" });

    const body = await crawler.fetchBody("https://www.bilibili.com/video/BV1xx411c7mD/");

    expect(body.toString("utf8")).toBe("<html></html>");
    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(fetchMock.mock.calls[0][0]).toBe("https://www.bilibili.com/video/BV1xx411c7mD/");
    expect(fetchMock.mock.calls[0][1]).toMatchObject({
      headers: {
        referer: "https://www.bilibili.com",
        cookie: "CURRENT_QUALITY=32;SESSDATA=test-secret;",
      },
    });
  });

  it("omits SESSDATA when no token is configured", () => {
    const crawler = new Crawler({ logger: silentLogger });

    expect(crawler.headers().cookie).toBe("CURRENT_QUALITY=32;");
  });

  it("turns non-2xx responses into FETCH_ERROR", async () => {
    fetchMock.mockResolvedValue(new Response("nope", { status: 404, statusText: "Not Found" }));
    const crawler = new Crawler({ logger: silentLogger });

    await expect(crawler.fetchBody("https://example.test/")).rejects.toMatchObject({
      code: "FETCH_ERROR",
      message: "HTTP 404: Not Found",
    });
  });

  it("aborts requests that outlive the timeout", async () => {
    fetchMock.mockImplementation(
      (_url, init) =>
        new Promise((_resolve, reject) => {
          init?.signal?.addEventListener("abort", () => reject(abortError()));
        }),
    );
    const crawler = new Crawler({ logger: silentLogger, timeout: 10 });

    await expect(crawler.fetchBody("https://example.test/")).rejects.toMatchObject({
      code: "FETCH_ERROR",
      message: "Request timeout",
    });
  });

  it("wraps network failures", async () => {
    const cause = new Error("socket hang up");
    fetchMock.mockRejectedValue(cause);
    const crawler = new Crawler({ logger: silentLogger });

    await expect(crawler.fetchBody("https://example.test/")).rejects.toMatchObject({
      code: "FETCH_ERROR",
      message: "Request to 'https://example.test/' failed",
      cause,
    });
  });

  it("streams downloads to disk, creating the directory", async () => {
    fetchMock.mockResolvedValue(new Response("video-bytes"));
    const dir = await tempDir();
    const target = join(dir, "nested", "clip_video.mp4");
    const crawler = new Crawler({ logger: silentLogger });

    await crawler.downloadTo("https://cdn.example.test/v.m4s", target);

    expect(await readFile(target, "utf8")).toBe("video-bytes");
  });

  it("does not create the file when the server refuses", async () => {
    fetchMock.mockResolvedValue(new Response("", { status: 403, statusText: "Forbidden" }));
    const dir = await tempDir();
    const target = join(dir, "clip_audio.mp4");
    const crawler = new Crawler({ logger: silentLogger });

    await expect(crawler.downloadTo("https://cdn.example.test/a.m4s", target)).rejects.toMatchObject({
      code: "FETCH_ERROR",
      message: "HTTP 403: Forbidden",
    });
    await expect(readFile(target)).rejects.toMatchObject({ code: "ENOENT" });
  });
});
