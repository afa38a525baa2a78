import { describe, expect, it } from "vitest";
import { extractVideoId, isBilibiliUrl, stripQuery, toPlayUrlApi, toVideoPageUrl } from "../src/url-utils.js";

describe("url utils", () => {
  it("strips query strings", () => {
    expect(stripQuery("https://www.bilibili.com/video/BV1xx411c7mD/?spm_id_from=333")).toBe(
      "https://www.bilibili.com/video/BV1xx411c7mD/",
    );
    expect(stripQuery("BV1xx411c7mD")).toBe("BV1xx411c7mD");
  });

  it("recognises video page URLs", () => {
    expect(isBilibiliUrl("https://www.bilibili.com/video/BV1xx411c7mD")).toBe(true);
    expect(isBilibiliUrl("https://m.bilibili.com/video/av170001?p=2")).toBe(true);
    expect(isBilibiliUrl("https://www.youtube.com/watch?v=abc")).toBe(false);
  });

  it.each([
    ["BV1xx411c7mD", "BV1xx411c7mD"],
    ["  av170001 ", "av170001"],
    ["https://www.bilibili.com/video/BV1xx411c7mD/?vd_source=x", "BV1xx411c7mD"],
    ["https://m.bilibili.com/video/av170001", "av170001"],
  ])("extracts the id from %j", (input, id) => {
    expect(extractVideoId(input)).toBe(id);
  });

  it.each([["BV123"], ["hello"], ["https://www.bilibili.com/video/"], ["https://example.com/video/BV1xx411c7mD"]])(
    "rejects %j",
    (input) => {
      expect(extractVideoId(input)).toBeNull();
    },
  );

  it("builds page and API URLs", () => {
    expect(toVideoPageUrl("BV1xx411c7mD")).toBe("https://www.bilibili.com/video/BV1xx411c7mD/");
    expect(toPlayUrlApi("BV1xx411c7mD", 42)).toBe(
      "https://api.bilibili.com/x/player/wbi/playurl?bvid=BV1xx411c7mD&cid=42&fnval=4048",
    );
  });
});
