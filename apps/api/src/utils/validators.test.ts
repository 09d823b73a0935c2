import { describe, expect, it } from "vitest";

import { ValidationError } from "./errors.js";
import { filenameFromUrl, isUuid, parseHttpUrl, sanitizeFilename } from "./validators.js";

describe("isUuid", () => {
  it("accepts v4 ids and nothing else", () => {
    expect(isUuid("6f1c2b9e-3f4a-4d5b-8c6d-7e8f9a0b1c2d")).toBe(true);
    expect(isUuid("6f1c2b9e3f4a4d5b8c6d7e8f9a0b1c2d")).toBe(false);
    expect(isUuid("../6f1c2b9e-3f4a-4d5b-8c6d-7e8f9a0b1c2d")).toBe(false);
    expect(isUuid(42)).toBe(false);
  });
});

describe("parseHttpUrl", () => {
  it("trims and parses http(s) urls", () => {
    expect(parseHttpUrl("  https://example.com/a.png ").toString()).toBe("https://example.com/a.png");
  });

  it("rejects other schemes and garbage", () => {
    expect(() => parseHttpUrl("ftp://example.com/a")).toThrow(ValidationError);
    expect(() => parseHttpUrl("javascript:alert(1)")).toThrow(ValidationError);
    expect(() => parseHttpUrl("nope")).toThrow("Invalid URL: nope");
  });
});

describe("sanitizeFilename", () => {
  it("replaces reserved characters", () => {
    expect(sanitizeFilename('a<b>:"c|d?.png')).toBe("a_b___c_d_.png");
    expect(sanitizeFilename("..")).toBe("_");
  });

  it("truncates to 255 characters", () => {
    expect(sanitizeFilename("x".repeat(300))).toHaveLength(255);
  });
});

describe("filenameFromUrl", () => {
  it("takes the decoded last path segment", () => {
    expect(filenameFromUrl(new URL("https://cdn.example/files/my%20clip.mp4?sig=abc"))).toBe("my clip.mp4");
  });

  it("falls back when the segment has no extension", () => {
    expect(filenameFromUrl(new URL("https://cdn.example/files/abc"))).toBe("downloaded_file");
    expect(filenameFromUrl(new URL("https://cdn.example/"), "download.tmp")).toBe("download.tmp");
  });
});
