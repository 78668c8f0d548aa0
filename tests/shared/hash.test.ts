import { describe, it, expect } from "vitest";
import { sha256Bytes } from "../../src/shared/hash.js";

describe("sha256Bytes", () => {
  it("produces consistent 64-char hex for same input", () => {
    const buf = Buffer.from("hello world");
    expect(sha256Bytes(buf)).toBe(sha256Bytes(Buffer.from("hello world")));
    expect(sha256Bytes(buf)).toMatch(/^[a-f0-9]{64}$/);
  });

  it("produces known hash for known input", () => {
    // SHA-256 of empty string
    expect(sha256Bytes(Buffer.from(""))).toBe("e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855");
  });
});
