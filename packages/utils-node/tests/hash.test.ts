import { bytesToHex } from "@blobvault/utils";
import { describe, expect, it } from "vitest";
import { createNodeHasher, hashNode } from "../src/hash/index.js";

const encoder = new TextEncoder();

describe("Node.js hashing", () => {
  describe("md5", () => {
    const md5 = createNodeHasher("md5");

    it("hashes empty input", () => {
      expect(bytesToHex(md5.digest(new Uint8Array(0)))).toBe("d41d8cd98f00b204e9800998ecf8427e");
    });

    it("hashes text", () => {
      expect(bytesToHex(md5.digest(encoder.encode("hello")))).toBe("5d41402abc4b2a76b9719d911017c592");
    });

    it("produces 16 bytes", () => {
      expect(md5.digest(encoder.encode("0123456789")).length).toBe(16);
    });
  });

  describe("hashNode", () => {
    it("supports sha1", () => {
      expect(bytesToHex(hashNode("sha1", encoder.encode("abc")))).toBe(
        "a9993e364706816aba3e25717850c26c9cd0d89d",
      );
    });
  });

  describe("createNodeHasher", () => {
    it("defaults to md5", () => {
      const hasher = createNodeHasher();
      expect(hasher.algorithm).toBe("md5");
      expect(bytesToHex(hasher.digest(encoder.encode("hello")))).toBe(
        "5d41402abc4b2a76b9719d911017c592",
      );
    });

    it("is deterministic", () => {
      const hasher = createNodeHasher("sha256");
      const a = hasher.digest(encoder.encode("same"));
      const b = hasher.digest(encoder.encode("same"));
      expect(bytesToHex(a)).toBe(bytesToHex(b));
    });
  });
});
