import path from "node:path";
import { describe, expect, it } from "vitest";
import { parseConfig } from "../config";

describe("parseConfig", () => {
  it("falls back to defaults on an empty environment", () => {
    const c = parseConfig({});
    expect(c).toMatchObject({
      MIN_HITS: 1,
      SIMILARITY_CUTOFF: 0.5,
      CONFIDENCE_THRESHOLD: 0.1,
      TOP_K: 5,
      TEMPERATURE: 0,
      CHUNK_SIZE: 800,
      CHUNK_OVERLAP: 120,
      GENERATION_MODEL: "gemini-2.5-pro",
      EMBEDDING_MODEL: "text-embedding-004",
      MCP_TRANSPORT: "http",
      PORT: 5000,
      HOST: "127.0.0.1",
      DNS_REBINDING_PROTECTION: true,
      VERBOSE: false,
    });
    expect(c.GEMINI_API_KEY).toBeUndefined();
    expect(c.ALLOWED_HOSTS).toBeUndefined();
    expect(c.STORAGE_ROOT).toBe(path.resolve("storage"));
    expect(c.INJECT_ROOT).toBe(path.resolve("injected"));
  });

  it("reads numeric knobs and ignores malformed ones", () => {
    const c = parseConfig({
      MIN_HITS: "3",
      SIMILARITY_CUTOFF: "0.25",
      CONFIDENCE_THRESHOLD: "abc",
      TOP_K: "0",
      TEMPERATURE: "7",
    });
    expect(c.MIN_HITS).toBe(3);
    expect(c.SIMILARITY_CUTOFF).toBe(0.25);
    expect(c.CONFIDENCE_THRESHOLD).toBe(0.1);
    expect(c.TOP_K).toBe(5);
    expect(c.TEMPERATURE).toBe(0);
  });

  it("accepts a zero hit minimum and clamps large TOP_K", () => {
    const c = parseConfig({ MIN_HITS: "0", TOP_K: "500" });
    expect(c.MIN_HITS).toBe(0);
    expect(c.TOP_K).toBe(50);
  });

  it("parses transport, host list and flags", () => {
    const c = parseConfig({
      MCP_TRANSPORT: " STDIO ",
      ALLOWED_HOSTS: "localhost:5000, docs.internal ,",
      ENABLE_DNS_REBINDING_PROTECTION: "false",
      VERBOSE: "Yes",
      GEMINI_API_KEY: "test-secret",
    });
    expect(c.MCP_TRANSPORT).toBe("stdio");
    expect(c.ALLOWED_HOSTS).toEqual(["localhost:5000", "docs.internal"]);
    expect(c.DNS_REBINDING_PROTECTION).toBe(false);
    expect(c.VERBOSE).toBe(true);
    expect(c.GEMINI_API_KEY).toBe("test-secret");
  });
});
