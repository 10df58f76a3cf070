import fs from "node:fs/promises";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { ThreadStore } from "../thread-store";
import { makeTempDir } from "./helpers";

describe("ThreadStore", () => {
  let root: string;

  beforeEach(async () => {
    root = await makeTempDir();
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(root, { recursive: true, force: true });
  });

  it("starts empty and accumulates exchanges across instances", async () => {
    const store = new ThreadStore(root);
    expect(await store.load("t")).toEqual([]);
    await store.append("t", "q1", "a1");
    await store.append("t", "q2", "a2");

    expect(await new ThreadStore(root).load("t")).toEqual([
      { role: "user", content: "q1" },
      { role: "assistant", content: "a1" },
      { role: "user", content: "q2" },
      { role: "assistant", content: "a2" },
    ]);
    expect(store.cached("t")).toHaveLength(4);
  });

  it("keeps thread ids to a single file name", async () => {
    const store = new ThreadStore(root);
    await store.append("../escape", "q", "a");
    expect(await fs.readdir(path.join(root, "threads"))).toEqual(["..%2Fescape.json"]);
  });

  it("ignores a malformed history file", async () => {
    await fs.mkdir(path.join(root, "threads"), { recursive: true });
    await fs.writeFile(path.join(root, "threads", "t.json"), JSON.stringify({ not: "a thread" }));
    expect(await new ThreadStore(root).load("t")).toEqual([]);
    expect(console.error).toHaveBeenCalledTimes(1);
  });

  it("treats an unparseable history file as empty and overwrites it on append", async () => {
    await fs.mkdir(path.join(root, "threads"), { recursive: true });
    await fs.writeFile(path.join(root, "threads", "t.json"), "{ truncated");
    const store = new ThreadStore(root);

    expect(await store.load("t")).toEqual([]);
    expect(await store.append("t", "q", "a")).toEqual([
      { role: "user", content: "q" },
      { role: "assistant", content: "a" },
    ]);
  });
});
