import { readFile, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { StorageFailedError } from "../src/errors";
import { CapsuleLogStore, sanitizeFilename } from "../src/storage/capsuleLogStore";
import { memoryLogger, withTempDir } from "./helpers";

describe("CapsuleLogStore", () => {
  let dir: string;
  let cleanup: () => Promise<void>;
  let store: CapsuleLogStore;

  beforeEach(async () => {
    ({ dir, cleanup } = await withTempDir());
    store = new CapsuleLogStore(join(dir, "logs"), memoryLogger().logger);
  });

  afterEach(async () => {
    await cleanup();
  });

  test("writes a markdown log named after the timestamp and title", async () => {
    const logPath = await store.saveLog({
      title: "hello world",
      transcript: "hello world #idea",
      capsule: "Capsule text",
      tags: ["idea"],
      timestamp: new Date(2024, 0, 2, 3, 4, 5)
    });

    expect(logPath).toBe(join(dir, "logs", "2024-01-02-030405-hello-world.md"));
    expect(await readFile(logPath, "utf-8")).toBe(
      [
        "# Insight Capsule Log — 2024-01-02 03:04:05",
        "**Title:** hello world",
        "**Tags:** #idea",
        "",
        "**Transcript:** ```text",
        "hello world #idea",
        "```",
        "",
        "**Insight Capsule:**",
        "Capsule text",
        ""
      ].join("\n")
    );
  });

  test("writes placeholders for empty parts", async () => {
    const logPath = await store.saveLog({
      title: "",
      transcript: " ",
      capsule: "",
      tags: [],
      timestamp: new Date(2024, 5, 7, 8, 9, 10)
    });

    expect(logPath).toBe(join(dir, "logs", "2024-06-07-080910-untitled.md"));
    const content = await readFile(logPath, "utf-8");
    expect(content).toContain("**Tags:** None\n");
    expect(content).toContain("```text\nTranscript was empty.\n```");
    expect(content).toContain("**Insight Capsule:**\nCapsule was empty or generation failed.\n");
  });

  test("keeps the index newest first under its header", async () => {
    await store.saveLog({
      title: "first",
      transcript: "a",
      capsule: "b",
      tags: [],
      timestamp: new Date(2024, 0, 1, 9, 0, 0)
    });
    await store.saveLog({
      title: "second",
      transcript: "a",
      capsule: "b",
      tags: ["x", "y"],
      timestamp: new Date(2024, 0, 2, 9, 0, 0)
    });

    expect(await readFile(store.indexPath, "utf-8")).toBe(
      "# Capsule Log Index\n\n" +
        "- [second](./2024-01-02-090000-second.md) — 2024-01-02 09:00:00 #x #y\n" +
        "- [first](./2024-01-01-090000-first.md) — 2024-01-01 09:00:00 \n"
    );
  });

  test("adds the header to an index that lacks one", async () => {
    const legacy = new CapsuleLogStore(dir, memoryLogger().logger);
    await writeFile(legacy.indexPath, "- [old](./old.md)\n");

    await legacy.saveLog({ title: "new", transcript: "t", capsule: "c", tags: [], timestamp: new Date(2024, 0, 3, 0, 0, 0) });

    expect(await readFile(legacy.indexPath, "utf-8")).toBe(
      "# Capsule Log Index\n\n- [new](./2024-01-03-000000-new.md) — 2024-01-03 00:00:00 \n- [old](./old.md)\n"
    );
  });

  test("fails with StorageFailedError when the directory cannot be created", async () => {
    const blocker = join(dir, "blocker");
    await writeFile(blocker, "not a directory");
    const blocked = new CapsuleLogStore(join(blocker, "logs"), memoryLogger().logger);

    await expect(
      blocked.saveLog({ title: "t", transcript: "t", capsule: "c", tags: [], timestamp: new Date() })
    ).rejects.toThrow(StorageFailedError);
  });

  test("appends a section to an existing log", async () => {
    const logPath = await store.saveLog({
      title: "t",
      transcript: "t",
      capsule: "c",
      tags: [],
      timestamp: new Date(2024, 0, 1, 0, 0, 0)
    });
    await store.appendSection(logPath, "Key Takeaways", "1. Ship it\n");

    expect(await readFile(logPath, "utf-8")).toMatch(/c\n\n\n---\n\n## Key Takeaways\n\n1\. Ship it\n$/);
  });

  test("extracts hashtags in order without the hash", () => {
    expect(store.extractTags("Notes on #focus and #deep_work, not a#tag? #2024")).toEqual([
      "focus",
      "deep_work",
      "tag",
      "2024"
    ]);
    expect(store.extractTags("no tags here")).toEqual([]);
  });
});

describe("sanitizeFilename", () => {
  test("keeps word characters and hyphens", () => {
    expect(sanitizeFilename("Hello, World! It's 2024")).toBe("hello-world-its-2024");
    expect(sanitizeFilename("  -Leading and trailing_ ")).toBe("leading-and-trailing");
  });

  test("falls back to untitled", () => {
    expect(sanitizeFilename("")).toBe("untitled");
    expect(sanitizeFilename("!!!")).toBe("untitled");
  });
});
