/**
 * MovePlan Tests
 */

import { describe, it, expect } from "vitest";
import * as path from "node:path";
import type { Batch } from "../../../types/index.js";
import { MovePlan, toDirectoryName } from "../move-plan.js";
import { createFileEntry } from "../../scanner/scanner.js";

const TARGET = "/data/downloads";

describe("toDirectoryName", () => {
  it.each([
    ["Documents", "Documents"],
    ["  documents ", "Documents"],
    ["IMAGES", "Images"],
    ["Video/", "Video"],
    ['a<b>c:"d|e?f*', "Abcdef"],
    ["Notes.. ", "Notes"],
    ["Tax   Forms", "Tax forms"],
    ["...", "Other"],
    ["", "Other"],
    ["\u0000\u0007", "Other"],
  ])("%j becomes %j", (label, expected) => {
    expect(toDirectoryName(label)).toBe(expected);
  });
});

describe("MovePlan", () => {
  it("places each file under its category folder", () => {
    const plan = new MovePlan(TARGET);
    const entry = createFileEntry(TARGET, "a.pdf");

    expect(plan.add(entry, "Documents")).toBe(true);
    expect(plan.get(entry)).toEqual({
      entry,
      category: "Documents",
      directoryName: "Documents",
      destinationPath: path.join(TARGET, "Documents", "a.pdf"),
    });
  });

  it("keeps the first destination for a file", () => {
    const plan = new MovePlan(TARGET);
    const entry = createFileEntry(TARGET, "a.pdf");

    plan.add(entry, "Documents");

    expect(plan.add(entry, "Images")).toBe(false);
    expect(plan.size).toBe(1);
    expect(plan.get(entry)?.category).toBe("Documents");
  });

  it("merges a batch result, defaulting missing records to Other", () => {
    const entries = ["a.pdf", "b.jpg"].map((name) => createFileEntry(TARGET, name));
    const batch: Batch = { id: "batch-001-test", index: 0, entries };
    const plan = new MovePlan(TARGET);

    const added = plan.merge(batch, {
      batchId: batch.id,
      outcome: "strict",
      records: [{ fileName: "a.pdf", category: "Documents", source: "model" }],
      unmatched: [],
    });

    expect(added).toBe(2);
    expect(plan.list().map((move) => [move.entry.fileName, move.category])).toEqual([
      ["a.pdf", "Documents"],
      ["b.jpg", "Other"],
    ]);
  });

  it("counts files per category", () => {
    const plan = new MovePlan(TARGET);
    plan.add(createFileEntry(TARGET, "a.pdf"), "Documents");
    plan.add(createFileEntry(TARGET, "b.pdf"), "Documents");
    plan.add(createFileEntry(TARGET, "c.mp3"), "Music");

    expect(Object.fromEntries(plan.countByCategory())).toEqual({ Documents: 2, Music: 1 });
  });

  it("refuses new moves once sealed", () => {
    const plan = new MovePlan(TARGET);
    plan.seal();

    expect(plan.isSealed).toBe(true);
    expect(() => plan.add(createFileEntry(TARGET, "a.pdf"), "Documents")).toThrow(/sealed/);
  });
});
