/**
 * Response Reconciler Tests
 */

import { describe, it, expect } from "vitest";
import type { Batch } from "../../../types/index.js";
import type { InferenceOutcome } from "../../inference/interfaces/IInferenceClient.js";
import {
  extractEntries,
  parseCompletion,
  reconcileBatch,
  repairCompletion,
  stripTrailingCommas,
  salvagePairs,
} from "../response-reconciler.js";
import { coerceCategory, matchCategory } from "../models/classification.js";
import { createFileEntry } from "../../scanner/scanner.js";

function makeBatch(names: string[]): Batch {
  return { id: "batch-001-test", index: 0, entries: names.map((name) => createFileEntry("/data", name)) };
}

function succeeded(text: string): InferenceOutcome {
  return { status: "succeeded", batchId: "batch-001-test", text, attempts: 1, durationMs: 5 };
}

function categories(result: { records: Array<{ fileName: string; category: string }> }) {
  return Object.fromEntries(result.records.map((record) => [record.fileName, record.category]));
}

describe("reconcileBatch", () => {
  const batch = makeBatch(["a.pdf", "写真.jpg", "main.rs"]);

  it("fills files the model left out with Other", () => {
    const result = reconcileBatch(batch, succeeded('{"a.pdf":"Documents","main.rs":"Code"}'));

    expect(result.outcome).toBe("strict");
    expect(result.records).toEqual([
      { fileName: "a.pdf", category: "Documents", source: "model" },
      { fileName: "写真.jpg", category: "Other", source: "fallback" },
      { fileName: "main.rs", category: "Code", source: "model" },
    ]);
    expect(result.unmatched).toEqual([]);
  });

  it("matches non-Latin names by exact identity", () => {
    const result = reconcileBatch(batch, succeeded('{"写真.jpg":"Images"}'));

    expect(categories(result)["写真.jpg"]).toBe("Images");
  });

  it("maps labels outside the taxonomy to Other", () => {
    const result = reconcileBatch(makeBatch(["notes.xyz"]), succeeded('{"notes.xyz":"Misc"}'));

    expect(result.records).toEqual([{ fileName: "notes.xyz", category: "Other", source: "coerced" }]);
  });

  it("maps non-string labels to Other", () => {
    const result = reconcileBatch(makeBatch(["a.pdf"]), succeeded('{"a.pdf": 42}'));

    expect(result.records).toEqual([{ fileName: "a.pdf", category: "Other", source: "coerced" }]);
  });

  it("matches labels case-insensitively and trims them", () => {
    const result = reconcileBatch(batch, succeeded('{"a.pdf":"  documents ","main.rs":"CODE"}'));

    expect(categories(result)).toEqual({ "a.pdf": "Documents", "写真.jpg": "Other", "main.rs": "Code" });
  });

  it("repairs fenced output with commentary", () => {
    const text = 'Here you go:\n```json\n{"a.pdf": "Documents"}\n```\nHope this helps!';
    const result = reconcileBatch(makeBatch(["a.pdf"]), succeeded(text));

    expect(result.outcome).toBe("repaired");
    expect(categories(result)).toEqual({ "a.pdf": "Documents" });
  });

  it("repairs trailing commas", () => {
    const result = reconcileBatch(batch, succeeded('{"a.pdf": "Documents", "main.rs": "Code",}'));

    expect(result.outcome).toBe("repaired");
    expect(categories(result)).toEqual({ "a.pdf": "Documents", "写真.jpg": "Other", "main.rs": "Code" });
  });

  it("keeps brackets and commas inside repaired filenames", () => {
    const text = '```json\n{"notes,].txt": "Documents", "b,}.pdf": "Documents",}\n```';
    const result = reconcileBatch(makeBatch(["notes,].txt", "b,}.pdf"]), succeeded(text));

    expect(result.outcome).toBe("repaired");
    expect(categories(result)).toEqual({ "notes,].txt": "Documents", "b,}.pdf": "Documents" });
  });

  it("salvages complete pairs from truncated output", () => {
    const result = reconcileBatch(batch, succeeded('{"a.pdf": "Documents", "main.rs": "Co'));

    expect(result.outcome).toBe("repaired");
    expect(result.records).toEqual([
      { fileName: "a.pdf", category: "Documents", source: "model" },
      { fileName: "写真.jpg", category: "Other", source: "fallback" },
      { fileName: "main.rs", category: "Other", source: "fallback" },
    ]);
  });

  it("accepts an array of filename/category objects", () => {
    const text = '[{"filename":"a.pdf","category":"documents"},{"file":"main.rs","label":"Code"}]';
    const result = reconcileBatch(batch, succeeded(text));

    expect(result.outcome).toBe("strict");
    expect(categories(result)).toEqual({ "a.pdf": "Documents", "写真.jpg": "Other", "main.rs": "Code" });
  });

  it("unwraps a single wrapper key", () => {
    const result = reconcileBatch(batch, succeeded('{"files": {"a.pdf": "Documents", "写真.jpg": "Images"}}'));

    expect(result.outcome).toBe("strict");
    expect(categories(result)).toEqual({ "a.pdf": "Documents", "写真.jpg": "Images", "main.rs": "Other" });
  });

  it("gives every file Other when the text cannot be parsed", () => {
    const result = reconcileBatch(batch, succeeded("I cannot help with that."));

    expect(result.outcome).toBe("failed");
    expect(result.records.every((record) => record.category === "Other" && record.source === "fallback")).toBe(true);
    expect(result.records).toHaveLength(3);
    expect(result.failureReason?.startsWith("Unparseable completion: ")).toBe(true);
  });

  it("gives every file Other when inference failed", () => {
    const outcome: InferenceOutcome = {
      status: "failed",
      batchId: "batch-001-test",
      reason: "Endpoint returned 500: boom",
      attempts: 3,
      durationMs: 10,
    };

    const result = reconcileBatch(batch, outcome);

    expect(result).toEqual({
      batchId: "batch-001-test",
      outcome: "failed",
      records: [
        { fileName: "a.pdf", category: "Other", source: "fallback" },
        { fileName: "写真.jpg", category: "Other", source: "fallback" },
        { fileName: "main.rs", category: "Other", source: "fallback" },
      ],
      unmatched: [],
      failureReason: "Endpoint returned 500: boom",
    });
  });

  it("reports keys that match no file and ignores them", () => {
    const result = reconcileBatch(makeBatch(["a.pdf"]), succeeded('{"a.pdf":"Documents","ghost.txt":"Documents"}'));

    expect(result.records).toHaveLength(1);
    expect(result.unmatched).toEqual(["ghost.txt"]);
  });

  it("does not match names that differ in case", () => {
    const result = reconcileBatch(makeBatch(["a.pdf"]), succeeded('{"A.pdf":"Documents"}'));

    expect(result.records).toEqual([{ fileName: "a.pdf", category: "Other", source: "fallback" }]);
    expect(result.unmatched).toEqual(["A.pdf"]);
  });

  it("keeps the first label of a repeated name", () => {
    const text = '[{"filename":"a.pdf","category":"Documents"},{"filename":"a.pdf","category":"Images"}]';

    expect(categories(reconcileBatch(makeBatch(["a.pdf"]), succeeded(text)))).toEqual({ "a.pdf": "Documents" });
  });
});

describe("parseCompletion", () => {
  it("tags clean JSON as strict", () => {
    expect(parseCompletion('  {"a.pdf":"Documents"}  ')).toEqual({
      outcome: "strict",
      entries: [{ key: "a.pdf", value: "Documents" }],
    });
  });

  it("fails on a bare JSON scalar", () => {
    expect(parseCompletion('"Documents"').outcome).toBe("failed");
  });
});

describe("repairCompletion", () => {
  it("strips fences and trailing commas", () => {
    expect(repairCompletion('```json\n{"a": "b",}\n```')).toBe('{"a": "b"}');
  });

  it("cuts preamble and trailing remarks", () => {
    expect(repairCompletion('Sure! {"a": "b"} Let me know.')).toBe('{"a": "b"}');
  });
});

describe("salvagePairs", () => {
  it("decodes escaped strings", () => {
    expect(salvagePairs('"say \\"hi\\".txt": "Documents" "x"')).toEqual([
      { key: 'say "hi".txt', value: "Documents" },
    ]);
  });
});

describe("extractEntries", () => {
  it("rejects an array without filename objects", () => {
    expect(extractEntries([1, 2, 3]).ok).toBe(false);
  });

  it("accepts an empty object", () => {
    expect(extractEntries({})).toEqual({ ok: true, value: [] });
  });
});

describe("taxonomy helpers", () => {
  it("matchCategory returns the canonical spelling", () => {
    expect(matchCategory("images")).toBe("Images");
    expect(matchCategory("Pictures")).toBeNull();
  });

  it("coerceCategory falls back to Other", () => {
    expect(coerceCategory("Misc")).toBe("Other");
    expect(coerceCategory(null)).toBe("Other");
    expect(coerceCategory("video")).toBe("Video");
  });
});

describe("stripTrailingCommas", () => {
  it("drops commas before closing brackets", () => {
    expect(stripTrailingCommas('[{"a": "b",} ,\n]')).toBe('[{"a": "b"} \n]');
  });

  it("leaves commas inside strings alone", () => {
    expect(stripTrailingCommas('{"x,].pdf": "Documents", "y,}\\".txt": "Other",}')).toBe(
      '{"x,].pdf": "Documents", "y,}\\".txt": "Other"}'
    );
  });
});
