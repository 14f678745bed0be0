import assert from "assert/strict";
import { test } from "node:test";
import { chunkDocument, chunkText } from "../modules/ingest/chunker";
import { ConfigurationError } from "../modules/errors/errors";

test("fixed-length windows step by size minus overlap and end at the text end", () => {
  const spans = chunkText("abcdefghij", { chunkSize: 4, chunkOverlap: 1, strategy: "fixed-length" });

  assert.deepEqual(
    spans.map((s) => s.text),
    ["abcd", "defg", "ghij"]
  );
  assert.deepEqual(
    spans.map((s) => [s.start, s.end, s.positionIndex]),
    [
      [0, 4, 0],
      [3, 7, 1],
      [6, 10, 2],
    ]
  );
});

test("fixed-length without overlap leaves a short final window", () => {
  const spans = chunkText("abcdefghij", { chunkSize: 4, chunkOverlap: 0, strategy: "fixed-length" });
  assert.deepEqual(
    spans.map((s) => s.text),
    ["abcd", "efgh", "ij"]
  );
});

test("sentence-aware packing keeps sentences whole", () => {
  const text = "One two. Three four. Five six.";
  const spans = chunkText(text, { chunkSize: 22, chunkOverlap: 0, strategy: "sentence-aware" });

  assert.deepEqual(
    spans.map((s) => s.text),
    ["One two. Three four. ", "Five six."]
  );
});

test("sentence-aware overlap carries trailing sentences forward", () => {
  const text = "One two. Three four. Five six.";
  const spans = chunkText(text, { chunkSize: 22, chunkOverlap: 12, strategy: "sentence-aware" });

  assert.deepEqual(
    spans.map((s) => s.text),
    ["One two. Three four. ", "Three four. Five six."]
  );
});

test("a sentence longer than a chunk is cut into windows", () => {
  const spans = chunkText("abcdefghijkl", { chunkSize: 5, chunkOverlap: 1, strategy: "sentence-aware" });
  assert.deepEqual(
    spans.map((s) => s.text),
    ["abcde", "fghij", "kl"]
  );
});

test("empty and whitespace-only text yields no chunks", () => {
  const config = { chunkSize: 10, chunkOverlap: 2, strategy: "sentence-aware" } as const;
  assert.deepEqual(chunkText("", config), []);
  assert.deepEqual(chunkText("   \n\t ", config), []);
});

test("chunking is deterministic", () => {
  const text = "Alpha beta gamma. Delta epsilon! Zeta eta theta? Iota kappa.";
  const config = { chunkSize: 30, chunkOverlap: 10, strategy: "sentence-aware" } as const;
  assert.deepEqual(chunkText(text, config), chunkText(text, config));
});

test("overlap must be smaller than the chunk size", () => {
  assert.throws(
    () => chunkText("some text", { chunkSize: 10, chunkOverlap: 10, strategy: "fixed-length" }),
    ConfigurationError
  );
  assert.throws(
    () => chunkText("some text", { chunkSize: 0, chunkOverlap: 0, strategy: "fixed-length" }),
    ConfigurationError
  );
});

test("chunk ids combine the document id and position", () => {
  const drafts = chunkDocument(
    { id: "handbook", sourceUri: "inline:handbook", rawText: "abcdefgh", metadata: {} },
    { chunkSize: 4, chunkOverlap: 0, strategy: "fixed-length" }
  );

  assert.deepEqual(
    drafts.map((d) => [d.id, d.documentId, d.text]),
    [
      ["handbook#0", "handbook", "abcd"],
      ["handbook#1", "handbook", "efgh"],
    ]
  );
});
