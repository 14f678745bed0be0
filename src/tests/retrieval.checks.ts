import assert from "assert/strict";
import { test } from "node:test";
import { ConfigurationError, RetrievalError } from "../modules/errors/errors";
import { IngestService } from "../modules/ingest/ingest.service";
import { Retriever } from "../modules/rag/retriever";
import { MemoryVectorIndex } from "../modules/vector-db/memory.index";
import { Chunk } from "../modules/ingest/types";
import { VectorHit } from "../modules/vector-db/vector.index";
import { approxEqual, KeywordEmbedder, UnreachableIndex } from "./fakes";

function chunk(id: string, documentId: string, text: string, embedding: number[]): Chunk {
  return { id, documentId, text, positionIndex: Number(id.split("#")[1]), embedding };
}

async function seededIndex(): Promise<MemoryVectorIndex> {
  const index = new MemoryVectorIndex({ dimensions: 2 });
  await index.upsert([
    chunk("alpha#0", "alpha", "alpha text", [1, 0]),
    chunk("beta#0", "beta", "beta text", [0, 1]),
    chunk("mixed#0", "mixed", "mixed text", [1, 1]),
  ]);
  return index;
}

const embedder = () => new KeywordEmbedder(2, { alpha: [1, 0], beta: [0, 1] });

test("returns the top-k contexts ordered by similarity", async () => {
  const retriever = new Retriever(embedder(), await seededIndex());
  const contexts = await retriever.retrieve("tell me about alpha", 2);

  assert.deepEqual(
    contexts.map((c) => c.chunkId),
    ["alpha#0", "mixed#0"]
  );
  approxEqual(contexts[0].similarityScore, 1);
  approxEqual(contexts[1].similarityScore, Math.SQRT1_2);
});

test("k larger than the index returns every chunk", async () => {
  const retriever = new Retriever(embedder(), await seededIndex());
  const contexts = await retriever.retrieve("alpha", 10);
  assert.deepEqual(
    contexts.map((c) => c.chunkId),
    ["alpha#0", "mixed#0", "beta#0"]
  );
});

test("an empty index yields no contexts", async () => {
  const retriever = new Retriever(embedder(), new MemoryVectorIndex({ dimensions: 2 }));
  assert.deepEqual(await retriever.retrieve("alpha", 3), []);
});

test("equal scores are ordered by chunk id", async () => {
  const index = new MemoryVectorIndex({ dimensions: 2 });
  await index.upsert([
    chunk("doc#1", "doc", "second", [1, 0]),
    chunk("doc#0", "doc", "first", [1, 0]),
  ]);
  const contexts = await new Retriever(embedder(), index).retrieve("alpha", 2);
  assert.deepEqual(
    contexts.map((c) => c.chunkId),
    ["doc#0", "doc#1"]
  );
});

test("a document filter restricts the results", async () => {
  const retriever = new Retriever(embedder(), await seededIndex());
  const contexts = await retriever.retrieve("alpha", 3, { documentId: "beta" });
  assert.deepEqual(
    contexts.map((c) => c.chunkId),
    ["beta#0"]
  );
});

test("a populated index that returns nothing is reported as corrupt", async () => {
  class SilentIndex extends MemoryVectorIndex {
    async query(): Promise<VectorHit[]> {
      return [];
    }
  }
  const index = new SilentIndex({ dimensions: 2 });
  await index.upsert([chunk("alpha#0", "alpha", "alpha text", [1, 0])]);
  const retriever = new Retriever(embedder(), index);

  await assert.rejects(retriever.retrieve("alpha", 1), (error: unknown) => {
    assert.ok(error instanceof RetrievalError);
    assert.equal(
      error.message,
      "Vector index holds 1 chunk(s) but returned no results; the index may be corrupt"
    );
    return true;
  });
});

test("a document filter matching nothing yields no contexts", async () => {
  const retriever = new Retriever(embedder(), await seededIndex());
  assert.deepEqual(await retriever.retrieve("alpha", 2, { documentId: "gamma" }), []);
});

test("invalid k and empty queries are configuration errors", async () => {
  const retriever = new Retriever(embedder(), await seededIndex());
  await assert.rejects(retriever.retrieve("alpha", 0), ConfigurationError);
  await assert.rejects(retriever.retrieve("alpha", 1.5), ConfigurationError);
  await assert.rejects(retriever.retrieve("  ", 1), ConfigurationError);
});

test("an unreachable index surfaces as a retrieval error", async () => {
  const retriever = new Retriever(embedder(), new UnreachableIndex());
  await assert.rejects(retriever.retrieve("alpha", 1), (error: unknown) => {
    assert.ok(error instanceof RetrievalError);
    assert.equal(error.message, "Vector index unreachable: connect ECONNREFUSED 127.0.0.1:8000");
    return true;
  });
});

test("an embedding failure surfaces as a retrieval error", async () => {
  const failing = embedder();
  failing.failure = new Error("model not loaded");
  const retriever = new Retriever(failing, await seededIndex());
  await assert.rejects(retriever.retrieve("alpha", 1), RetrievalError);
});

test("a dimension mismatch is a configuration error", async () => {
  const wrongSize = new KeywordEmbedder(3, {}, [1, 0, 0]);
  const retriever = new Retriever(wrongSize, await seededIndex());
  await assert.rejects(retriever.retrieve("alpha", 1), ConfigurationError);
});

test("ingesting a document replaces its previous chunks", async () => {
  const index = new MemoryVectorIndex({ dimensions: 2 });
  const ingest = new IngestService({
    embedder: embedder(),
    index,
    chunking: { chunkSize: 4, chunkOverlap: 0, strategy: "fixed-length" },
  });

  const first = await ingest.ingestDocument({
    id: "notes",
    sourceUri: "inline:notes",
    rawText: "abcdefghij",
    metadata: { topic: "letters" },
  });
  assert.deepEqual(first, { documentId: "notes", chunkCount: 3 });

  const second = await ingest.ingestDocument({
    id: "notes",
    sourceUri: "inline:notes",
    rawText: "abcd",
    metadata: {},
  });
  assert.deepEqual(second, { documentId: "notes", chunkCount: 1 });
  assert.equal(await index.count(), 1);
});
