import fs from "node:fs/promises";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { DocumentStore } from "./document-store";
import { Persistence, decodeVector, encodeVector } from "./persistence";
import { makeTempDir, removeDir } from "./test-helpers";
import { BruteForceVectorIndex } from "./vector-index";

const META = { chunkSize: 500, chunkOverlap: 50, modelName: "hash-test" };

let tmp: string;
let file: string;

beforeEach(async () => {
  tmp = await makeTempDir();
  file = path.join(tmp, "state", "index.json");
});

afterEach(async () => {
  await removeDir(tmp);
});

function sampleState() {
  const store = new DocumentStore();
  store.create({ documentId: "d1", ownerId: "alice", filename: "bio.md", pendingHash: "h1" });
  const generation = store.nextGeneration();
  store.recordIngested("d1", "h1", [
    { id: `d1:${generation}:0`, documentId: "d1", sequence: 0, offset: 0, length: 5, text: "hello", tokenEstimate: 2 },
  ]);
  const index = new BruteForceVectorIndex();
  index.insert({ chunkId: "d1:1:0", documentId: "d1", ownerId: "alice", sequence: 0, vector: Float32Array.of(0.5, -1.25, 3) });
  return { store, index };
}

describe("vector encoding", () => {
  it("stores little-endian f32 as base64", () => {
    const encoded = encodeVector(Float32Array.of(1));
    expect(encoded).toBe("AACAPw==");
    expect(Array.from(decodeVector(encoded) ?? [])).toEqual([1]);
  });

  it("rejects payloads that are not whole floats", () => {
    expect(decodeVector("AAA=")).toBeNull();
    expect(decodeVector("")).toBeNull();
  });
});

describe("Persistence", () => {
  it("saves and loads store and vectors", async () => {
    const { store, index } = sampleState();
    const persistence = new Persistence(file);
    await persistence.save(META, store.snapshot(), index.entries());

    const loaded = await persistence.load(META);

    expect(loaded?.generation).toBe(1);
    expect(loaded?.documents).toEqual([store.get("d1")]);
    expect(loaded?.chunks.map((c) => c.text)).toEqual(["hello"]);
    expect(loaded?.vectors).toHaveLength(1);
    expect(Array.from(loaded?.vectors[0].vector ?? [])).toEqual([0.5, -1.25, 3]);
  });

  it("refuses a snapshot written with other parameters", async () => {
    const { store, index } = sampleState();
    const persistence = new Persistence(file);
    await persistence.save(META, store.snapshot(), index.entries());

    await expect(persistence.load({ ...META, modelName: "other" })).resolves.toBeNull();
    await expect(persistence.load({ ...META, chunkOverlap: 10 })).resolves.toBeNull();
  });

  it("returns null for missing, malformed or disabled stores", async () => {
    await expect(new Persistence(file).load(META)).resolves.toBeNull();
    await expect(new Persistence(undefined).load(META)).resolves.toBeNull();

    await fs.mkdir(path.dirname(file), { recursive: true });
    await fs.writeFile(file, "{ not json");
    await expect(new Persistence(file).load(META)).resolves.toBeNull();
    await fs.writeFile(file, JSON.stringify({ version: 1, docs: [] }));
    await expect(new Persistence(file).load(META)).resolves.toBeNull();
  });

  it("serialises concurrent saves so the last one wins", async () => {
    const { store, index } = sampleState();
    const persistence = new Persistence(file);
    const first = persistence.save(META, store.snapshot(), index.entries());
    store.delete("d1");
    index.deleteByDocument("d1");
    const second = persistence.save(META, store.snapshot(), index.entries());
    await Promise.all([first, second]);

    const loaded = await persistence.load(META);
    expect(loaded?.documents).toEqual([]);
    expect(loaded?.vectors).toEqual([]);
  });
});
