import test from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs";
import path from "node:path";
import { CliError } from "../src/lib/errors";
import { JsonStore } from "../src/lib/store";
import { type VerifiedData, verifiedStoreSchema } from "../src/lib/types";
import { createMemoryLogger, tempDir } from "./support/harness";

async function createStore(dir: string) {
  const { logger, errors } = createMemoryLogger();
  const store = new JsonStore<VerifiedData>({
    label: "verified members",
    filePath: path.join(dir, "data", "verified.json"),
    schema: verifiedStoreSchema,
    empty: () => ({}),
    logger
  });
  return { store, errors };
}

test("a missing store reads as empty without logging", async (t) => {
  const { store, errors } = await createStore(await tempDir(t));
  assert.deepEqual(await store.read(), {});
  assert.deepEqual(errors.entries, []);
});

test("update creates the directory and persists the mutation", async (t) => {
  const { store } = await createStore(await tempDir(t));
  const returned = await store.update((data) => {
    data["42"] = { identity: "alice", verifiedAt: "2026-03-01T12:00:00.000Z" };
    return "done";
  });
  assert.equal(returned, "done");
  assert.deepEqual(await store.read(), { "42": { identity: "alice", verifiedAt: "2026-03-01T12:00:00.000Z" } });
  assert.equal(fs.existsSync(`${store.filePath}.lock`), false);
});

test("invalid JSON is logged as corrupt and read as empty", async (t) => {
  const { store, errors } = await createStore(await tempDir(t));
  await fs.promises.mkdir(path.dirname(store.filePath), { recursive: true });
  await fs.promises.writeFile(store.filePath, "{not json", "utf8");

  assert.deepEqual(await store.read(), {});
  assert.equal(errors.entries.length, 1);
  assert.equal(errors.entries[0]?.event, "PERSISTENCE_CORRUPT");
  assert.equal(errors.entries[0]?.store, "verified members");
});

test("a document failing the schema is treated as corrupt", async (t) => {
  const { store, errors } = await createStore(await tempDir(t));
  await fs.promises.mkdir(path.dirname(store.filePath), { recursive: true });
  await fs.promises.writeFile(store.filePath, JSON.stringify({ "1": { identity: 5 } }), "utf8");

  assert.deepEqual(await store.read(), {});
  assert.deepEqual(errors.events(), ["PERSISTENCE_CORRUPT"]);
});

test("the next update replaces a corrupt document", async (t) => {
  const { store } = await createStore(await tempDir(t));
  await fs.promises.mkdir(path.dirname(store.filePath), { recursive: true });
  await fs.promises.writeFile(store.filePath, "garbage", "utf8");

  await store.update((data) => {
    data["7"] = { identity: "bob", verifiedAt: "2026-03-01T12:00:00.000Z", grantedBy: "officer" };
  });
  const raw: unknown = JSON.parse(await fs.promises.readFile(store.filePath, "utf8"));
  assert.deepEqual(raw, { "7": { identity: "bob", verifiedAt: "2026-03-01T12:00:00.000Z", grantedBy: "officer" } });
});

test("a failed write surfaces a persistence error and is logged", async (t) => {
  const { store, errors } = await createStore(await tempDir(t));
  await fs.promises.mkdir(store.filePath, { recursive: true });

  await assert.rejects(
    () => store.update(() => undefined),
    (error: unknown) => error instanceof CliError && error.kind === "persistence" && error.message === "Could not save verified members state."
  );
  assert.deepEqual(errors.events(), ["PERSISTENCE_CORRUPT", "PERSISTENCE_WRITE_FAILED"]);
});

test("concurrent updates are serialized by the lock file", async (t) => {
  const { store } = await createStore(await tempDir(t));
  await Promise.all(
    Array.from({ length: 10 }, (_, idx) =>
      store.update((data) => {
        data[String(idx + 1)] = { identity: `user-${idx + 1}`, verifiedAt: "2026-03-01T12:00:00.000Z" };
      })
    )
  );
  assert.equal(Object.keys(await store.read()).length, 10);
});
