import test from "node:test";
import assert from "node:assert/strict";
import { deriveInstanceName, ownerSlug } from "../src/lib/names";

const fixedSuffix = (bytes: number): string => "ab".repeat(bytes);

test("ownerSlug keeps engine-safe characters only", () => {
  assert.equal(ownerSlug("Alice Smith!"), "alice-smith");
  assert.equal(ownerSlug("bob#1234"), "bob-1234");
  assert.equal(ownerSlug("team.red_1"), "team.red_1");
});

test("ownerSlug falls back when nothing usable remains", () => {
  assert.equal(ownerSlug("###"), "user");
  assert.equal(ownerSlug(""), "user");
});

test("ownerSlug caps the length", () => {
  assert.equal(ownerSlug("a".repeat(40)), "a".repeat(32));
});

test("deriveInstanceName combines lab type, owner and a suffix", () => {
  assert.equal(deriveInstanceName("dvwa", "alice", () => false, fixedSuffix), "dvwa-alice-abab");
});

test("deriveInstanceName widens the suffix after repeated collisions", () => {
  const name = deriveInstanceName("dvwa", "alice", (candidate) => candidate === "dvwa-alice-abab", fixedSuffix);
  assert.equal(name, "dvwa-alice-abababababab");
});

test("deriveInstanceName retries until a free name appears", () => {
  const suffixes = ["0001", "0002", "0003"];
  let call = 0;
  const name = deriveInstanceName(
    "webgoat",
    "bob",
    (candidate) => candidate !== "webgoat-bob-0003",
    () => suffixes[call++] ?? "ffff"
  );
  assert.equal(name, "webgoat-bob-0003");
});

test("deriveInstanceName gives up when every candidate is taken", () => {
  assert.throws(() => deriveInstanceName("dvwa", "alice", () => true, fixedSuffix), /Could not derive a unique instance name/);
});
