import test from "node:test";
import assert from "node:assert/strict";
import { z } from "zod";
import { TokenShapeError } from "../src/errors.js";
import { ITERATOR_USER_AGENT, PagingIterator, USER_AGENT_OPTION, isTokenPresent } from "../src/iterator.js";
import type { IteratorOptions, LogLevel } from "../src/types.js";
import { FakeBackend, FakeOperation } from "./fake-operation.js";

const LIST_KEYS: IteratorOptions = { inputToken: "Marker", outputToken: "NextMarker", resultKey: "Items" };

function createIterator(pages: unknown[], options: IteratorOptions = LIST_KEYS, params: Record<string, unknown> = {}) {
  const backend = new FakeBackend(pages);
  const iterator = new PagingIterator(new FakeOperation("List", backend, params), options);
  return { backend, iterator };
}

test("follows the marker across pages and stops on a null token", async () => {
  const { backend, iterator } = createIterator([
    { Items: ["a", "b"], NextMarker: "m1" },
    { Items: ["c"], NextMarker: null }
  ]);

  assert.deepEqual(await iterator.toArray(), ["a", "b", "c"]);
  assert.equal(backend.sent.length, 2);
  assert.deepEqual(backend.sent[0].params, {});
  assert.deepEqual(backend.sent[1].params, { Marker: "m1" });
  assert.equal(iterator.getRequestCount(), 2);
  assert.equal(iterator.getPosition(), 3);
  assert.equal(iterator.getLastResult()?.getPath("NextMarker"), null);
});

test("an empty page that still carries a token is retried without surfacing", async () => {
  const { backend, iterator } = createIterator([
    { Items: [], NextMarker: "m1" },
    { Items: ["x"], NextMarker: null }
  ]);

  assert.deepEqual(await iterator.toArray(), ["x"]);
  assert.equal(backend.sent.length, 2);
  assert.deepEqual(backend.sent[1].params, { Marker: "m1" });
});

test("the retried request is recloned from the original, not the mutated working copy", async () => {
  const { backend, iterator } = createIterator([
    { Items: ["a"], NextMarker: "m1" },
    { Items: [], NextMarker: "m2" },
    { Items: ["b"] }
  ]);

  assert.deepEqual(await iterator.toArray(), ["a", "b"]);
  assert.equal(backend.sent.length, 3);
  assert.deepEqual(backend.sent[1].added[USER_AGENT_OPTION], [ITERATOR_USER_AGENT, ITERATOR_USER_AGENT]);
  assert.deepEqual(backend.sent[2].added[USER_AGENT_OPTION], [ITERATOR_USER_AGENT]);
  assert.deepEqual(backend.sent[2].params, { Marker: "m2" });
});

test("does not fetch until the caller pulls past the current page", async () => {
  const { backend, iterator } = createIterator([
    { Items: ["a", "b"], NextMarker: "m1" },
    { Items: ["c"] }
  ]);
  assert.equal(backend.sent.length, 0);

  const pull = iterator[Symbol.asyncIterator]();
  assert.deepEqual(await pull.next(), { done: false, value: "a" });
  assert.equal(backend.sent.length, 1);
  assert.deepEqual(await pull.next(), { done: false, value: "b" });
  assert.equal(backend.sent.length, 1);
  assert.deepEqual(await pull.next(), { done: false, value: "c" });
  assert.equal(backend.sent.length, 2);
  assert.equal((await pull.next()).done, true);
});

test("composite tokens are applied positionally", async () => {
  const { backend, iterator } = createIterator(
    [
      { Versions: [1, 2], IsTruncated: true, NextKeyMarker: "k2", NextVersionIdMarker: "v2" },
      { Versions: [3], IsTruncated: false, NextKeyMarker: "k3", NextVersionIdMarker: "v3" }
    ],
    {
      inputToken: ["KeyMarker", "VersionIdMarker"],
      outputToken: ["NextKeyMarker", "NextVersionIdMarker"],
      resultKey: "Versions",
      moreResults: "IsTruncated"
    }
  );

  assert.deepEqual(await iterator.toArray(), [1, 2, 3]);
  assert.equal(backend.sent.length, 2);
  assert.deepEqual(backend.sent[1].params, { KeyMarker: "k2", VersionIdMarker: "v2" });
  assert.equal(iterator.getNextToken(), undefined);
});

test("a composite input key with a scalar token fails before the request is sent", async () => {
  const { backend, iterator } = createIterator([{ Items: [1], Next: "n1" }, { Items: [2] }], {
    inputToken: ["A", "B"],
    outputToken: "Next",
    resultKey: "Items"
  });

  await assert.rejects(iterator.toArray(), TokenShapeError);
  assert.equal(backend.sent.length, 1);
});

test("composite token arity mismatch raises TokenShapeError", async () => {
  const { backend, iterator } = createIterator([{ Items: [1], N1: "a", N2: "b", N3: "c" }, { Items: [2] }], {
    inputToken: ["A", "B"],
    outputToken: ["N1", "N2", "N3"],
    resultKey: "Items"
  });

  const pull = iterator[Symbol.asyncIterator]();
  assert.deepEqual(await pull.next(), { done: false, value: 1 });
  await assert.rejects(pull.next(), (error: unknown) => {
    assert.ok(error instanceof TokenShapeError);
    assert.equal(error.code, "TOKEN_SHAPE");
    return true;
  });
  assert.equal(backend.sent.length, 1);
});

test("a falsy more-results flag ends iteration whatever the token path holds", async () => {
  const options: IteratorOptions = { ...LIST_KEYS, moreResults: "HasMore" };

  for (const flag of [false, "false", "0", "FALSE", "", null, 0]) {
    const { backend, iterator } = createIterator([{ Items: ["a"], HasMore: flag, NextMarker: "m1" }], options);
    assert.deepEqual(await iterator.toArray(), ["a"]);
    assert.equal(backend.sent.length, 1);
    assert.equal(iterator.getNextToken(), undefined);
  }
});

test("other more-results strings keep pagination going", async () => {
  for (const flag of ["true", "1", "yes"]) {
    const { backend, iterator } = createIterator(
      [
        { Items: ["a"], HasMore: flag, NextMarker: "m1" },
        { Items: ["b"], HasMore: false }
      ],
      { ...LIST_KEYS, moreResults: "HasMore" }
    );
    assert.deepEqual(await iterator.toArray(), ["a", "b"]);
    assert.deepEqual(backend.sent[1].params, { Marker: "m1" });
  }
});

test("a missing more-results path counts as no more pages", async () => {
  const { backend, iterator } = createIterator([{ Items: ["a"], NextMarker: "m1" }], { ...LIST_KEYS, moreResults: "HasMore" });
  assert.deepEqual(await iterator.toArray(), ["a"]);
  assert.equal(backend.sent.length, 1);
});

test("missing or null result paths yield no items without error", async () => {
  const missing = createIterator([{ Other: [1] }], { resultKey: "Items" });
  assert.deepEqual(await missing.iterator.toArray(), []);

  const nulled = createIterator([{ Items: null }], { resultKey: "Items" });
  assert.deepEqual(await nulled.iterator.toArray(), []);

  const unconfigured = createIterator([{ Items: [1, 2] }], {});
  assert.deepEqual(await unconfigured.iterator.toArray(), []);
  assert.equal(unconfigured.backend.sent.length, 1);
});

test("a single non-array result is yielded as one item", async () => {
  const { iterator } = createIterator([{ Owner: { id: 7 } }], { resultKey: "Owner" });
  assert.deepEqual(await iterator.toArray(), [{ id: 7 }]);
});

test("nested result and token paths are resolved", async () => {
  const { backend, iterator } = createIterator(
    [
      { data: { rows: ["r1"] }, meta: { cursor: { next: "c2" } } },
      { data: { rows: ["r2"] }, meta: { cursor: {} } }
    ],
    { inputToken: "cursor", outputToken: "meta.cursor.next", resultKey: "data/rows" }
  );

  assert.deepEqual(await iterator.toArray(), ["r1", "r2"]);
  assert.deepEqual(backend.sent[1].params, { cursor: "c2" });
});

test("an empty page without a token ends iteration", async () => {
  const { backend, iterator } = createIterator([{ Items: [], NextMarker: "" }]);
  assert.deepEqual(await iterator.toArray(), []);
  assert.equal(backend.sent.length, 1);
});

test("page size hint is reconciled with the request limit and the total limit", async () => {
  const { backend, iterator } = createIterator(
    [
      { Items: [1, 2, 3], NextMarker: "n1" },
      { Items: [4, 5], NextMarker: "n2" }
    ],
    { ...LIST_KEYS, limitKey: "MaxKeys", pageSize: 3, limit: 5 },
    { MaxKeys: 10 }
  );

  assert.deepEqual(await iterator.toArray(), [1, 2, 3, 4, 5]);
  assert.equal(backend.sent.length, 2);
  assert.deepEqual(backend.sent[0].params, { MaxKeys: 3 });
  assert.deepEqual(backend.sent[1].params, { MaxKeys: 2, Marker: "n1" });
});

test("the request limit is left alone without a page size hint", async () => {
  const { backend, iterator } = createIterator([{ Items: [1] }], { ...LIST_KEYS, limitKey: "MaxKeys" }, { MaxKeys: 100 });
  await iterator.toArray();
  assert.deepEqual(backend.sent[0].params, { MaxKeys: 100 });
});

test("the page size hint is ignored when the request has no limit of its own", async () => {
  const { backend, iterator } = createIterator([{ Items: [1] }], { ...LIST_KEYS, limitKey: "MaxKeys", pageSize: 5 });
  await iterator.toArray();
  assert.deepEqual(backend.sent[0].params, {});
});

test("the total limit cuts a page short and skips further requests", async () => {
  const { backend, iterator } = createIterator([{ Items: ["a", "b", "c"], NextMarker: "m1" }, { Items: ["d"] }]);
  iterator.setLimit(2);

  assert.deepEqual(await iterator.toArray(), ["a", "b"]);
  assert.equal(backend.sent.length, 1);
  assert.equal(iterator.getPosition(), 2);
  assert.ok(isTokenPresent(iterator.getNextToken()));
});

test("maxEmptyPages bounds consecutive empty retries", async () => {
  const levels: LogLevel[] = [];
  const { backend, iterator } = createIterator(
    [{ Items: [], NextMarker: "a" }, { Items: [], NextMarker: "b" }, { Items: ["never"] }],
    { ...LIST_KEYS, maxEmptyPages: 2, hooks: { onLog: (entry) => void levels.push(entry.level) } }
  );

  assert.deepEqual(await iterator.toArray(), []);
  assert.equal(backend.sent.length, 2);
  assert.deepEqual(levels, ["debug", "notice", "debug", "warning"]);
});

test("operation failures propagate unchanged", async () => {
  const boom = new Error("connection reset");
  const { iterator } = createIterator([{ Items: ["a"], NextMarker: "m1" }, boom]);

  await assert.rejects(iterator.toArray(), (error: unknown) => error === boom);
});

test("hooks see each request with the token applied to it", async () => {
  const seen: Array<{ marker: unknown; token: unknown }> = [];
  const { iterator } = createIterator(
    [
      { Items: ["a"], NextMarker: "m1" },
      { Items: ["b"] }
    ],
    {
      ...LIST_KEYS,
      hooks: {
        onBeforeSend: ({ request, token }) => {
          seen.push({ marker: request.get("Marker"), token });
        }
      }
    }
  );

  await iterator.toArray();
  assert.deepEqual(seen, [
    { marker: undefined, token: undefined },
    { marker: "m1", token: { kind: "scalar", value: "m1" } }
  ]);
});

test("map and filter wrap the sequence and expose the last result", async () => {
  const { iterator } = createIterator([
    { Items: ["a", "b"], NextMarker: "m1" },
    { Items: ["c"], NextMarker: null }
  ]);

  const upper = iterator.filter((item) => item !== "b").map((item) => String(item).toUpperCase());
  assert.deepEqual(await upper.toArray(), ["A", "C"]);
  assert.deepEqual(upper.getLastResult()?.getPath("Items"), ["c"]);
});

test("parse validates items against a schema", async () => {
  const good = createIterator([{ Items: [{ id: 1 }, { id: 2 }] }]);
  const ids = await good.iterator.parse(z.object({ id: z.number() })).map((item) => item.id).toArray();
  assert.deepEqual(ids, [1, 2]);

  const bad = createIterator([{ Items: [{ id: "one" }] }]);
  await assert.rejects(bad.iterator.parse(z.object({ id: z.number() })).toArray(), z.ZodError);
});

test("an exhausted iterator does not restart", async () => {
  const { backend, iterator } = createIterator([{ Items: ["a"] }]);

  assert.deepEqual(await iterator.toArray(), ["a"]);
  assert.deepEqual(await iterator.toArray(), []);
  assert.equal(backend.sent.length, 1);
});

test("the caller's request is never mutated", async () => {
  const backend = new FakeBackend([{ Items: ["a"], NextMarker: "m1" }, { Items: ["b"] }]);
  const operation = new FakeOperation("List", backend, { MaxKeys: 10 });
  const iterator = new PagingIterator(operation, { ...LIST_KEYS, limitKey: "MaxKeys", pageSize: 1 });

  await iterator.toArray();
  assert.equal(operation.get("MaxKeys"), 10);
  assert.equal(operation.get("Marker"), undefined);
});
