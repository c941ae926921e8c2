/**
 * Context schema and loader tests.
 *
 * Run: node --import tsx --test src/context/context.test.ts
 */

import { strict as assert } from "node:assert";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { after, describe, test } from "node:test";

import {
  CONTEXT_FILE_NAME,
  ContextSchemaError,
  defaultOf,
  loadContextFile,
  parseContextJson,
  parseContextTree,
  variableNames,
} from "./index.js";

function schemaError(fn: () => unknown): ContextSchemaError {
  try {
    fn();
  } catch (err) {
    if (err instanceof ContextSchemaError) return err;
    throw err;
  }
  throw new Error("expected a ContextSchemaError");
}

// ═══════════════════════════════════════════════════════════════════════════
// CLASSIFICATION
// ═══════════════════════════════════════════════════════════════════════════

describe("parseContextTree", () => {
  test("classifies scalars, lists and groups in file order", () => {
    const tree = parseContextTree({
      name: "my-app",
      port: 8080,
      private: true,
      license: ["MIT", "Apache-2.0"],
      docker: { image: ["node", "deno"], expose: false },
    });

    assert.deepEqual([...tree.keys()], ["name", "port", "private", "license", "docker"]);
    assert.deepEqual(tree.get("name"), { kind: "scalar", value: "my-app" });
    assert.deepEqual(tree.get("license"), { kind: "list", items: ["MIT", "Apache-2.0"] });

    const docker = tree.get("docker");
    assert.equal(docker?.kind, "group");
    if (docker?.kind === "group") {
      assert.deepEqual([...docker.children.keys()], ["image", "expose"]);
      assert.deepEqual(docker.children.get("expose"), { kind: "scalar", value: false });
    }
  });

  test("accepts an empty object", () => {
    assert.equal(parseContextTree({}).size, 0);
  });

  test("defaults are the scalar itself or the first list item", () => {
    assert.equal(defaultOf({ kind: "scalar", value: 3 }), 3);
    assert.equal(defaultOf({ kind: "list", items: ["b", "a"] }), "b");
  });

  test("variableNames lists a group before its children and skips empty groups", () => {
    const tree = parseContextTree({ a: 1, empty: {}, g: { x: "1", y: ["p"] }, b: "z" });
    assert.deepEqual(variableNames(tree), ["a", "g", "x", "y", "b"]);
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// REJECTION
// ═══════════════════════════════════════════════════════════════════════════

describe("parseContextTree rejects", () => {
  test("a top-level value that is not an object", () => {
    const err = schemaError(() => parseContextTree(["a"]));
    assert.deepEqual(err.issues, [
      { path: [], message: "expected an object, got array", code: "invalid_type" },
    ]);
    assert.equal(
      err.format(),
      "Invalid context:\n  - (root): expected an object, got array"
    );
  });

  test("nested groups", () => {
    const err = schemaError(() => parseContextTree({ docker: { inner: { x: 1 } } }, "project.json"));
    assert.equal(err.issues.length, 1);
    assert.deepEqual(err.issues[0]?.path, ["docker", "inner"]);
    assert.equal(err.issues[0]?.code, "nested_group");
    assert.equal(
      err.format(),
      "Invalid context file project.json:\n" +
        "  - docker.inner: groups cannot be nested; a group's children must be scalars or lists"
    );
  });

  test("empty lists", () => {
    const err = schemaError(() => parseContextTree({ license: [] }));
    assert.deepEqual(err.issues[0]?.path, ["license"]);
    assert.equal(err.issues[0]?.message, "a list needs at least one item; the first one is the default");
  });

  test("null and nested lists", () => {
    const err = schemaError(() => parseContextTree({ a: null, b: [["x"]] }));
    assert.deepEqual(err.issues[0], {
      path: ["a"],
      message: "expected a string, number, boolean or list, got null",
      code: "invalid_type",
    });
    assert.deepEqual(err.issues[1]?.path, ["b", 0]);
    assert.equal(err.message, "2 problem(s) in context schema");
  });

  test("names that are not identifiers", () => {
    const err = schemaError(() => parseContextTree({ "my-name": "x" }));
    assert.deepEqual(err.issues[0]?.path, ["my-name"]);
    assert.equal(
      err.issues[0]?.message,
      "variable names must be identifiers (letters, digits, underscore)"
    );
  });

  test("names that shadow Object.prototype members", () => {
    const err = schemaError(() => parseContextJson('{"__proto__": "P", "constructor": "C"}'));
    assert.deepEqual(
      err.issues.map((issue) => issue.path),
      [["__proto__"], ["constructor"]]
    );
    assert.equal(
      err.issues[0]?.message,
      "reserved names such as __proto__ and constructor cannot be variables"
    );
  });

  test("a child reusing a top-level name", () => {
    const err = schemaError(() => parseContextTree({ port: 80, docker: { port: 8080 } }));
    assert.deepEqual(err.issues, [
      {
        path: ["docker", "port"],
        message: '"port" is already a top-level variable',
        code: "duplicate_name",
      },
    ]);
  });

  test("a child reusing the name of a child in another group", () => {
    const err = schemaError(() => parseContextTree({ a: { port: 1 }, b: { port: 2 } }));
    assert.equal(err.issues[0]?.message, '"port" is already declared in group "a"');
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// LOADER
// ═══════════════════════════════════════════════════════════════════════════

describe("loadContextFile", () => {
  const root = mkdtempSync(join(tmpdir(), "scaffoldr-context-"));
  after(() => rmSync(root, { recursive: true, force: true }));

  test("a missing file means no variables", () => {
    assert.equal(loadContextFile(root).size, 0);
  });

  test("reads project.json", () => {
    writeFileSync(join(root, CONTEXT_FILE_NAME), JSON.stringify({ name: "demo" }));
    assert.deepEqual(loadContextFile(root).get("name"), { kind: "scalar", value: "demo" });
  });

  test("malformed JSON is a schema error naming the file", () => {
    writeFileSync(join(root, CONTEXT_FILE_NAME), "{ name: ");
    const err = schemaError(() => loadContextFile(root));
    assert.ok(err.message.startsWith("Failed to parse JSON: "));
    assert.equal(err.source, join(root, CONTEXT_FILE_NAME));
  });

  test("parseContextJson validates after parsing", () => {
    assert.throws(() => parseContextJson('{"x": {"y": {}}}'), ContextSchemaError);
  });
});
