/**
 * Binding and resolution tests.
 *
 * Run: node --import tsx --test src/bindings/bindings.test.ts
 */

import { strict as assert } from "node:assert";
import { describe, test } from "node:test";

import {
  bindContext,
  buildBindings,
  BindingTable,
  PromptAbortedError,
  UnknownBindingError,
  UnresolvedBindingError,
} from "./index.js";
import { parseContextTree } from "../context/index.js";
import { ScriptedPrompter } from "../testing/scripted-prompter.js";

// ═══════════════════════════════════════════════════════════════════════════
// TEST FIXTURES
// ═══════════════════════════════════════════════════════════════════════════

const CONTEXT = parseContextTree({
  name: "my-app",
  port: 8080,
  private: true,
  license: ["MIT", "Apache-2.0"],
  docker: { image: ["node", "deno"], tag: "latest" },
});

function interactive(answers: Record<string, string | number | boolean> = {}) {
  const prompter = new ScriptedPrompter(answers);
  const table = bindContext(CONTEXT, { mode: "interactive", prompter });
  return { prompter, table };
}

// ═══════════════════════════════════════════════════════════════════════════
// RECORDS
// ═══════════════════════════════════════════════════════════════════════════

describe("buildBindings", () => {
  test("emits a gate before its members", () => {
    const bindings = buildBindings(CONTEXT, "interactive");
    assert.deepEqual(
      bindings.map((b) => [b.name, b.kind]),
      [
        ["name", "variable"],
        ["port", "variable"],
        ["private", "variable"],
        ["license", "variable"],
        ["docker", "gate"],
        ["image", "variable"],
        ["tag", "variable"],
      ]
    );

    const gate = bindings[4];
    assert.equal(gate?.kind, "gate");
    if (gate?.kind === "gate") {
      assert.deepEqual(gate.members, ["image", "tag"]);
      assert.equal(gate.defaultValue, false);
    }

    const image = bindings[5];
    assert.equal(image?.kind === "variable" ? image.group : undefined, "docker");
    assert.equal(image?.defaultValue, "node");
  });

  test("strategy follows the mode", () => {
    assert.ok(buildBindings(CONTEXT, "defaults").every((b) => b.strategy === "default"));
    assert.ok(buildBindings(CONTEXT, "interactive").every((b) => b.strategy === "prompt"));
  });

  test("empty groups produce no bindings", () => {
    assert.deepEqual(buildBindings(parseContextTree({ extras: {} }), "interactive"), []);
  });

  test("duplicate names are rejected by the table", () => {
    const bindings = buildBindings(CONTEXT, "defaults");
    assert.throws(
      () => new BindingTable([...bindings, ...bindings]),
      /Duplicate binding "name"/
    );
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// DEFAULTS MODE
// ═══════════════════════════════════════════════════════════════════════════

describe("defaults mode", () => {
  test("every binding is its declared default and gates are closed", async () => {
    const table = bindContext(CONTEXT, { mode: "defaults" });
    assert.deepEqual(await table.resolveAll(), {
      name: "my-app",
      port: 8080,
      private: true,
      license: "MIT",
      docker: false,
      image: "node",
      tag: "latest",
    });
    assert.equal(table.prompts, 0);
  });

  test("values are known without awaiting", () => {
    const table = bindContext(CONTEXT, { mode: "defaults" });
    assert.equal(table.peek("license"), "MIT");
    assert.equal(table.templateData().port?.(), 8080);
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// INTERACTIVE MODE
// ═══════════════════════════════════════════════════════════════════════════

describe("interactive mode", () => {
  test("asks with the question type matching the declared value", async () => {
    const { prompter, table } = interactive({
      name: "shop",
      port: "9090",
      private: false,
      license: "Apache-2.0",
    });

    assert.equal(await table.resolve("name"), "shop");
    assert.equal(await table.resolve("port"), 9090);
    assert.equal(await table.resolve("private"), false);
    assert.equal(await table.resolve("license"), "Apache-2.0");
    assert.deepEqual(
      prompter.calls.map((c) => c.kind),
      ["text", "text", "confirm", "select"]
    );
  });

  test("numbers are validated", async () => {
    const { table } = interactive({ port: "eighty" });
    await assert.rejects(table.resolve("port"), /Enter a number/);
  });

  test("an unanswered question takes the default", async () => {
    const { table } = interactive();
    assert.equal(await table.resolve("name"), "my-app");
    assert.equal(await table.resolve("license"), "MIT");
  });

  test("answers are memoized", async () => {
    const { prompter, table } = interactive({ name: "shop" });
    const [a, b] = await Promise.all([table.resolve("name"), table.resolve("name")]);
    assert.equal(a, "shop");
    assert.equal(b, "shop");
    assert.equal(await table.resolve("name"), "shop");
    assert.deepEqual(prompter.asked(), ["name"]);
    assert.equal(table.prompts, 1);
  });

  test("a closed group never asks about its members", async () => {
    const { prompter, table } = interactive({ docker: false, image: "deno" });
    assert.equal(await table.resolve("image"), "node");
    assert.equal(await table.resolve("tag"), "latest");
    assert.deepEqual(prompter.asked(), ["docker"]);
  });

  test("members of a closed group settle without awaiting", async () => {
    const { table } = interactive({ docker: false });
    assert.equal(table.peek("image"), undefined);
    await table.resolve("docker");
    assert.equal(table.peek("image"), "node");
  });

  test("an open group asks about each member once", async () => {
    const { prompter, table } = interactive({ docker: true, image: "deno" });
    assert.equal(await table.resolve("image"), "deno");
    assert.equal(await table.resolve("tag"), "latest");
    assert.deepEqual(prompter.asked(), ["docker", "image", "tag"]);
    assert.equal(prompter.calls[0]?.message, 'Use advanced settings for "docker"?');
    assert.equal(prompter.calls[1]?.message, "docker › image");
  });

  test("template lambdas throw until the binding is resolved", async () => {
    const { table } = interactive({ name: "shop" });
    const lambda = table.templateData().name;
    if (!lambda) throw new Error("no lambda for name");
    assert.throws(lambda, UnresolvedBindingError);
    await table.resolve("name");
    assert.equal(lambda(), "shop");
  });

  test("a cancelled prompt rejects with PromptAbortedError", async () => {
    const prompter = new ScriptedPrompter({}, { abortOn: "name" });
    const table = bindContext(CONTEXT, { mode: "interactive", prompter });
    await assert.rejects(table.resolve("name"), PromptAbortedError);
  });

  test("unknown names are rejected", async () => {
    const { table } = interactive();
    await assert.rejects(table.resolve("nope"), UnknownBindingError);
    assert.equal(table.peek("nope"), undefined);
  });

  test("prompting without a prompter fails", async () => {
    const table = new BindingTable(buildBindings(CONTEXT, "interactive"));
    await assert.rejects(table.resolve("name"), /no prompter was given/);
  });
});
