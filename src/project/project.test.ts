/**
 * Template loading, execution, metadata and validation tests.
 *
 * Run: node --import tsx --test src/project/project.test.ts
 */

import { strict as assert } from "node:assert";
import { existsSync, mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";
import { afterEach, beforeEach, describe, test } from "node:test";

import {
  createMetadata,
  METADATA_FILE_NAME,
  MetadataError,
  ProjectTemplate,
  readMetadata,
  TemplateLayoutError,
  validateTemplate,
  writeMetadata,
} from "./index.js";
import { ContextSchemaError } from "../context/index.js";
import type { FileRenderedEvent } from "../template/index.js";
import { ScriptedPrompter } from "../testing/scripted-prompter.js";

// ═══════════════════════════════════════════════════════════════════════════
// TEST FIXTURES
// ═══════════════════════════════════════════════════════════════════════════

let workDir = "";

beforeEach(() => {
  workDir = mkdtempSync(join(tmpdir(), "scaffoldr-project-"));
});

afterEach(() => {
  rmSync(workDir, { recursive: true, force: true });
});

function writeTemplate(
  name: string,
  context: unknown,
  files: Record<string, string>
): string {
  const root = join(workDir, name);
  mkdirSync(join(root, "template"), { recursive: true });
  if (context !== undefined) {
    writeFileSync(join(root, "project.json"), JSON.stringify(context));
  }
  for (const [path, contents] of Object.entries(files)) {
    const full = join(root, "template", path);
    mkdirSync(dirname(full), { recursive: true });
    writeFileSync(full, contents);
  }
  return root;
}

const SERVICE_CONTEXT = {
  name: "service",
  license: ["MIT", "ISC"],
  docker: { image: "node:20" },
};

const SERVICE_FILES = {
  "{{name}}/README.md": "# {{name}} ({{license}})\n",
  "{{name}}/Dockerfile": "{{#if docker}}FROM {{image}}\n{{/if}}",
  "{{name}}/tag.txt": "{{@template.tag}}",
};

// ═══════════════════════════════════════════════════════════════════════════
// LOADING
// ═══════════════════════════════════════════════════════════════════════════

describe("ProjectTemplate.load", () => {
  test("reads the context and derives metadata from the directory", () => {
    const root = writeTemplate("svc", SERVICE_CONTEXT, SERVICE_FILES);
    const template = ProjectTemplate.load(root);

    assert.deepEqual([...template.context.keys()], ["name", "license", "docker"]);
    assert.equal(template.info().tag, "svc");
    assert.equal(template.info().repository, root);
    assert.equal(template.sourceDir, join(root, "template"));
  });

  test("a template without project.json has no variables", () => {
    const root = writeTemplate("plain", undefined, { "a.txt": "a" });
    assert.equal(ProjectTemplate.load(root).context.size, 0);
  });

  test("prefers a stored metadata record", () => {
    const root = writeTemplate("svc", SERVICE_CONTEXT, SERVICE_FILES);
    writeMetadata(root, createMetadata("go-service", "/src/go", new Date("2024-01-15T10:42:00Z")));
    assert.deepEqual(ProjectTemplate.load(root).info(), {
      tag: "go-service",
      repository: "/src/go",
      created: "2024-01-15T10:42:00.000Z",
    });
  });

  test("rejects a missing root or template directory", () => {
    assert.throws(() => ProjectTemplate.load(join(workDir, "nope")), TemplateLayoutError);

    const root = join(workDir, "bare");
    mkdirSync(root);
    assert.throws(() => ProjectTemplate.load(root), /has no "template\/" directory/);
  });

  test("rejects a malformed context file", () => {
    const root = writeTemplate("bad", { a: { b: { c: 1 } } }, {});
    assert.throws(() => ProjectTemplate.load(root), ContextSchemaError);
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// METADATA
// ═══════════════════════════════════════════════════════════════════════════

describe("metadata", () => {
  test("writes pretty JSON with a trailing newline", () => {
    const path = writeMetadata(workDir, { tag: "t", repository: "/r" });
    assert.equal(path, join(workDir, METADATA_FILE_NAME));
    assert.equal(readFileSync(path, "utf-8"), '{\n  "tag": "t",\n  "repository": "/r"\n}\n');
    assert.deepEqual(readMetadata(workDir), { tag: "t", repository: "/r" });
  });

  test("a missing record reads as undefined", () => {
    assert.equal(readMetadata(workDir), undefined);
  });

  test("rejects unknown fields and bad JSON", () => {
    writeFileSync(join(workDir, METADATA_FILE_NAME), '{"tag": "t", "repository": "/r", "extra": 1}');
    assert.throws(() => readMetadata(workDir), MetadataError);

    writeFileSync(join(workDir, METADATA_FILE_NAME), "{");
    assert.throws(() => readMetadata(workDir), /Failed to parse metadata JSON/);
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// EXECUTION
// ═══════════════════════════════════════════════════════════════════════════

describe("ProjectTemplate.execute", () => {
  test("renders with defaults and stays quiet", async () => {
    const root = writeTemplate("svc", SERVICE_CONTEXT, SERVICE_FILES);
    const target = join(workDir, "out");
    const events: FileRenderedEvent[] = [];

    const summary = await ProjectTemplate.load(root).execute(target, {
      useDefaults: true,
      onFileRendered: (e) => events.push(e),
    });

    assert.equal(readFileSync(join(target, "service/README.md"), "utf-8"), "# service (MIT)\n");
    assert.equal(readFileSync(join(target, "service/tag.txt"), "utf-8"), "svc");
    assert.equal(existsSync(join(target, "service/Dockerfile")), false);
    assert.deepEqual(summary.pruned, ["service/Dockerfile"]);
    assert.deepEqual(events, []);
  });

  test("prompts and reports files in interactive mode", async () => {
    const root = writeTemplate("svc", SERVICE_CONTEXT, SERVICE_FILES);
    const target = join(workDir, "out");
    const prompter = new ScriptedPrompter({ name: "api", license: "ISC", docker: true });
    const events: FileRenderedEvent[] = [];

    await ProjectTemplate.load(root).execute(target, {
      prompter,
      onFileRendered: (e) => events.push(e),
    });

    assert.equal(readFileSync(join(target, "api/Dockerfile"), "utf-8"), "FROM node:20\n");
    assert.equal(readFileSync(join(target, "api/README.md"), "utf-8"), "# api (ISC)\n");
    assert.deepEqual(prompter.asked(), ["name", "docker", "image", "license"]);
    assert.deepEqual(
      events.map((e) => e.relativePath),
      ["api/Dockerfile", "api/README.md", "api/tag.txt"]
    );
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// VALIDATION
// ═══════════════════════════════════════════════════════════════════════════

describe("validateTemplate", () => {
  test("a template that renders with defaults is valid", async () => {
    const root = writeTemplate("svc", SERVICE_CONTEXT, SERVICE_FILES);
    const result = await validateTemplate(root);
    assert.equal(result.valid, true);
    assert.equal(result.tag, "svc");
    assert.deepEqual(result.summary?.files, ["service/README.md", "service/tag.txt"]);
    assert.deepEqual(result.errors, []);
  });

  test("unknown variables make a template invalid", async () => {
    const root = writeTemplate("svc", { name: "x" }, { "a.txt": "{{nmae}}" });
    const result = await validateTemplate(root);
    assert.equal(result.valid, false);
    assert.deepEqual(result.errors, [
      'Failed to render "a.txt": Template "a.txt" references unknown variable(s) or helper(s): nmae',
    ]);
  });

  test("a malformed context is reported with its issues", async () => {
    const root = writeTemplate("svc", { "bad-name": 1 }, {});
    const result = await validateTemplate(root);
    assert.equal(result.valid, false);
    assert.equal(
      result.errors[0],
      `Invalid context file ${join(root, "project.json")}:\n` +
        "  - bad-name: variable names must be identifiers (letters, digits, underscore)"
    );
  });

  test("a missing layout is reported", async () => {
    const result = await validateTemplate(join(workDir, "nope"));
    assert.equal(result.valid, false);
    assert.equal(result.errors[0], `Template root does not exist: ${join(workDir, "nope")}`);
  });
});
