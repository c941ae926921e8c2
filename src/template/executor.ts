/**
 * Template executor.
 *
 * Walks a template directory depth-first in name order and mirrors it
 * under a destination directory:
 *
 *   1. The entry's relative path is rendered as a template, so names like
 *      `{{name}}/src/{{kebabcase name}}.ts` follow the user's answers.
 *   2. Directories are created ("already exists" is fine).
 *   3. Files replace whatever is at the target: the old file is removed,
 *      a new one is created with the source's permission bits, and the
 *      rendered contents are written into it.
 *   4. Blank results are pruned.
 *
 * Everything is sequential. The first failure stops the walk; files
 * written before it stay on disk.
 */

import {
  closeSync,
  lstatSync,
  mkdirSync,
  openSync,
  readdirSync,
  readFileSync,
  statSync,
  unlinkSync,
  writeFileSync,
} from "node:fs";
import { join, relative, sep } from "node:path";

import { PromptAbortedError, type BindingTable } from "../bindings/index.js";
import type { Logger } from "../logging/index.js";
import { errorMessage, hasErrorCode } from "../utils/errno.js";
import {
  compileTemplate,
  createRuntime,
  renderTemplate,
  scopeOf,
  type AmbientData,
  type TemplateScope,
} from "./engine.js";
import { RenderError } from "./errors.js";
import type { TemplateRuntime } from "./helpers.js";
import { pruneIfBlank } from "./pruner.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface FileRenderedEvent {
  /** 1-based position among rendered files */
  index: number;
  /** Rendered path relative to the destination, "/"-separated */
  relativePath: string;
  absolutePath: string;
  /** The file rendered blank and was removed */
  pruned: boolean;
}

export interface RenderTreeOptions {
  /** Handlebars runtime to compile with (default: a fresh one) */
  runtime?: TemplateRuntime;
  /** Exposed to templates as `@template.*` */
  ambient?: AmbientData;
  /** Called after every file */
  onFileRendered?: (event: FileRenderedEvent) => void;
  logger?: Logger;
}

export interface RenderSummary {
  directories: number;
  /** Files kept in the destination, rendered relative paths in walk order */
  files: string[];
  /** Files removed because they rendered blank */
  pruned: string[];
}

interface SourceEntry {
  absolutePath: string;
  /** "/"-separated, "" for the template directory itself */
  relativePath: string;
  isDirectory: boolean;
  /** Links are reported, never followed */
  isSymbolicLink: boolean;
}

// ---------------------------------------------------------------------------
// Walk
// ---------------------------------------------------------------------------

function toPosix(path: string): string {
  return sep === "/" ? path : path.split(sep).join("/");
}

/**
 * Depth-first walk, parents before children, siblings sorted by name.
 * Symbolic links below the root are yielded as they are and never
 * descended into.
 */
export function* walkTemplateTree(root: string): Generator<SourceEntry> {
  const stack: string[] = [root];

  while (stack.length > 0) {
    const current = stack.pop();
    if (current === undefined) break;

    // The template directory itself may be reached through a link.
    const stat = current === root ? statSync(current) : lstatSync(current);
    const isDirectory = stat.isDirectory();
    yield {
      absolutePath: current,
      relativePath: toPosix(relative(root, current)),
      isDirectory,
      isSymbolicLink: stat.isSymbolicLink(),
    };

    if (!isDirectory) continue;

    const children = readdirSync(current).sort();
    for (let i = children.length - 1; i >= 0; i--) {
      const child = children[i];
      if (child !== undefined) stack.push(join(current, child));
    }
  }
}

// ---------------------------------------------------------------------------
// Path rendering
// ---------------------------------------------------------------------------

/**
 * Split a rendered relative path into segments, rejecting any that would
 * collapse or escape the destination.
 */
export function checkRenderedPath(entry: string, rendered: string): string[] {
  const segments = rendered.split("/");
  const bad = segments.find((s) => s === "" || s === "." || s === "..");
  if (bad !== undefined) {
    throw new RenderError(
      entry,
      bad === ""
        ? `Path "${entry}" renders to "${rendered}", which has an empty segment`
        : `Path "${entry}" renders to "${rendered}", which leaves its directory`
    );
  }
  return segments;
}

// ---------------------------------------------------------------------------
// Executor
// ---------------------------------------------------------------------------

class TreeRenderer {
  private readonly runtime: TemplateRuntime;
  private readonly scope: TemplateScope;
  private readonly summary: RenderSummary = { directories: 0, files: [], pruned: [] };
  private fileCount = 0;

  constructor(
    private readonly destDir: string,
    private readonly table: BindingTable,
    private readonly options: RenderTreeOptions
  ) {
    this.runtime = options.runtime ?? createRuntime();
    this.scope = scopeOf(table);
  }

  async run(sourceDir: string): Promise<RenderSummary> {
    this.warnShadowedBindings();

    const entries = walkTemplateTree(sourceDir);

    for (;;) {
      let next: IteratorResult<SourceEntry>;
      try {
        next = entries.next();
      } catch (err) {
        throw new RenderError("", `Cannot walk template directory: ${errorMessage(err)}`, err);
      }
      if (next.done) break;

      const entry = next.value;
      try {
        await this.entry(entry);
      } catch (err) {
        if (err instanceof RenderError || err instanceof PromptAbortedError) throw err;
        throw new RenderError(
          entry.relativePath,
          `Failed to render "${entry.relativePath || "."}": ${errorMessage(err)}`,
          err
        );
      }
    }

    return this.summary;
  }

  private async entry(entry: SourceEntry): Promise<void> {
    if (entry.relativePath === "") {
      mkdirSync(this.destDir, { recursive: true });
      return;
    }
    if (entry.isSymbolicLink) {
      throw new RenderError(
        entry.relativePath,
        `Path "${entry.relativePath}" is a symbolic link; templates may only contain files and directories`
      );
    }

    const rendered = await this.render(entry.relativePath, entry.relativePath);
    const segments = checkRenderedPath(entry.relativePath, rendered);
    const target = join(this.destDir, ...segments);

    if (entry.isDirectory) {
      this.directory(entry, target);
    } else {
      await this.file(entry, segments.join("/"), target);
    }
  }

  private directory(entry: SourceEntry, target: string): void {
    try {
      mkdirSync(target);
      this.summary.directories++;
    } catch (err) {
      if (!hasErrorCode(err, "EEXIST")) {
        throw new RenderError(
          entry.relativePath,
          `Cannot create directory ${target}: ${errorMessage(err)}`,
          err
        );
      }
      if (!statSync(target).isDirectory()) {
        throw new RenderError(
          entry.relativePath,
          `Cannot create directory ${target}: a file is in the way`
        );
      }
    }
    this.options.logger?.debug("Directory ready", { target });
  }

  private async file(entry: SourceEntry, relativePath: string, target: string): Promise<void> {
    const mode = statSync(entry.absolutePath).mode & 0o7777;

    try {
      unlinkSync(target);
    } catch (err) {
      if (!hasErrorCode(err, "ENOENT")) {
        throw new RenderError(
          entry.relativePath,
          `Cannot replace ${target}: ${errorMessage(err)}`,
          err
        );
      }
    }

    const fd = openSync(target, "w", mode);
    try {
      const source = readFileSync(entry.absolutePath, "utf-8");
      const contents = await this.render(source, entry.relativePath);
      writeFileSync(fd, contents);
    } finally {
      closeSync(fd);
    }

    const pruned = pruneIfBlank(target, this.options.logger) === "removed";
    if (pruned) this.summary.pruned.push(relativePath);
    else this.summary.files.push(relativePath);

    this.fileCount++;
    this.options.logger?.debug("Rendered file", { target, pruned });
    this.options.onFileRendered?.({
      index: this.fileCount,
      relativePath,
      absolutePath: target,
      pruned,
    });
  }

  private render(source: string, name: string): Promise<string> {
    const template = compileTemplate(this.runtime, source, name, this.scope);
    return renderTemplate(template, this.table, this.options.ambient);
  }

  private warnShadowedBindings(): void {
    for (const name of this.table.names()) {
      if (name in this.runtime.helpers) {
        this.options.logger?.warn("Binding is shadowed by a helper of the same name", { name });
      }
    }
  }
}

/**
 * Render every entry of `sourceDir` into `destDir`.
 *
 * @throws RenderError         on any template or filesystem failure
 * @throws PromptAbortedError  if the user cancels a prompt
 */
export function renderTree(
  sourceDir: string,
  destDir: string,
  table: BindingTable,
  options: RenderTreeOptions = {}
): Promise<RenderSummary> {
  return new TreeRenderer(destDir, table, options).run(sourceDir);
}
