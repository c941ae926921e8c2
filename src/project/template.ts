/**
 * A template on disk: context file, source tree and metadata.
 *
 *   my-template/
 *   ├── project.json        variables (optional)
 *   ├── __metadata.json     saved-template record (optional)
 *   └── template/           rendered into the target directory
 *
 * USAGE:
 *
 *   const template = ProjectTemplate.load("./my-template");
 *   await template.execute("./new-project", { useDefaults: true });
 */

import { statSync } from "node:fs";
import { join, resolve } from "node:path";

import {
  bindContext,
  type Prompter,
} from "../bindings/index.js";
import { loadContextFile, type ContextTree } from "../context/index.js";
import { silentLogger, type Logger } from "../logging/index.js";
import {
  renderTree,
  type FileRenderedEvent,
  type RenderSummary,
} from "../template/index.js";
import { hasErrorCode } from "../utils/errno.js";
import { deriveMetadata, readMetadata, type TemplateMetadata } from "./metadata.js";

/** Directory under the template root that gets rendered. */
export const TEMPLATE_DIR_NAME = "template";

export class TemplateLayoutError extends Error {
  constructor(
    public readonly templateRoot: string,
    message: string
  ) {
    super(message);
    this.name = "TemplateLayoutError";
  }
}

export interface ExecuteOptions {
  /** Skip every prompt and use declared defaults */
  useDefaults?: boolean;
  /** Source of answers when prompting (default: terminal prompts) */
  prompter?: Prompter;
  /** Per-file notification; not called when useDefaults is set */
  onFileRendered?: (event: FileRenderedEvent) => void;
  logger?: Logger;
}

export interface LoadOptions {
  logger?: Logger;
}

export class ProjectTemplate {
  private constructor(
    /** Absolute template root */
    readonly root: string,
    /** Absolute path of the rendered source tree */
    readonly sourceDir: string,
    readonly context: ContextTree,
    private readonly metadata: TemplateMetadata
  ) {}

  /**
   * Load a template root.
   *
   * @throws TemplateLayoutError  if the root or its template/ directory is missing
   * @throws ContextSchemaError   if project.json is malformed
   * @throws MetadataError        if __metadata.json is malformed
   */
  static load(path: string, options: LoadOptions = {}): ProjectTemplate {
    const root = resolve(path);
    const sourceDir = join(root, TEMPLATE_DIR_NAME);

    if (!isDirectory(root)) {
      throw new TemplateLayoutError(root, `Template root does not exist: ${root}`);
    }
    if (!isDirectory(sourceDir)) {
      throw new TemplateLayoutError(
        root,
        `Template root ${root} has no "${TEMPLATE_DIR_NAME}/" directory`
      );
    }

    const context = loadContextFile(root, options.logger);
    const metadata = readMetadata(root) ?? deriveMetadata(root);

    return new ProjectTemplate(root, sourceDir, context, metadata);
  }

  info(): TemplateMetadata {
    return { ...this.metadata };
  }

  /**
   * Render the template into `targetDir`.
   *
   * @throws RenderError         on template or filesystem failures
   * @throws PromptAbortedError  if the user cancels a prompt
   */
  async execute(targetDir: string, options: ExecuteOptions = {}): Promise<RenderSummary> {
    const logger = options.logger ?? silentLogger;
    const useDefaults = options.useDefaults ?? false;

    const table = bindContext(this.context, {
      mode: useDefaults ? "defaults" : "interactive",
      prompter: options.prompter,
      logger,
    });

    logger.info("Rendering template", {
      tag: this.metadata.tag,
      target: targetDir,
      variables: table.size,
      useDefaults,
    });

    const summary = await renderTree(this.sourceDir, resolve(targetDir), table, {
      ambient: this.metadata,
      onFileRendered: useDefaults ? undefined : options.onFileRendered,
      logger,
    });

    logger.info("Template rendered", {
      files: summary.files.length,
      pruned: summary.pruned.length,
      directories: summary.directories,
    });
    return summary;
  }
}

function isDirectory(path: string): boolean {
  try {
    return statSync(path).isDirectory();
  } catch (err) {
    if (hasErrorCode(err, "ENOENT") || hasErrorCode(err, "ENOTDIR")) return false;
    throw err;
  }
}
