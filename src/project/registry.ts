/**
 * Registry of saved templates.
 *
 * Saved templates live under one directory, one subdirectory per tag:
 *
 *   ~/.scaffoldr/templates/
 *   ├── go-service/
 *   │   ├── __metadata.json
 *   │   ├── project.json
 *   │   └── template/
 *   └── react-app/
 *
 * Saving validates the template first, so everything in the registry
 * renders with defaults.
 */

import { cpSync, existsSync, mkdirSync, readdirSync, rmSync, statSync } from "node:fs";
import { join, resolve } from "node:path";
import { z } from "zod";

import type { Logger } from "../logging/index.js";
import {
  createMetadata,
  deriveMetadata,
  readMetadata,
  writeMetadata,
  type TemplateMetadata,
} from "./metadata.js";
import { ProjectTemplate } from "./template.js";
import { assertValidTemplate } from "./validate.js";

export const TagSchema = z
  .string()
  .regex(
    /^[A-Za-z0-9][A-Za-z0-9._-]*$/,
    "tags start with a letter or digit and contain only letters, digits, '.', '_' and '-'"
  );

export class RegistryError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "RegistryError";
  }
}

export interface SaveOptions {
  /** Replace a template already saved under the same tag */
  force?: boolean;
}

export class TemplateRegistry {
  readonly root: string;

  constructor(
    root: string,
    private readonly logger?: Logger
  ) {
    this.root = resolve(root);
  }

  /**
   * Path a tag is (or would be) stored at.
   *
   * @throws RegistryError if the tag is malformed
   */
  pathOf(tag: string): string {
    const result = TagSchema.safeParse(tag);
    if (!result.success) {
      throw new RegistryError(
        `Invalid tag "${tag}": ${result.error.issues.map((i) => i.message).join("; ")}`
      );
    }
    return join(this.root, tag);
  }

  has(tag: string): boolean {
    return existsSync(this.pathOf(tag));
  }

  /**
   * Validate a template and copy it into the registry under `tag`.
   *
   * @throws RegistryError         if the tag exists and force is not set
   * @throws TemplateInvalidError  if the template does not render with defaults
   */
  async save(sourcePath: string, tag: string, options: SaveOptions = {}): Promise<TemplateMetadata> {
    const target = this.pathOf(tag);
    const source = resolve(sourcePath);

    if (source === target) {
      throw new RegistryError(`"${tag}" is already the saved copy; nothing to save`);
    }
    if (existsSync(target) && !options.force) {
      throw new RegistryError(
        `A template is already saved as "${tag}". Use --force to replace it.`
      );
    }

    await assertValidTemplate(source, this.logger);

    mkdirSync(this.root, { recursive: true });
    rmSync(target, { recursive: true, force: true });
    cpSync(source, target, { recursive: true });

    const metadata = createMetadata(tag, source);
    writeMetadata(target, metadata);

    this.logger?.info("Saved template", { tag, source, target });
    return metadata;
  }

  /**
   * Metadata of every saved template, sorted by tag. Entries without a
   * record fall back to metadata derived from their directory.
   */
  list(): TemplateMetadata[] {
    if (!existsSync(this.root)) return [];

    return readdirSync(this.root)
      .filter((entry) => statSync(join(this.root, entry)).isDirectory())
      .sort()
      .map((entry) => {
        const dir = join(this.root, entry);
        return readMetadata(dir) ?? deriveMetadata(dir);
      });
  }

  /**
   * Load a saved template.
   *
   * @throws RegistryError if nothing is saved under `tag`
   */
  get(tag: string): ProjectTemplate {
    const path = this.pathOf(tag);
    if (!existsSync(path)) {
      throw new RegistryError(`No template saved as "${tag}"`);
    }
    return ProjectTemplate.load(path, { logger: this.logger });
  }

  /**
   * Delete a saved template.
   *
   * @throws RegistryError if nothing is saved under `tag`
   */
  remove(tag: string): void {
    const path = this.pathOf(tag);
    if (!existsSync(path)) {
      throw new RegistryError(`No template saved as "${tag}"`);
    }
    rmSync(path, { recursive: true, force: true });
    this.logger?.info("Deleted template", { tag });
  }
}
