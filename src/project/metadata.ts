/**
 * Template metadata record.
 *
 * Saved templates carry a small JSON record next to their sources:
 *
 *   {
 *     "tag": "go-service",
 *     "repository": "/home/me/templates/go-service",
 *     "created": "2024-01-15T10:42:00.000Z"
 *   }
 *
 * The renderer never interprets it; it is only exposed to templates as
 * `@template.*` and listed by the registry.
 */

import { readFileSync, statSync, writeFileSync } from "node:fs";
import { basename, join } from "node:path";
import { z } from "zod";

import { errorMessage, hasErrorCode } from "../utils/errno.js";

/** File name of the metadata record, relative to the template root. */
export const METADATA_FILE_NAME = "__metadata.json";

export const TemplateMetadataSchema = z
  .object({
    tag: z.string().min(1),
    repository: z.string().min(1),
    created: z.string().datetime().optional(),
  })
  .strict();

export type TemplateMetadata = z.infer<typeof TemplateMetadataSchema>;

export class MetadataError extends Error {
  constructor(
    public readonly filePath: string,
    message: string
  ) {
    super(message);
    this.name = "MetadataError";
  }
}

/**
 * Metadata derived from the template root itself: the directory name as
 * tag, its absolute path as repository, and its birth time where the
 * filesystem reports one.
 */
export function deriveMetadata(templateRoot: string): TemplateMetadata {
  const stat = statSync(templateRoot);
  const metadata: TemplateMetadata = {
    tag: basename(templateRoot),
    repository: templateRoot,
  };
  if (stat.birthtimeMs > 0) {
    metadata.created = stat.birthtime.toISOString();
  }
  return metadata;
}

/**
 * Read the metadata record of a template root.
 *
 * @returns The record, or undefined when the root has none
 * @throws MetadataError if the record exists but is invalid
 */
export function readMetadata(templateRoot: string): TemplateMetadata | undefined {
  const filePath = join(templateRoot, METADATA_FILE_NAME);

  let text: string;
  try {
    text = readFileSync(filePath, "utf-8");
  } catch (err) {
    if (hasErrorCode(err, "ENOENT")) return undefined;
    throw new MetadataError(filePath, `Cannot read metadata: ${errorMessage(err)}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new MetadataError(filePath, `Failed to parse metadata JSON: ${errorMessage(err)}`);
  }

  const result = TemplateMetadataSchema.safeParse(raw);
  if (!result.success) {
    const errors = result.error.issues
      .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
      .join("; ");
    throw new MetadataError(filePath, `Invalid metadata in ${filePath}: ${errors}`);
  }
  return result.data;
}

/**
 * Write a metadata record into a template root.
 */
export function writeMetadata(templateRoot: string, metadata: TemplateMetadata): string {
  const filePath = join(templateRoot, METADATA_FILE_NAME);
  writeFileSync(filePath, JSON.stringify(metadata, null, 2) + "\n");
  return filePath;
}

/**
 * Create a fresh record for a template being saved.
 */
export function createMetadata(
  tag: string,
  repository: string,
  created: Date = new Date()
): TemplateMetadata {
  return { tag, repository, created: created.toISOString() };
}
