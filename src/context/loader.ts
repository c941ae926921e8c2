/**
 * Context file loader.
 *
 * Reads the context file of a template root and turns it into a
 * ContextTree. A template without a context file is valid: it simply has
 * no variables.
 */

import { readFileSync } from "node:fs";
import { join } from "node:path";

import {
  ContextSchemaError,
  parseContextTree,
  type ContextTree,
} from "./schema.js";
import type { Logger } from "../logging/index.js";
import { errorMessage, hasErrorCode } from "../utils/errno.js";

/** File name of the context file, relative to the template root. */
export const CONTEXT_FILE_NAME = "project.json";

const EMPTY_CONTEXT: ContextTree = new Map();

/**
 * Parse context JSON text.
 *
 * @throws ContextSchemaError if the text is not JSON or fails the schema
 */
export function parseContextJson(text: string, source?: string): ContextTree {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new ContextSchemaError(
      `Failed to parse JSON: ${errorMessage(err)}`,
      [],
      source
    );
  }
  return parseContextTree(raw, source);
}

/**
 * Load the context of a template root.
 *
 * @param templateRoot - Directory containing project.json
 * @returns The parsed tree, or an empty tree when the file is absent
 * @throws ContextSchemaError if the file is unreadable or malformed
 */
export function loadContextFile(templateRoot: string, logger?: Logger): ContextTree {
  const filePath = join(templateRoot, CONTEXT_FILE_NAME);

  let text: string;
  try {
    text = readFileSync(filePath, "utf-8");
  } catch (err) {
    if (hasErrorCode(err, "ENOENT")) {
      logger?.debug("No context file, template has no variables", { filePath });
      return EMPTY_CONTEXT;
    }
    throw new ContextSchemaError(
      `Cannot read context file: ${errorMessage(err)}`,
      [],
      filePath
    );
  }

  const tree = parseContextJson(text, filePath);
  logger?.debug("Loaded context file", { filePath, variables: tree.size });
  return tree;
}
