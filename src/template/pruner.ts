/**
 * Output pruner.
 *
 * Templates often wrap a whole file in a conditional. When the condition
 * is false the file renders to nothing, and the generated project should
 * not contain it.
 */

import { readFileSync, unlinkSync } from "node:fs";

import type { Logger } from "../logging/index.js";
import { errorMessage } from "../utils/errno.js";

export type PruneOutcome = "kept" | "removed" | "unreadable";

// ASCII whitespace only: a file holding a BOM or a non-breaking space is
// content, not blank.
const NON_BLANK_RE = /[^\t\n\f\r ]/;

/**
 * True when the text is empty or only spaces, tabs, form feeds and line
 * breaks.
 */
export function isBlank(text: string): boolean {
  return !NON_BLANK_RE.test(text);
}

/**
 * Delete a just-written file if it is blank. Never throws: read and
 * delete failures are logged and the render carries on.
 */
export function pruneIfBlank(filePath: string, logger?: Logger): PruneOutcome {
  let contents: string;
  try {
    contents = readFileSync(filePath, "utf-8");
  } catch (err) {
    logger?.debug("Could not read back rendered file", {
      filePath,
      error: errorMessage(err),
    });
    return "unreadable";
  }

  if (!isBlank(contents)) return "kept";

  try {
    unlinkSync(filePath);
  } catch (err) {
    logger?.warn("Could not remove blank rendered file", {
      filePath,
      error: errorMessage(err),
    });
    return "kept";
  }

  logger?.debug("Removed blank rendered file", { filePath });
  return "removed";
}
