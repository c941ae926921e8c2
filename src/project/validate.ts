/**
 * Template validation.
 *
 * A template is valid when it loads (layout, context, metadata) and its
 * whole tree renders with default values. The trial render goes into a
 * temporary directory that is removed afterwards, whatever the outcome.
 */

import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { ContextSchemaError } from "../context/index.js";
import type { Logger } from "../logging/index.js";
import type { RenderSummary } from "../template/index.js";
import { errorMessage } from "../utils/errno.js";
import { ProjectTemplate } from "./template.js";

export interface TemplateValidationResult {
  valid: boolean;
  /** Metadata tag, when the template loaded */
  tag?: string;
  /** Trial render summary, when the render completed */
  summary?: RenderSummary;
  errors: string[];
}

export class TemplateInvalidError extends Error {
  constructor(
    public readonly templateRoot: string,
    public readonly errors: string[]
  ) {
    super(`Template ${templateRoot} is invalid: ${errors.join("; ")}`);
    this.name = "TemplateInvalidError";
  }
}

/**
 * Validate a template root without touching anything outside a
 * temporary directory.
 */
export async function validateTemplate(
  path: string,
  logger?: Logger
): Promise<TemplateValidationResult> {
  let template: ProjectTemplate;
  try {
    template = ProjectTemplate.load(path, { logger });
  } catch (err) {
    const message = err instanceof ContextSchemaError ? err.format() : errorMessage(err);
    return { valid: false, errors: [message] };
  }

  const tag = template.info().tag;
  const scratch = mkdtempSync(join(tmpdir(), "scaffoldr-validate-"));
  try {
    const summary = await template.execute(scratch, { useDefaults: true, logger });
    return { valid: true, tag, summary, errors: [] };
  } catch (err) {
    return { valid: false, tag, errors: [errorMessage(err)] };
  } finally {
    rmSync(scratch, { recursive: true, force: true });
  }
}

/**
 * Validate and throw on failure.
 *
 * @throws TemplateInvalidError listing every problem found
 */
export async function assertValidTemplate(path: string, logger?: Logger): Promise<void> {
  const result = await validateTemplate(path, logger);
  if (!result.valid) {
    throw new TemplateInvalidError(path, result.errors);
  }
}
