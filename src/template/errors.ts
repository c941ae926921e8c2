/**
 * Errors raised while compiling templates and rendering a tree.
 */

import { errorMessage } from "../utils/errno.js";

export class TemplateParseError extends Error {
  constructor(
    public readonly templateName: string,
    public readonly invalidNames: string[],
    message?: string
  ) {
    super(
      message ??
        `Template "${templateName}" references unknown variable(s) or helper(s): ${invalidNames.join(", ")}`
    );
    this.name = "TemplateParseError";
  }
}

export class TemplateRenderError extends Error {
  constructor(
    public readonly templateName: string,
    cause: unknown
  ) {
    super(`Cannot render template "${templateName}": ${errorMessage(cause)}`, { cause });
    this.name = "TemplateRenderError";
  }
}

/**
 * Fatal failure while walking a template tree. `entry` is the source path
 * relative to the template directory ("" for the directory itself).
 */
export class RenderError extends Error {
  constructor(
    public readonly entry: string,
    message: string,
    cause?: unknown
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = "RenderError";
  }
}
