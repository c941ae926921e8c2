/**
 * Template engine, executor and pruner.
 */

export {
  createRuntime,
  compileTemplate,
  renderTemplate,
  scopeOf,
  type AmbientData,
  type CompiledTemplate,
  type TemplateScope,
} from "./engine.js";

export {
  renderTree,
  walkTemplateTree,
  checkRenderedPath,
  type FileRenderedEvent,
  type RenderTreeOptions,
  type RenderSummary,
} from "./executor.js";

export { pruneIfBlank, isBlank, type PruneOutcome } from "./pruner.js";

export {
  HELPERS,
  HelperError,
  registerHelpers,
  helperNames,
  formatDate,
  formatFilesize,
  splitWords,
  type TemplateRuntime,
} from "./helpers.js";

export { TemplateParseError, TemplateRenderError, RenderError } from "./errors.js";
