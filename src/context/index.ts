/**
 * Context model and loader.
 */

export {
  parseContextTree,
  defaultOf,
  variableNames,
  ContextSchemaError,
  ScalarSchema,
  ListSchema,
  VariableNameSchema,
  type Scalar,
  type ScalarValue,
  type ListValue,
  type LeafValue,
  type GroupValue,
  type ContextValue,
  type ContextTree,
  type ContextIssue,
} from "./schema.js";

export {
  loadContextFile,
  parseContextJson,
  CONTEXT_FILE_NAME,
} from "./loader.js";
