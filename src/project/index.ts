/**
 * Templates on disk: loading, executing, validating and saving.
 */

export {
  ProjectTemplate,
  TemplateLayoutError,
  TEMPLATE_DIR_NAME,
  type ExecuteOptions,
  type LoadOptions,
} from "./template.js";

export {
  METADATA_FILE_NAME,
  TemplateMetadataSchema,
  MetadataError,
  createMetadata,
  deriveMetadata,
  readMetadata,
  writeMetadata,
  type TemplateMetadata,
} from "./metadata.js";

export {
  validateTemplate,
  assertValidTemplate,
  TemplateInvalidError,
  type TemplateValidationResult,
} from "./validate.js";

export {
  TemplateRegistry,
  RegistryError,
  TagSchema,
  type SaveOptions,
} from "./registry.js";
