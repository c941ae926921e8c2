/**
 * Value resolver: context tree → binding table.
 *
 * ```typescript
 * const table = bindContext(context, { mode: "interactive" });
 * await table.resolve("name");   // prompts once
 * await table.resolve("name");   // memoized
 * ```
 */

import { buildBindings, type BindingMode } from "./binding.js";
import { BindingTable } from "./table.js";
import { ClackPrompter, type Prompter } from "./prompter.js";
import type { ContextTree } from "../context/index.js";
import type { Logger } from "../logging/index.js";

export interface BindOptions {
  mode: BindingMode;
  /** Source of answers in interactive mode (default: terminal prompts) */
  prompter?: Prompter;
  logger?: Logger;
}

/**
 * Bind a context tree. In interactive mode without an explicit prompter,
 * answers come from the terminal.
 */
export function bindContext(context: ContextTree, options: BindOptions): BindingTable {
  const bindings = buildBindings(context, options.mode);
  const prompter =
    options.mode === "interactive" ? options.prompter ?? new ClackPrompter() : undefined;

  options.logger?.debug("Bound context", {
    mode: options.mode,
    bindings: bindings.length,
  });

  return new BindingTable(bindings, prompter, options.logger);
}

export {
  buildBindings,
  type Binding,
  type BindingMode,
  type GateBinding,
  type VariableBinding,
  type ResolutionStrategy,
} from "./binding.js";
export {
  BindingTable,
  UnresolvedBindingError,
  UnknownBindingError,
  type TemplateLambda,
} from "./table.js";
export {
  ClackPrompter,
  PromptAbortedError,
  type Prompter,
  type ConfirmQuestion,
  type TextQuestion,
  type SelectQuestion,
} from "./prompter.js";
