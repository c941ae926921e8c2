/**
 * Binding records.
 *
 * Binding a context turns every reachable variable name into one explicit
 * record: its name, its default, the group gate it depends on, and how it
 * is resolved. The records are plain data; resolution lives in
 * BindingTable.
 *
 *   context                       bindings (interactive)
 *   ───────────────────────────   ─────────────────────────────────────
 *   "name": "app"                 name    variable  prompt
 *   "docker": {                   docker  gate      prompt   (default false)
 *     "image": ["node", "deno"]   image   variable  prompt   group=docker
 *   }
 *
 * In defaults mode every strategy is "default", so gates are false and
 * every variable is its declared default.
 */

import {
  defaultOf,
  type ContextTree,
  type LeafValue,
  type Scalar,
} from "../context/index.js";

export type BindingMode = "interactive" | "defaults";

export type ResolutionStrategy = "prompt" | "default";

export interface GateBinding {
  readonly kind: "gate";
  readonly name: string;
  readonly strategy: ResolutionStrategy;
  readonly defaultValue: false;
  /** Child variable names this gate controls */
  readonly members: readonly string[];
}

export interface VariableBinding {
  readonly kind: "variable";
  readonly name: string;
  readonly strategy: ResolutionStrategy;
  readonly defaultValue: Scalar;
  /** Declared value, kept for prompting (choices of a list, type of a scalar) */
  readonly value: LeafValue;
  /** Name of the gate binding, for variables declared inside a group */
  readonly group?: string;
}

export type Binding = GateBinding | VariableBinding;

function strategyFor(mode: BindingMode): ResolutionStrategy {
  return mode === "interactive" ? "prompt" : "default";
}

/**
 * Build the binding records for a context tree, in file order.
 * Groups without children produce nothing.
 */
export function buildBindings(context: ContextTree, mode: BindingMode): Binding[] {
  const strategy = strategyFor(mode);
  const bindings: Binding[] = [];

  for (const [name, value] of context) {
    if (value.kind !== "group") {
      bindings.push({
        kind: "variable",
        name,
        strategy,
        defaultValue: defaultOf(value),
        value,
      });
      continue;
    }

    if (value.children.size === 0) continue;

    bindings.push({
      kind: "gate",
      name,
      strategy,
      defaultValue: false,
      members: [...value.children.keys()],
    });

    for (const [childName, childValue] of value.children) {
      bindings.push({
        kind: "variable",
        name: childName,
        strategy,
        defaultValue: defaultOf(childValue),
        value: childValue,
        group: name,
      });
    }
  }

  return bindings;
}
