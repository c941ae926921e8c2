/**
 * Context model: the variable schema a template declares.
 *
 * A context file is a JSON object. Each top-level entry is one of:
 *
 *   SCALAR   "name": "my-app"                 string, number or boolean
 *   LIST     "license": ["MIT", "Apache-2.0"]  first item is the default
 *   GROUP    "docker": { "image": "node", "port": 8080 }
 *
 * A group's children are exposed only when the user opts into advanced
 * settings for that group. Children are scalars or lists; a group never
 * nests another group.
 *
 * All variable names share one namespace (the binding table is flat), so
 * a child may not reuse a top-level name or the name of a child in
 * another group.
 */

import { z, type ZodIssue } from "zod";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type Scalar = string | number | boolean;

export interface ScalarValue {
  readonly kind: "scalar";
  readonly value: Scalar;
}

export interface ListValue {
  readonly kind: "list";
  /** Choices in declared order; items[0] is the default. */
  readonly items: readonly [Scalar, ...Scalar[]];
}

/** A value a variable can hold: everything except a group. */
export type LeafValue = ScalarValue | ListValue;

export interface GroupValue {
  readonly kind: "group";
  readonly children: ReadonlyMap<string, LeafValue>;
}

export type ContextValue = LeafValue | GroupValue;

/** Top-level variable name → value, in file order. */
export type ContextTree = ReadonlyMap<string, ContextValue>;

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

export interface ContextIssue {
  /** Path to the offending entry */
  path: (string | number)[];
  /** Human-readable error message */
  message: string;
  /** Zod error code, or a local code for namespace checks */
  code: string;
}

export class ContextSchemaError extends Error {
  constructor(
    message: string,
    public readonly issues: ContextIssue[] = [],
    public readonly source?: string
  ) {
    super(message);
    this.name = "ContextSchemaError";
  }

  format(): string {
    const header = this.source
      ? `Invalid context file ${this.source}:`
      : "Invalid context:";
    if (this.issues.length === 0) {
      return `${header} ${this.message}`;
    }
    const lines = [header];
    for (const issue of this.issues) {
      const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      lines.push(`  - ${path}: ${issue.message}`);
    }
    return lines.join("\n");
  }
}

// ---------------------------------------------------------------------------
// Schemas
// ---------------------------------------------------------------------------

const VARIABLE_NAME_RE = /^[A-Za-z_][A-Za-z0-9_]*$/;

/** Names that collide with Object.prototype in templates and parsed JSON. */
const RESERVED_NAMES: ReadonlySet<string> = new Set([
  "__proto__",
  "constructor",
  "prototype",
  "__defineGetter__",
  "__defineSetter__",
  "__lookupGetter__",
  "__lookupSetter__",
]);

export const VariableNameSchema = z
  .string()
  .regex(VARIABLE_NAME_RE, "variable names must be identifiers (letters, digits, underscore)")
  .refine((name) => !RESERVED_NAMES.has(name), {
    message: "reserved names such as __proto__ and constructor cannot be variables",
  });

export const ScalarSchema = z.union([z.string(), z.number().finite(), z.boolean()]);

export const ListSchema = z
  .array(ScalarSchema)
  .nonempty("a list needs at least one item; the first one is the default");

function toIssues(zodIssues: ZodIssue[], prefix: (string | number)[]): ContextIssue[] {
  return zodIssues.map((issue) => ({
    path: [
      ...prefix,
      ...issue.path.filter(
        (p): p is string | number => typeof p === "string" || typeof p === "number"
      ),
    ],
    message: issue.message,
    code: issue.code,
  }));
}

// ---------------------------------------------------------------------------
// Classification
// ---------------------------------------------------------------------------

function classifyLeaf(
  raw: unknown,
  path: (string | number)[],
  issues: ContextIssue[]
): LeafValue | undefined {
  if (Array.isArray(raw)) {
    const list = ListSchema.safeParse(raw);
    if (!list.success) {
      issues.push(...toIssues(list.error.issues, path));
      return undefined;
    }
    return { kind: "list", items: list.data };
  }

  const scalar = ScalarSchema.safeParse(raw);
  if (!scalar.success) {
    issues.push({
      path,
      message: `expected a string, number, boolean or list, got ${describe(raw)}`,
      code: "invalid_type",
    });
    return undefined;
  }
  return { kind: "scalar", value: scalar.data };
}

function classifyGroup(
  raw: Record<string, unknown>,
  path: (string | number)[],
  issues: ContextIssue[]
): GroupValue {
  const children = new Map<string, LeafValue>();

  for (const [childName, childRaw] of Object.entries(raw)) {
    const childPath = [...path, childName];
    checkName(childName, childPath, issues);

    if (isPlainObject(childRaw)) {
      issues.push({
        path: childPath,
        message: "groups cannot be nested; a group's children must be scalars or lists",
        code: "nested_group",
      });
      continue;
    }

    const leaf = classifyLeaf(childRaw, childPath, issues);
    if (leaf) children.set(childName, leaf);
  }

  return { kind: "group", children };
}

function checkName(
  name: string,
  path: (string | number)[],
  issues: ContextIssue[]
): void {
  const result = VariableNameSchema.safeParse(name);
  if (!result.success) {
    issues.push(...toIssues(result.error.issues, path));
  }
}

// Keys are read straight off the parsed JSON: a record schema would copy
// them into a fresh object and turn "__proto__" into a prototype change.
function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function describe(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  return typeof value;
}

/**
 * Report names that would map to the same binding.
 */
function checkNamespace(tree: ContextTree, issues: ContextIssue[]): void {
  const owners = new Map<string, string>();
  for (const name of tree.keys()) {
    owners.set(name, name);
  }

  for (const [groupName, value] of tree) {
    if (value.kind !== "group") continue;
    for (const childName of value.children.keys()) {
      const owner = owners.get(childName);
      if (owner !== undefined) {
        issues.push({
          path: [groupName, childName],
          message:
            owner === childName
              ? `"${childName}" is already a top-level variable`
              : `"${childName}" is already declared in group "${owner}"`,
          code: "duplicate_name",
        });
        continue;
      }
      owners.set(childName, groupName);
    }
  }
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Validate raw parsed JSON and turn it into a ContextTree.
 *
 * @param raw    - Parsed JSON (typically the contents of project.json)
 * @param source - File name used in error messages
 * @throws ContextSchemaError listing every problem found
 */
export function parseContextTree(raw: unknown, source?: string): ContextTree {
  if (!isPlainObject(raw)) {
    throw new ContextSchemaError(
      "the context must be a JSON object mapping variable names to values",
      [{ path: [], message: `expected an object, got ${describe(raw)}`, code: "invalid_type" }],
      source
    );
  }

  const issues: ContextIssue[] = [];
  const tree = new Map<string, ContextValue>();

  for (const [name, value] of Object.entries(raw)) {
    checkName(name, [name], issues);

    if (isPlainObject(value)) {
      tree.set(name, classifyGroup(value, [name], issues));
      continue;
    }

    const leaf = classifyLeaf(value, [name], issues);
    if (leaf) tree.set(name, leaf);
  }

  checkNamespace(tree, issues);

  if (issues.length > 0) {
    throw new ContextSchemaError(
      `${issues.length} problem(s) in context schema`,
      issues,
      source
    );
  }

  return tree;
}

/**
 * The value a leaf resolves to without asking: the scalar itself, or the
 * first item of a list.
 */
export function defaultOf(value: LeafValue): Scalar {
  switch (value.kind) {
    case "scalar":
      return value.value;
    case "list":
      return value.items[0];
  }
}

/**
 * Every variable name reachable from the tree, groups first then their
 * children, in file order.
 */
export function variableNames(tree: ContextTree): string[] {
  const names: string[] = [];
  for (const [name, value] of tree) {
    if (value.kind !== "group") {
      names.push(name);
      continue;
    }
    if (value.children.size === 0) continue;
    names.push(name, ...value.children.keys());
  }
  return names;
}
