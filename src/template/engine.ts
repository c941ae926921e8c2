/**
 * Template engine.
 *
 * Templates are Handlebars, compiled without HTML escaping. Before a
 * template runs, its syntax tree is checked: every name it reads from the
 * root context must be a binding, and every helper it calls must exist.
 *
 * TEMPLATE FORMAT:
 *
 *   {{name}}                         binding value
 *   {{upper name}}                   helper call, binding as argument
 *   {{#if docker}}…{{/if}}           conditional on a binding (or gate)
 *   {{#unless private}}…{{/unless}}
 *   {{@template.tag}}                template metadata
 *
 * Rendering is lazy. A binding that still needs a prompt throws
 * UnresolvedBindingError when the template reaches it; renderTemplate()
 * resolves it and evaluates the template again from the start. Settled
 * bindings never change, so each pass gets at least one step further.
 */

import Handlebars from "handlebars";

import {
  UnresolvedBindingError,
  type BindingTable,
} from "../bindings/index.js";
import { registerHelpers, type TemplateRuntime } from "./helpers.js";
import { TemplateParseError, TemplateRenderError } from "./errors.js";
import { errorMessage } from "../utils/errno.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Data exposed to templates as `@template.*`. */
export interface AmbientData {
  tag?: string;
  repository?: string;
  created?: string;
}

export interface CompiledTemplate {
  /** Name used in error messages (usually a relative path). */
  readonly name: string;
  readonly source: string;
  /** Bindings the template may read, sorted. */
  readonly variables: readonly string[];
  /** Evaluate once against a template environment. */
  evaluate(data: object, ambient?: AmbientData): string;
}

/** Names a template can legally reference. */
export interface TemplateScope {
  isVariable(name: string): boolean;
}

// ---------------------------------------------------------------------------
// Runtime
// ---------------------------------------------------------------------------

/**
 * Create an isolated Handlebars runtime with the helper library.
 */
export function createRuntime(): TemplateRuntime {
  const runtime = Handlebars.create();
  registerHelpers(runtime);
  return runtime;
}

// ---------------------------------------------------------------------------
// Static reference check
// ---------------------------------------------------------------------------

type AstNode = hbs.AST.Node;

function isMustache(node: AstNode): node is hbs.AST.MustacheStatement {
  return node.type === "MustacheStatement";
}

function isBlock(node: AstNode): node is hbs.AST.BlockStatement {
  return node.type === "BlockStatement";
}

function isPartial(node: AstNode): boolean {
  return node.type === "PartialStatement" || node.type === "PartialBlockStatement";
}

function isSubExpression(node: AstNode): node is hbs.AST.SubExpression {
  return node.type === "SubExpression";
}

function isPath(node: AstNode): node is hbs.AST.PathExpression {
  return node.type === "PathExpression";
}

/** Block helpers that evaluate their body against a different context. */
const CONTEXT_CHANGING_BLOCKS = new Set(["each", "with"]);

interface Frame {
  /** The block body runs against a new context (the root frame counts). */
  readonly newContext: boolean;
  readonly blockParams: ReadonlySet<string>;
}

interface References {
  variables: Set<string>;
  unknown: Set<string>;
  /** Paths that read a property off a variable, such as `name.length`. */
  dotted: Set<string>;
  partials: number;
}

class ReferenceCollector {
  readonly refs: References = {
    variables: new Set(),
    unknown: new Set(),
    dotted: new Set(),
    partials: 0,
  };

  constructor(
    private readonly scope: TemplateScope,
    private readonly helpers: ReadonlySet<string>
  ) {}

  program(program: hbs.AST.Program, frames: readonly Frame[]): void {
    for (const statement of program.body) {
      this.statement(statement, frames);
    }
  }

  private statement(node: AstNode, frames: readonly Frame[]): void {
    if (isPartial(node)) {
      this.refs.partials++;
      return;
    }

    if (isMustache(node)) {
      const call = isCall(node.params, node.hash);
      if (isPath(node.path)) {
        if (call) this.helper(node.path);
        else this.ambiguous(node.path, frames);
      }
      this.arguments(node.params, node.hash, frames);
      return;
    }

    if (isBlock(node)) {
      const call = isCall(node.params, node.hash);
      if (call) this.helper(node.path);
      else this.ambiguous(node.path, frames);
      this.arguments(node.params, node.hash, frames);

      // A block without arguments takes whatever context its value gives
      // it, so its body is treated like the body of `each`.
      const helper = node.path.parts.join(".");
      const newContext = !call || CONTEXT_CHANGING_BLOCKS.has(helper);
      if (node.program) this.body(node.program, frames, newContext);
      if (node.inverse) this.body(node.inverse, frames, false);
    }
  }

  private body(program: hbs.AST.Program, frames: readonly Frame[], newContext: boolean): void {
    const blockParams = new Set(program.blockParams ?? []);
    if (!newContext && blockParams.size === 0) {
      this.program(program, frames);
      return;
    }
    this.program(program, [...frames, { newContext, blockParams }]);
  }

  private arguments(
    params: hbs.AST.Expression[] | undefined,
    hash: hbs.AST.Hash | undefined,
    frames: readonly Frame[]
  ): void {
    for (const param of params ?? []) this.expression(param, frames);
    for (const pair of hash?.pairs ?? []) this.expression(pair.value, frames);
  }

  private expression(node: AstNode, frames: readonly Frame[]): void {
    if (isPath(node)) {
      this.variable(node, frames);
      return;
    }
    if (isSubExpression(node)) {
      this.helper(node.path);
      this.arguments(node.params, node.hash, frames);
    }
  }

  /** `{{name}}` or `{{#name}}`: a helper or a variable. */
  private ambiguous(path: hbs.AST.PathExpression, frames: readonly Frame[]): void {
    const head = path.parts[0];
    const plain = !path.data && path.depth === 0 && path.parts.length === 1;
    if (plain && head !== undefined && this.helpers.has(head)) return;
    this.variable(path, frames);
  }

  private helper(path: hbs.AST.PathExpression): void {
    const name = path.parts.join(".");
    if (!this.helpers.has(name)) this.refs.unknown.add(name);
  }

  private variable(path: hbs.AST.PathExpression, frames: readonly Frame[]): void {
    if (path.data) return;
    const head = path.parts[0];
    if (head === undefined) return; // `this`
    if (!this.readsRoot(path, head, frames)) return;

    if (!this.scope.isVariable(head)) this.refs.unknown.add(head);
    else if (path.parts.length > 1) this.refs.dotted.add(path.parts.join("."));
    else this.refs.variables.add(head);
  }

  /**
   * Whether a path reads the root context. Block params shadow everything;
   * each `../` climbs one frame that introduced a new context.
   */
  private readsRoot(path: hbs.AST.PathExpression, head: string, frames: readonly Frame[]): boolean {
    if (path.depth === 0 && frames.some((frame) => frame.blockParams.has(head))) {
      return false;
    }

    let remaining = path.depth;
    for (let i = frames.length - 1; i >= 0; i--) {
      const frame = frames[i];
      if (i > 0 && !frame?.newContext) continue;
      if (remaining === 0) return i === 0;
      remaining--;
    }
    return false;
  }
}

function isCall(params: hbs.AST.Expression[] | undefined, hash: hbs.AST.Hash | undefined): boolean {
  return (params?.length ?? 0) > 0 || (hash?.pairs.length ?? 0) > 0;
}

// ---------------------------------------------------------------------------
// Compilation
// ---------------------------------------------------------------------------

/**
 * Parse, check and compile a template.
 *
 * @throws TemplateParseError on syntax errors, partials, unknown variables
 *         or unknown helpers
 */
export function compileTemplate(
  runtime: TemplateRuntime,
  source: string,
  name: string,
  scope: TemplateScope
): CompiledTemplate {
  let ast: hbs.AST.Program;
  try {
    ast = runtime.parse(source);
  } catch (err) {
    throw new TemplateParseError(name, [], `Template "${name}" has a syntax error: ${errorMessage(err)}`);
  }

  const collector = new ReferenceCollector(scope, new Set(Object.keys(runtime.helpers)));
  collector.program(ast, [{ newContext: true, blockParams: new Set() }]);
  const { variables, unknown, dotted, partials } = collector.refs;

  if (partials > 0) {
    throw new TemplateParseError(name, [], `Template "${name}" uses partials, which are not supported`);
  }
  if (unknown.size > 0) {
    throw new TemplateParseError(name, [...unknown].sort());
  }
  if (dotted.size > 0) {
    const paths = [...dotted].sort();
    throw new TemplateParseError(
      name,
      paths,
      `Template "${name}" reads properties of variables, which hold plain values: ${paths.join(", ")}`
    );
  }

  const delegate = runtime.compile(ast, { noEscape: true });

  return {
    name,
    source,
    variables: [...variables].sort(),
    evaluate(data: object, ambient?: AmbientData): string {
      return delegate(data, { data: { template: ambient ?? {} } });
    },
  };
}

// ---------------------------------------------------------------------------
// Rendering
// ---------------------------------------------------------------------------

/**
 * Render a compiled template against a binding table, prompting for
 * bindings as the template reaches them.
 *
 * @throws TemplateRenderError if a helper fails during evaluation
 * @throws PromptAbortedError  if the user cancels a prompt
 */
export async function renderTemplate(
  template: CompiledTemplate,
  table: BindingTable,
  ambient?: AmbientData
): Promise<string> {
  const data = table.templateData();

  for (;;) {
    try {
      return template.evaluate(data, ambient);
    } catch (err) {
      if (err instanceof UnresolvedBindingError) {
        await table.resolve(err.bindingName);
        continue;
      }
      throw new TemplateRenderError(template.name, err);
    }
  }
}

/**
 * Scope accepting exactly the names of a binding table.
 */
export function scopeOf(table: BindingTable): TemplateScope {
  return { isVariable: (name) => table.has(name) };
}
