/**
 * Binding table: the variable environment of one render.
 *
 * Built once from binding records and frozen. Each name resolves at most
 * once; the answer is memoized for the rest of the render, so a template
 * that mentions a variable ten times prompts for it once.
 *
 * Resolution is asynchronous because prompting is. Templates, however,
 * evaluate synchronously, so the table also exposes `templateData()`:
 * one zero-argument function per binding that returns the settled value
 * or throws UnresolvedBindingError. The renderer catches that error,
 * awaits `resolve()`, and evaluates again.
 */

import type { Binding, VariableBinding } from "./binding.js";
import type { Prompter } from "./prompter.js";
import type { Scalar } from "../context/index.js";
import type { Logger } from "../logging/index.js";

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

/**
 * Thrown by a template lambda whose binding still needs a prompt.
 * Control flow between the table and the renderer; never escapes a render.
 */
export class UnresolvedBindingError extends Error {
  constructor(public readonly bindingName: string) {
    super(`Binding "${bindingName}" has not been resolved yet`);
    this.name = "UnresolvedBindingError";
  }
}

export class UnknownBindingError extends Error {
  constructor(public readonly bindingName: string) {
    super(`No binding named "${bindingName}"`);
    this.name = "UnknownBindingError";
  }
}

// ---------------------------------------------------------------------------
// Table
// ---------------------------------------------------------------------------

/** What templates see: one zero-argument function per binding. */
export type TemplateLambda = () => Scalar;

export class BindingTable {
  private readonly bindings: ReadonlyMap<string, Binding>;
  private readonly settled = new Map<string, Scalar>();
  private readonly pending = new Map<string, Promise<Scalar>>();
  private readonly data: Readonly<Record<string, TemplateLambda>>;
  private promptCount = 0;

  constructor(
    bindings: readonly Binding[],
    private readonly prompter?: Prompter,
    private readonly logger?: Logger
  ) {
    const map = new Map<string, Binding>();
    for (const binding of bindings) {
      if (map.has(binding.name)) {
        throw new Error(`Duplicate binding "${binding.name}"`);
      }
      map.set(binding.name, Object.freeze({ ...binding }));
    }
    this.bindings = map;

    const data: Record<string, TemplateLambda> = {};
    for (const name of map.keys()) {
      data[name] = () => {
        const value = this.peek(name);
        if (value === undefined) throw new UnresolvedBindingError(name);
        return value;
      };
    }
    this.data = Object.freeze(data);
  }

  get size(): number {
    return this.bindings.size;
  }

  /** Number of prompts issued so far. */
  get prompts(): number {
    return this.promptCount;
  }

  names(): string[] {
    return [...this.bindings.keys()];
  }

  has(name: string): boolean {
    return this.bindings.has(name);
  }

  get(name: string): Binding | undefined {
    return this.bindings.get(name);
  }

  /**
   * Template environment. The same frozen object for the whole render.
   */
  templateData(): Readonly<Record<string, TemplateLambda>> {
    return this.data;
  }

  /**
   * Value of a binding if it can be known without asking: already
   * answered, declared as a default, or inside a closed group.
   */
  peek(name: string): Scalar | undefined {
    const cached = this.settled.get(name);
    if (cached !== undefined) return cached;

    const binding = this.bindings.get(name);
    if (!binding) return undefined;

    const value = this.settle(binding);
    if (value !== undefined) this.settled.set(name, value);
    return value;
  }

  /**
   * Resolve a binding, prompting if needed. Repeated and concurrent calls
   * share the first answer.
   *
   * @throws UnknownBindingError  if no binding has this name
   * @throws PromptAbortedError   if the user cancels the prompt (from the Prompter)
   */
  resolve(name: string): Promise<Scalar> {
    const known = this.peek(name);
    if (known !== undefined) return Promise.resolve(known);

    const inFlight = this.pending.get(name);
    if (inFlight) return inFlight;

    const binding = this.bindings.get(name);
    if (!binding) return Promise.reject(new UnknownBindingError(name));

    const promise = this.resolveBinding(binding).then(
      (value) => {
        this.settled.set(name, value);
        this.pending.delete(name);
        return value;
      },
      (err: unknown) => {
        this.pending.delete(name);
        throw err;
      }
    );
    this.pending.set(name, promise);
    return promise;
  }

  /**
   * Resolve every binding in declaration order.
   */
  async resolveAll(): Promise<Record<string, Scalar>> {
    const values: Record<string, Scalar> = {};
    for (const name of this.bindings.keys()) {
      values[name] = await this.resolve(name);
    }
    return values;
  }

  private settle(binding: Binding): Scalar | undefined {
    if (binding.strategy === "default") return binding.defaultValue;
    if (binding.kind === "gate" || binding.group === undefined) return undefined;

    const open = this.peek(binding.group);
    if (open === undefined) return undefined;
    return open === true ? undefined : binding.defaultValue;
  }

  private async resolveBinding(binding: Binding): Promise<Scalar> {
    if (binding.kind === "variable" && binding.group !== undefined) {
      const open = await this.resolve(binding.group);
      if (open !== true) return binding.defaultValue;
    }

    const prompter = this.prompter;
    if (!prompter) {
      throw new Error(`Binding "${binding.name}" needs a prompt but no prompter was given`);
    }

    this.promptCount++;
    this.logger?.debug("Prompting for binding", { name: binding.name, kind: binding.kind });

    if (binding.kind === "gate") {
      return prompter.confirm({
        name: binding.name,
        message: `Use advanced settings for "${binding.name}"?`,
        initialValue: false,
      });
    }

    return askVariable(prompter, binding);
  }
}

function askVariable(prompter: Prompter, binding: VariableBinding): Promise<Scalar> {
  const message = binding.group ? `${binding.group} › ${binding.name}` : binding.name;
  const { value } = binding;

  if (value.kind === "list") {
    return prompter.select({
      name: binding.name,
      message,
      choices: value.items,
      initialValue: value.items[0],
    });
  }

  const declared = value.value;
  if (typeof declared === "boolean") {
    return prompter.confirm({ name: binding.name, message, initialValue: declared });
  }
  if (typeof declared === "number") {
    return prompter
      .text({
        name: binding.name,
        message,
        defaultValue: String(declared),
        validate: (input) =>
          input.trim() !== "" && Number.isFinite(Number(input))
            ? undefined
            : "Enter a number",
      })
      .then(Number);
  }
  return prompter.text({ name: binding.name, message, defaultValue: declared });
}
