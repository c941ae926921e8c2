/**
 * Interactive input.
 *
 * The binding table never talks to the terminal directly: it asks a
 * Prompter. The default implementation drives @clack/prompts; tests use a
 * scripted fake.
 */

import * as prompts from "@clack/prompts";

import type { Scalar } from "../context/index.js";

// ---------------------------------------------------------------------------
// Questions
// ---------------------------------------------------------------------------

export interface ConfirmQuestion {
  /** Binding name the answer is for */
  name: string;
  message: string;
  initialValue: boolean;
}

export interface TextQuestion {
  name: string;
  message: string;
  defaultValue: string;
  /** Return an error message to reject the answer. */
  validate?: (value: string) => string | undefined;
}

export interface SelectQuestion {
  name: string;
  message: string;
  choices: readonly Scalar[];
  initialValue: Scalar;
}

export interface Prompter {
  confirm(question: ConfirmQuestion): Promise<boolean>;
  /** Resolves to the typed answer, or defaultValue when left empty. */
  text(question: TextQuestion): Promise<string>;
  select(question: SelectQuestion): Promise<Scalar>;
}

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

/**
 * The user cancelled a prompt (Ctrl-C, Escape). Fatal for the render.
 */
export class PromptAbortedError extends Error {
  constructor(public readonly bindingName: string) {
    super(`Input for "${bindingName}" was cancelled`);
    this.name = "PromptAbortedError";
  }
}

// ---------------------------------------------------------------------------
// @clack/prompts implementation
// ---------------------------------------------------------------------------

export class ClackPrompter implements Prompter {
  async confirm(question: ConfirmQuestion): Promise<boolean> {
    const answer = await prompts.confirm({
      message: question.message,
      initialValue: question.initialValue,
    });
    if (prompts.isCancel(answer)) {
      prompts.cancel("Operation cancelled.");
      throw new PromptAbortedError(question.name);
    }
    return answer;
  }

  async text(question: TextQuestion): Promise<string> {
    const { validate } = question;
    const answer = await prompts.text({
      message: question.message,
      placeholder: question.defaultValue,
      defaultValue: question.defaultValue,
      validate: validate
        ? (value) => (value === "" ? undefined : validate(value))
        : undefined,
    });
    if (prompts.isCancel(answer)) {
      prompts.cancel("Operation cancelled.");
      throw new PromptAbortedError(question.name);
    }
    return answer === "" ? question.defaultValue : answer;
  }

  async select(question: SelectQuestion): Promise<Scalar> {
    // Options are keyed by index so that mixed scalar choices share one
    // value type.
    const initialIndex = Math.max(0, question.choices.indexOf(question.initialValue));
    const answer = await prompts.select({
      message: question.message,
      options: question.choices.map((choice, index) => ({
        value: String(index),
        label: String(choice),
      })),
      initialValue: String(initialIndex),
    });
    if (prompts.isCancel(answer)) {
      prompts.cancel("Operation cancelled.");
      throw new PromptAbortedError(question.name);
    }
    return question.choices[Number(answer)] ?? question.initialValue;
  }
}
