/**
 * Command-line interface.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * USAGE
 * ═══════════════════════════════════════════════════════════════════════════
 *
 *   scaffoldr use <template-path|tag> <target-dir> [--use-defaults]
 *   scaffoldr validate <template-path>
 *   scaffoldr save <template-path> <tag> [--force]
 *   scaffoldr list [--json]
 *   scaffoldr delete <tag>
 *
 * Exit codes:
 *   0 - Success
 *   1 - Error (invalid template, failed render, cancelled prompt, bad usage)
 */

import { existsSync } from "node:fs";
import { parseArgs } from "node:util";

import {
  effectiveLogLevel,
  loadConfig,
  validateConfig,
  type AppConfig,
} from "../config/index.js";
import { ContextSchemaError } from "../context/index.js";
import { createLogger, initRunId, type Logger } from "../logging/index.js";
import {
  ProjectTemplate,
  TemplateRegistry,
  validateTemplate,
} from "../project/index.js";
import type { Prompter } from "../bindings/index.js";

// ============================================================
// Output Formatting
// ============================================================

const COLORS = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",
  dim: "\x1b[2m",
  green: "\x1b[32m",
  red: "\x1b[31m",
  yellow: "\x1b[33m",
  cyan: "\x1b[36m",
};

const useColors = process.stdout.isTTY && !process.env.NO_COLOR;

function c(color: keyof typeof COLORS, text: string): string {
  return useColors ? `${COLORS[color]}${text}${COLORS.reset}` : text;
}

function printSuccess(message: string): void {
  console.log(`${c("green", "✓")} ${message}`);
}

function printFailure(message: string): void {
  console.error(`${c("red", "✗")} ${message}`);
}

const HELP = `
Usage: scaffoldr <command> [options]

Commands:
  use <template-path|tag> <target-dir>   Render a template into a directory
  validate <template-path>               Check that a template renders with defaults
  save <template-path> <tag>             Validate and save a template under a tag
  list                                   List saved templates
  delete <tag>                           Delete a saved template

Options:
  --use-defaults    Do not prompt; use every declared default (use)
  --force           Replace a template saved under the same tag (save)
  --json            Print machine-readable output (list)
  -h, --help        Show this help message
`;

// ============================================================
// CLI Parsing
// ============================================================

export interface CliArgs {
  command: string | undefined;
  positionals: string[];
  useDefaults: boolean;
  force: boolean;
  json: boolean;
  help: boolean;
}

export function parseCliArgs(argv: string[]): CliArgs {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      "use-defaults": { type: "boolean", default: false },
      force: { type: "boolean", default: false },
      json: { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
  });

  const [command, ...rest] = positionals;
  return {
    command,
    positionals: rest,
    useDefaults: values["use-defaults"] ?? false,
    force: values.force ?? false,
    json: values.json ?? false,
    help: values.help ?? false,
  };
}

class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

function requirePositionals(args: CliArgs, names: string[]): string[] {
  if (args.positionals.length !== names.length) {
    throw new UsageError(
      `Usage: scaffoldr ${args.command ?? ""} ${names.map((n) => `<${n}>`).join(" ")}`
    );
  }
  return args.positionals;
}

// ============================================================
// Commands
// ============================================================

export interface CliDependencies {
  config?: AppConfig;
  logger?: Logger;
  prompter?: Prompter;
}

interface CommandContext {
  args: CliArgs;
  config: AppConfig;
  logger: Logger;
  registry: TemplateRegistry;
  prompter?: Prompter;
}

async function useCommand(ctx: CommandContext): Promise<void> {
  const [source = "", target = ""] = requirePositionals(ctx.args, [
    "template-path|tag",
    "target-dir",
  ]);

  const template = existsSync(source)
    ? ProjectTemplate.load(source, { logger: ctx.logger })
    : ctx.registry.get(source);

  const summary = await template.execute(target, {
    useDefaults: ctx.args.useDefaults,
    prompter: ctx.prompter,
    logger: ctx.logger,
    onFileRendered: (event) => {
      if (event.pruned) {
        console.log(`${c("dim", "-")} Skipped ${event.relativePath} ${c("dim", "(empty)")}`);
      } else {
        printSuccess(`Created ${event.relativePath}`);
      }
    },
  });

  printSuccess(
    `Created ${target} from ${template.info().tag} (${summary.files.length} file(s))`
  );
}

async function validateCommand(ctx: CommandContext): Promise<void> {
  const [path = ""] = requirePositionals(ctx.args, ["template-path"]);
  const result = await validateTemplate(path, ctx.logger);

  if (!result.valid) {
    for (const error of result.errors) printFailure(error);
    throw new Error(`Template ${path} is invalid`);
  }
  printSuccess(`Template is valid (${result.summary?.files.length ?? 0} file(s) rendered with defaults)`);
}

async function saveCommand(ctx: CommandContext): Promise<void> {
  const [path = "", tag = ""] = requirePositionals(ctx.args, ["template-path", "tag"]);
  await ctx.registry.save(path, tag, { force: ctx.args.force });
  printSuccess(`Saved template as "${tag}"`);
}

function listCommand(ctx: CommandContext): void {
  requirePositionals(ctx.args, []);
  const templates = ctx.registry.list();

  if (ctx.args.json) {
    console.log(JSON.stringify(templates, null, 2));
    return;
  }
  if (templates.length === 0) {
    console.log(c("dim", `No templates saved in ${ctx.registry.root}`));
    return;
  }

  const width = Math.max(...templates.map((t) => t.tag.length), 3);
  console.log(c("bold", `${"TAG".padEnd(width)}  CREATED                   REPOSITORY`));
  for (const t of templates) {
    console.log(`${t.tag.padEnd(width)}  ${(t.created ?? "-").padEnd(24)}  ${t.repository}`);
  }
}

function deleteCommand(ctx: CommandContext): void {
  const [tag = ""] = requirePositionals(ctx.args, ["tag"]);
  ctx.registry.remove(tag);
  printSuccess(`Deleted template "${tag}"`);
}

// ============================================================
// Main
// ============================================================

/**
 * Run the CLI and return its exit code.
 */
export async function run(argv: string[], deps: CliDependencies = {}): Promise<number> {
  let args: CliArgs;
  try {
    args = parseCliArgs(argv);
  } catch (err) {
    printFailure(err instanceof Error ? err.message : String(err));
    console.log(HELP);
    return 1;
  }

  if (args.help || args.command === undefined) {
    console.log(HELP);
    return args.help ? 0 : 1;
  }

  initRunId();
  const config = deps.config ?? loadConfig();

  try {
    validateConfig(config);
  } catch (err) {
    printFailure(err instanceof Error ? err.message : String(err));
    return 1;
  }

  const logger =
    deps.logger ??
    createLogger({
      level: effectiveLogLevel(config),
      logDir: config.logDir,
      file: config.logToFile,
    });

  const ctx: CommandContext = {
    args,
    config,
    logger,
    registry: new TemplateRegistry(config.home, logger),
    prompter: deps.prompter,
  };

  try {
    switch (args.command) {
      case "use":
        await useCommand(ctx);
        break;
      case "validate":
        await validateCommand(ctx);
        break;
      case "save":
        await saveCommand(ctx);
        break;
      case "list":
        listCommand(ctx);
        break;
      case "delete":
        deleteCommand(ctx);
        break;
      default:
        throw new UsageError(`Unknown command "${args.command}". Run scaffoldr --help.`);
    }
  } catch (err) {
    const message = err instanceof ContextSchemaError
      ? err.format()
      : err instanceof Error
        ? err.message
        : String(err);
    logger.debug("Command failed", { command: args.command, error: message });
    printFailure(message);
    return 1;
  }

  return 0;
}
