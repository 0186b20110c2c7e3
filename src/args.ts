import type { CompressArgs, ParsedArgs, RenameArgs } from "./types.js";

export const DEFAULT_FOLDERS = ["muffin", "chihuahua"];

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

function requireValue(args: string[], i: number, flag: string, what: string): string {
  const next = args[i];
  if (next === undefined || next.startsWith("-")) {
    throw new UsageError(`${flag} requires ${what}`);
  }
  return next;
}

function parsePositiveInt(value: string, flag: string): number {
  const val = Number(value);
  if (!Number.isInteger(val) || val < 1) {
    throw new UsageError(`invalid ${flag} value: ${value}`);
  }
  return val;
}

function parseCompress(args: string[]): CompressArgs {
  const result: CompressArgs = {
    command: "compress",
    preset: "standard",
    folders: [],
    overrides: {},
    backup: false,
    yes: false,
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === "-u" || arg === "--ultra") {
      result.preset = "ultra";
      continue;
    }

    if (arg === "-b" || arg === "--backup") {
      result.backup = true;
      continue;
    }

    if (arg === "-y" || arg === "--yes") {
      result.yes = true;
      continue;
    }

    if (arg === "--max-width" || arg === "--max-height") {
      const val = parsePositiveInt(requireValue(args, ++i, arg, "a numeric argument"), arg);
      if (arg === "--max-width") {
        result.overrides.maxWidth = val;
      } else {
        result.overrides.maxHeight = val;
      }
      continue;
    }

    if (arg === "-q" || arg === "--quality") {
      const next = requireValue(args, ++i, "--quality", "a numeric argument");
      const val = parseInt(next, 10);
      if (isNaN(val)) {
        throw new UsageError(`invalid quality value: ${next}`);
      }
      // resolveConfig clamps to 1-100
      result.overrides.quality = val;
      continue;
    }

    if (arg === "-f" || arg === "--folders") {
      result.folders.push(requireValue(args, i + 1, "--folders", "at least one folder"));
      i++;
      while (i + 1 < args.length && !args[i + 1].startsWith("-")) {
        result.folders.push(args[++i]);
      }
      continue;
    }

    if (arg.startsWith("-")) {
      throw new UsageError(`unknown option: ${arg}`);
    }

    throw new UsageError(`unexpected argument: ${arg} (use --folders to name folders)`);
  }

  if (result.folders.length === 0) {
    result.folders = [...DEFAULT_FOLDERS];
  }

  return result;
}

function parseRename(args: string[]): RenameArgs {
  const positional: string[] = [];
  let dryRun = false;

  for (const arg of args) {
    if (arg === "-n" || arg === "--dry-run") {
      dryRun = true;
    } else if (arg.startsWith("-") && arg !== "-") {
      throw new UsageError(`unknown option: ${arg}`);
    } else {
      positional.push(arg);
    }
  }

  if (positional.length !== 2) {
    throw new UsageError("rename expects exactly two arguments: <folder> <prefix>");
  }

  const [folder, prefix] = positional;
  return { command: "rename", folder, prefix, dryRun };
}

export function parseArgs(argv: string[]): ParsedArgs {
  const args = argv.slice(2);

  if (args.some((arg) => arg === "-h" || arg === "--help")) {
    return { command: "help" };
  }

  if (args.some((arg) => arg === "-v" || arg === "--version")) {
    return { command: "version" };
  }

  const [command, ...rest] = args;

  if (command === undefined) {
    throw new UsageError("no command specified");
  }

  if (command === "compress") {
    return parseCompress(rest);
  }

  if (command === "rename") {
    return parseRename(rest);
  }

  throw new UsageError(`unknown command: ${command}`);
}
