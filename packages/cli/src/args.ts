import { logger } from "@cvsskit/engine";

export const BOOLEAN_FLAGS = new Set([
  "help", "version", "verbose", "quiet", "no-color",
]);

export const KNOWN_FLAGS = new Set([
  ...BOOLEAN_FLAGS,
  "format", "output", "fail-on", "cvss",
]);

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export interface ParsedArgs {
  command: string;
  args: Record<string, string>;
  positional: string[];
}

/**
 * Split argv into command, flags and positionals. Unknown flags are kept but
 * warned about; a value flag without a value is a {@link UsageError}.
 */
export function parseArgs(argv: string[]): ParsedArgs {
  const command = argv[0] || "";
  const args: Record<string, string> = {};
  const positional: string[] = [];
  const warnings: string[] = [];

  for (let i = 1; i < argv.length; i++) {
    const arg = argv[i];
    if (arg.startsWith("--")) {
      const key = arg.slice(2);

      if (!KNOWN_FLAGS.has(key)) {
        warnings.push(`unknown flag --${key}`);
      }

      if (BOOLEAN_FLAGS.has(key)) {
        args[key] = "true";
      } else {
        if (i + 1 >= argv.length || argv[i + 1].startsWith("--")) {
          throw new UsageError(`--${key} requires a value`);
        }
        args[key] = argv[++i];
      }
    } else if (arg.startsWith("-") && arg.length > 1) {
      const key = arg.slice(1);
      if (key === "h") args["help"] = "true";
      else if (key === "v") args["version"] = "true";
      else if (key === "o") args["output"] = argv[++i] || "";
      else if (key === "f") args["format"] = argv[++i] || "";
      else warnings.push(`unknown flag -${key}`);
    } else {
      positional.push(arg);
    }
  }

  // Handle --verbose / --quiet before anything logs
  if (args["verbose"] === "true") {
    process.env.CVSSKIT_LOG_LEVEL = "debug";
  } else if (args["quiet"] === "true") {
    process.env.CVSSKIT_LOG_LEVEL = "error";
  }

  for (const warning of warnings) {
    logger.warn(warning);
  }

  return { command, args, positional };
}
