/**
 * Argument parsing for the cmdcore CLI (simple, no dependencies)
 */

export interface ParsedArgs {
  /** Tokens from the first positional argument on, passed through verbatim */
  tokens: string[];
  flags: Record<string, string | boolean>;
}

const VALUE_FLAGS = new Set(["root", "config"]);

export function parseArgs(argv: string[]): ParsedArgs {
  const result: ParsedArgs = { tokens: [], flags: {} };

  let i = 0;
  while (i < argv.length) {
    const arg = argv[i];

    if (arg.startsWith("--")) {
      const key = arg.slice(2);
      const nextArg = argv[i + 1];

      if (VALUE_FLAGS.has(key) && nextArg !== undefined) {
        result.flags[key] = nextArg;
        i += 2;
      } else {
        result.flags[key] = true;
        i++;
      }
    } else if (arg.startsWith("-")) {
      result.flags[arg.slice(1)] = true;
      i++;
    } else {
      result.tokens = argv.slice(i);
      break;
    }
  }

  return result;
}

export function stringFlag(value: string | boolean | undefined): string | undefined {
  return typeof value === "string" ? value : undefined;
}
