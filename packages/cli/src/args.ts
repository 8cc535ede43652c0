export interface ParsedArgs {
  positionals: string[];
  flags: Map<string, string | true>;
}

const VALUE_FLAGS = new Set(["--port", "--executor", "--token"]);
const BOOLEAN_FLAGS = new Set(["--dev"]);

export function parseArgs(args: string[]): ParsedArgs | { error: string } {
  const positionals: string[] = [];
  const flags = new Map<string, string | true>();
  for (let i = 0; i < args.length; i += 1) {
    const token = args[i];
    if (!token) {
      continue;
    }
    if (!token.startsWith("--")) {
      positionals.push(token);
      continue;
    }
    const separator = token.indexOf("=");
    const name = separator >= 0 ? token.slice(0, separator) : token;
    const inlineValue = separator >= 0 ? token.slice(separator + 1) : undefined;
    if (BOOLEAN_FLAGS.has(name)) {
      flags.set(name, true);
      continue;
    }
    if (!VALUE_FLAGS.has(name)) {
      return { error: `Unknown option: ${token}` };
    }
    const value = inlineValue ?? args[i + 1];
    if (inlineValue === undefined) {
      i += 1;
    }
    if (value === undefined || value.length === 0) {
      return { error: `Missing value for ${name}` };
    }
    flags.set(name, value);
  }
  return { positionals, flags };
}

export function stringFlag(parsed: ParsedArgs, name: string): string | undefined {
  const value = parsed.flags.get(name);
  return typeof value === "string" ? value : undefined;
}
