export interface CliArgs {
  script: string;
  cwd?: string;
  json: boolean;
  check: boolean;
}

export const USAGE = "usage: mscript <script> [--cwd <dir>] [--json] [--check]";

export function parseCliArgs(argv: string[]): CliArgs {
  const positional: string[] = [];
  let cwd: string | undefined;
  let json = false;
  let check = false;

  for (let i = 0; i < argv.length; i += 1) {
    const token = argv[i];
    if (token === "--") {
      continue;
    }
    if (token === "--cwd") {
      const next = argv[i + 1];
      if (typeof next !== "string" || next.trim() === "") {
        throw new Error("--cwd requires a directory");
      }
      cwd = next;
      i += 1;
      continue;
    }
    if (token === "--json") {
      json = true;
      continue;
    }
    if (token === "--check") {
      check = true;
      continue;
    }
    if (token.startsWith("--")) {
      throw new Error(`Unknown option ${token}`);
    }
    positional.push(token);
  }

  if (positional.length !== 1) {
    throw new Error(USAGE);
  }

  return { script: positional[0], cwd, json, check };
}
