import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import type {
  Collaborator,
  CommandResult,
  GeoBounds,
  RunnerConfig,
  Session,
  SourceLoader
} from "../src/types.js";
import { createRunContext, type RunContextOptions } from "../src/interpreter/context.js";
import type { RunContext } from "../src/interpreter/registry.js";
import { sourceFormat } from "../src/session/bounds.js";
import { PathResolutionError } from "../src/errors.js";
import { createLogger, type Logger } from "../src/utils/logger.js";

export const testConfig: RunnerConfig = {
  pythonInterpreter: "python-test",
  timeoutSec: 30,
  maxScriptDepth: 3,
  logLevel: "silent"
};

export function makeTempDir(prefix = "mscript-test-"): string {
  return fs.realpathSync(fs.mkdtempSync(path.join(os.tmpdir(), prefix)));
}

export type RecordedCall = {
  kind: "run" | "start";
  program: string;
  args: string[];
  cwd: string;
  timeoutSec?: number;
};

const OK: CommandResult = { ok: true, stdout: "", stderr: "", exitCode: 0 };

export function fakeCollaborator(
  respond: (program: string, args: string[]) => CommandResult = () => OK
): { collaborator: Collaborator; calls: RecordedCall[] } {
  const calls: RecordedCall[] = [];
  return {
    calls,
    collaborator: {
      async run(program, args, { cwd, timeoutSec }) {
        calls.push({ kind: "run", program, args, cwd, timeoutSec });
        return respond(program, args);
      },
      async start(program, args, { cwd }) {
        calls.push({ kind: "start", program, args, cwd });
      }
    }
  };
}

/**
 * Loader that only checks existence and takes bounds from a table.
 */
export function fakeSourceLoader(bounds: Record<string, GeoBounds> = {}): { sourceLoader: SourceLoader; loaded: string[] } {
  const loaded: string[] = [];
  return {
    loaded,
    sourceLoader: {
      async load(absPath) {
        if (!fs.existsSync(absPath)) {
          throw new PathResolutionError(absPath, `File does not exist: ${absPath}`);
        }
        loaded.push(absPath);
        const name = path.basename(absPath);
        return bounds[name]
          ? { path: absPath, format: sourceFormat(absPath), bounds: bounds[name] }
          : { path: absPath, format: sourceFormat(absPath) };
      }
    }
  };
}

export function captureLogger(): { logger: Logger; lines: string[] } {
  const lines: string[] = [];
  return { lines, logger: createLogger("test", "info", (line) => lines.push(line)) };
}

export function makeContext(session: Session, overrides: Partial<RunContextOptions> = {}): RunContext {
  return createRunContext({
    collaborator: fakeCollaborator().collaborator,
    sourceLoader: fakeSourceLoader().sourceLoader,
    config: testConfig,
    sleep: async () => {},
    ...overrides,
    session
  });
}

export function writeFile(dir: string, rel: string, content = ""): string {
  const file = path.join(dir, rel);
  fs.mkdirSync(path.dirname(file), { recursive: true });
  fs.writeFileSync(file, content, "utf8");
  return file;
}
