/**
 * Type definitions for the map script runner.
 */

export type SessionId = string;

// ============= SCRIPT TYPES =============

export type Percentage = {
  kind: "percent";
  value: number;
};

export type ArgValue = string | number | boolean | Percentage;

export type SettingValue = ArgValue;

/**
 * One parsed script line. Immutable once parsed.
 */
export type Directive = {
  readonly name: string;
  readonly args: Readonly<Record<string, ArgValue>>;
  readonly raw: Readonly<Record<string, string>>; // Unparsed text of each named argument
  readonly positional: readonly string[];
  readonly line: number; // 1-based
  readonly text: string;
};

export type ScriptIssue = {
  line: number;
  kind: string;
  message: string;
};

// ============= SESSION TYPES =============

export type GeoBounds = {
  minLon: number;
  minLat: number;
  maxLon: number;
  maxLat: number;
};

export type SourceFormat = "osm" | "pbf" | "geojson" | "ibf" | "unknown";

export type LoadedSource = {
  path: string;
  format: SourceFormat;
  bounds?: GeoBounds;
};

export type RelativePathMode = "cwd" | "script";

/**
 * The loaded source the active bounds were taken from. Its extent may be
 * unknown here when the format carries no readable header.
 */
export type BoundsSource = {
  index: number; // 1-based, in load order
  path: string;
};

/**
 * Mutable renderer state that directives act on.
 */
export type Session = {
  workingDirectory: string;
  relativeTo: RelativePathMode;
  bounds?: GeoBounds;
  boundsSource?: BoundsSource;
  sources: LoadedSource[]; // Sequence: the same path may appear more than once
  settings: Map<string, SettingValue>;
};

export type SessionSnapshot = {
  workingDirectory: string;
  relativeTo: RelativePathMode;
  bounds: GeoBounds | null;
  boundsSource: BoundsSource | null;
  sources: LoadedSource[];
  settings: Record<string, string | number | boolean>;
};

// ============= COLLABORATOR TYPES =============

export type CommandResult = {
  ok: boolean;
  stdout: string;
  stderr: string;
  exitCode: number | null;
};

export type RunProgramOptions = {
  cwd: string;
  timeoutSec: number;
};

/**
 * External programs the interpreter hands work to.
 */
export interface Collaborator {
  run(program: string, args: string[], options: RunProgramOptions): Promise<CommandResult>;
  start(program: string, args: string[], options: { cwd: string }): Promise<void>;
}

export interface SourceLoader {
  load(absPath: string): Promise<LoadedSource>;
}

// ============= CONFIG TYPES =============

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export type RunnerConfig = {
  pythonInterpreter: string;
  timeoutSec: number;
  maxScriptDepth: number;
  logLevel: LogLevel;
};

// ============= RUN TYPES =============

export type RunSummary = {
  applied: number;
  durationMs: number;
};

export type FailureLocation = {
  index: number | null;
  line: number | null;
  directive: string | null;
  script: string | null;
};

export type RunFailure = {
  applied: number;
  failedAt: FailureLocation; // Directive of the top-level run
  nestedAt: FailureLocation | null; // Innermost directive when a nested script failed

  error: {
    kind: string;
    message: string;
  };
};

// ============= MCP REQUEST TYPES =============

export type StartSessionArgs = {
  workingDirectory: string;
  settings?: Record<string, string | number | boolean>;
};

export type SessionIdArgs = {
  sessionId: string;
};

export type RunScriptArgs = {
  sessionId: string;
  file: string;
};

export type RunDirectivesArgs = {
  sessionId: string;
  text: string;
  scriptDirectory?: string;
};

export type CheckScriptArgs = {
  text: string;
};

export type RunRecord = {
  startedAt: number;
  origin: string; // Script path, or "<inline>"
  status: "completed" | "failed";
  applied: number;
};

export type SessionState = {
  id: SessionId;
  createdAt: number;
  session: Session;
  runs: RunRecord[];
};
