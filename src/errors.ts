/**
 * Error taxonomy for script runs. Every error is fatal: the run stops at the
 * first one and the error carries where it stopped.
 */

export type ScriptErrorKind =
  | "PathResolution"
  | "ExternalInvocation"
  | "UnknownDirective"
  | "MalformedArgument";

export type ErrorLocation = {
  directiveIndex?: number;
  line?: number;
  directive?: string;
  script?: string;
};

export abstract class ScriptError extends Error {
  abstract readonly kind: ScriptErrorKind;
  readonly detail: string;
  directiveIndex?: number;
  line?: number;
  directive?: string;
  script?: string;

  /** Every location the error passed through, innermost first. */
  readonly frames: ErrorLocation[] = [];

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.detail = message;
  }

  /**
   * Record the directive the error passed through. The location fields keep
   * the innermost one; the message reads from the top-level run inwards.
   */
  locate(location: ErrorLocation): this {
    this.frames.push({ ...location });
    if (this.frames.length === 1) {
      this.directiveIndex = location.directiveIndex;
      this.line = location.line;
      this.directive = location.directive;
      this.script = location.script;
    }
    this.message = this.frames.reduce((inner, frame) => formatLocated(inner, frame), this.detail);
    return this;
  }

  /**
   * Location within the top-level run, the last one recorded.
   */
  outermost(): ErrorLocation {
    return this.frames[this.frames.length - 1] ?? {};
  }
}

function formatLocated(detail: string, loc: ErrorLocation): string {
  if (loc.directiveIndex === undefined) {
    return detail;
  }
  const line = loc.line !== undefined ? ` (line ${loc.line})` : "";
  const script = loc.script ? ` of ${loc.script}` : "";
  const name = loc.directive ? ` [${loc.directive}]` : "";
  return `failed at directive ${loc.directiveIndex}${line}${script}${name}: ${detail}`;
}

export class PathResolutionError extends ScriptError {
  readonly kind = "PathResolution";

  constructor(readonly path: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "PathResolutionError";
  }
}

export class ExternalInvocationError extends ScriptError {
  readonly kind = "ExternalInvocation";

  constructor(
    message: string,
    options?: { cause?: unknown; exitCode?: number | null; stderr?: string }
  ) {
    super(message, options);
    this.name = "ExternalInvocationError";
    this.exitCode = options?.exitCode ?? null;
    this.stderr = options?.stderr ?? "";
  }

  readonly exitCode: number | null;
  readonly stderr: string;
}

export class UnknownDirectiveError extends ScriptError {
  readonly kind = "UnknownDirective";

  constructor(readonly directiveName: string) {
    super(`Unknown directive: ${directiveName}`);
    this.name = "UnknownDirectiveError";
  }
}

export class MalformedArgumentError extends ScriptError {
  readonly kind = "MalformedArgument";

  constructor(message: string, options?: { cause?: unknown; argument?: string }) {
    super(message, options);
    this.name = "MalformedArgumentError";
    this.argument = options?.argument;
  }

  readonly argument?: string;
}

export function isScriptError(err: unknown): err is ScriptError {
  return err instanceof ScriptError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
