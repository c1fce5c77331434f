import type { Collaborator, Directive, RunnerConfig, Session, SourceLoader } from "../types.js";
import { createDirectiveRegistry, type DirectiveRegistry, type RunContext } from "./registry.js";
import { builtinDirectives } from "./directives/index.js";
import { createProcessCollaborator } from "../collaborators/process.js";
import { createFileSourceLoader } from "../collaborators/source-loader.js";
import { loadConfig } from "../config.js";
import { silentLogger, type Logger } from "../utils/logger.js";

export type RunContextOptions = {
  session: Session;
  config?: RunnerConfig;
  collaborator?: Collaborator;
  sourceLoader?: SourceLoader;
  logger?: Logger;
  registry?: DirectiveRegistry;
  scriptDirectory?: string;
  sleep?: (ms: number) => Promise<void>;
  onApplied?: (directive: Directive, index: number) => void;
};

const defaultSleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

export function createDefaultRegistry(): DirectiveRegistry {
  return createDirectiveRegistry(builtinDirectives);
}

/**
 * Build a context for a top-level run. Anything not supplied gets the
 * process-backed default.
 */
export function createRunContext(opts: RunContextOptions): RunContext {
  const logger = opts.logger ?? silentLogger;
  return {
    session: opts.session,
    config: opts.config ?? loadConfig(),
    collaborator: opts.collaborator ?? createProcessCollaborator(logger.child("process")),
    sourceLoader: opts.sourceLoader ?? createFileSourceLoader(),
    logger,
    registry: opts.registry ?? createDefaultRegistry(),
    scriptDirectory: opts.scriptDirectory,
    depth: 0,
    sleep: opts.sleep ?? defaultSleep,
    onApplied: opts.onApplied
  };
}
