import type { Collaborator, RunnerConfig, SourceLoader } from "../../../types.js";
import type { Logger } from "../../../utils/logger.js";
import type { DirectiveRegistry } from "../../../interpreter/registry.js";

/**
 * What tool handlers need to build run contexts. The server fills this in
 * once; tests pass fakes.
 */
export type HandlerDeps = {
  config: RunnerConfig;
  logger: Logger;
  collaborator?: Collaborator;
  sourceLoader?: SourceLoader;
  registry?: DirectiveRegistry;
  sleep?: (ms: number) => Promise<void>;
};
