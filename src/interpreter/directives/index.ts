import type { DirectiveDefinition } from "../registry.js";
import { changeDir, useScriptDir } from "./paths.js";
import { boundsUseSource, clearMap, loadSource } from "./sources.js";
import { setSetting } from "./settings.js";
import { runProgram, runPython, startProgram } from "./programs.js";
import { log, pause, runScript } from "./flow.js";
import { zip } from "./archive.js";

/**
 * Directives every default registry starts with.
 */
export const builtinDirectives: readonly DirectiveDefinition[] = [
  useScriptDir,
  changeDir,
  boundsUseSource,
  runPython,
  loadSource,
  setSetting,
  runScript,
  runProgram,
  startProgram,
  pause,
  log,
  clearMap,
  zip
];
