/**
 * Session state the interpreter acts on. A Session is passed explicitly to
 * every run; nothing here is global.
 */

import path from "path";
import type {
  LoadedSource,
  Session,
  SessionSnapshot,
  SettingValue
} from "../types.js";
import { formatValue } from "../script/values.js";

export type CreateSessionOptions = {
  workingDirectory: string;
  sources?: LoadedSource[];
  settings?: Record<string, SettingValue>;
};

export function createSession(opts: CreateSessionOptions): Session {
  return {
    workingDirectory: path.resolve(opts.workingDirectory),
    relativeTo: "cwd",
    sources: [...(opts.sources ?? [])],
    settings: new Map(Object.entries(opts.settings ?? {}))
  };
}

/**
 * Resolve a path argument against the session's working directory.
 */
export function resolveSessionPath(session: Session, target: string): string {
  return path.resolve(session.workingDirectory, target);
}

/**
 * Last write wins.
 */
export function setSetting(session: Session, name: string, value: SettingValue): void {
  session.settings.set(name, value);
}

export function addSource(session: Session, source: LoadedSource): void {
  session.sources.push(source);
}

/**
 * Paths of the loaded sources with repeats removed, in first-load order.
 */
export function distinctSourcePaths(session: Session): string[] {
  return [...new Set(session.sources.map(s => s.path))];
}

export function clearMap(session: Session): void {
  session.sources = [];
  session.bounds = undefined;
  session.boundsSource = undefined;
}

export function snapshotSession(session: Session): SessionSnapshot {
  const settings: Record<string, string | number | boolean> = {};
  for (const [name, value] of session.settings) {
    settings[name] = formatValue(value);
  }
  return {
    workingDirectory: session.workingDirectory,
    relativeTo: session.relativeTo,
    bounds: session.bounds ? { ...session.bounds } : null,
    boundsSource: session.boundsSource ? { ...session.boundsSource } : null,
    sources: session.sources.map(s => ({ ...s })),
    settings
  };
}
