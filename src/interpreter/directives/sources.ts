import { defineDirective } from "../registry.js";
import { numberArg, stringArg } from "../args.js";
import { addSource, clearMap as clearSessionMap, resolveSessionPath } from "../../session/session.js";
import { MalformedArgumentError } from "../../errors.js";

export const loadSource = defineDirective({
  name: "load-source",
  summary: "Load a data source file as a new map layer",
  args: ["file"],
  maxPositional: 1,
  parse: (d) => ({ file: stringArg(d, "file", { positional: 0 }) }),
  async run({ file }, ctx) {
    const absPath = resolveSessionPath(ctx.session, file);
    const source = await ctx.sourceLoader.load(absPath);
    addSource(ctx.session, source);
    ctx.logger.debug(`loaded ${source.format} source ${absPath} as #${ctx.session.sources.length}`);
  }
});

/**
 * Source indexes are 1-based, in load order. A source whose format declares
 * no readable extent still becomes the bounds source; the host reads the
 * extent from the data itself.
 */
export const boundsUseSource = defineDirective({
  name: "bounds-use-source",
  aliases: ["set-geo-bounds"],
  summary: "Set the geographic bounds to those of a loaded source",
  args: ["index"],
  maxPositional: 1,
  parse: (d) => ({ index: numberArg(d, "index", { positional: 0, integer: true, min: 1 }) }),
  run({ index }, ctx) {
    const source = ctx.session.sources[index - 1];
    if (!source) {
      throw new MalformedArgumentError(
        `No source at index ${index} (${ctx.session.sources.length} loaded)`,
        { argument: "index" }
      );
    }
    ctx.session.boundsSource = { index, path: source.path };
    ctx.session.bounds = source.bounds ? { ...source.bounds } : undefined;
    if (!source.bounds) {
      ctx.logger.debug(`bounds follow ${source.format} source ${index}; extent not declared in its header`);
    }
  }
});

export const clearMap = defineDirective({
  name: "clear-map",
  summary: "Remove all loaded sources and the active bounds",
  args: [],
  maxPositional: 0,
  parse: () => undefined,
  run(_params, ctx) {
    clearSessionMap(ctx.session);
  }
});
