import { defineDirective } from "../registry.js";
import { stringArg, valueArg } from "../args.js";
import { setSetting as setSessionSetting } from "../../session/session.js";
import { formatValue } from "../../script/values.js";

export const setSetting = defineDirective({
  name: "set-setting",
  summary: "Set a named renderer setting",
  args: ["name", "value"],
  maxPositional: 0,
  parse: (d) => ({ name: stringArg(d, "name"), value: valueArg(d, "value") }),
  run({ name, value }, ctx) {
    setSessionSetting(ctx.session, name, value);
    ctx.logger.debug(`setting ${name} = ${String(formatValue(value))}`);
  }
});
