import path from "path";
import fs from "fs-extra";
import AdmZip from "adm-zip";
import { defineDirective } from "../registry.js";
import { optionalStringArg, stringArg } from "../args.js";
import { resolveSessionPath } from "../../session/session.js";
import { assertDirectory, assertReadableFile } from "../../utils/validation.js";
import { PathResolutionError } from "../../errors.js";

function listArg(value: string | undefined): string[] {
  if (value === undefined) return [];
  return value.split(",").map(item => item.trim()).filter(item => item !== "");
}

/**
 * Archive entry name for a file, relative to the base directory with "/" separators.
 */
function entryName(base: string, file: string): string {
  const rel = path.relative(base, file);
  if (rel === "" || rel.startsWith("..") || path.isAbsolute(rel)) {
    throw new PathResolutionError(file, `zip entry ${file} is outside ${base}`);
  }
  return rel.split(path.sep).join("/");
}

/**
 * Pack base-dir, or only the listed files under it, into zip-file.
 * files is comma-separated; relative entries resolve against base-dir.
 */
export const zip = defineDirective({
  name: "zip",
  summary: "Pack files under a base directory into a zip archive",
  args: ["base-dir", "files", "zip-file"],
  maxPositional: 0,
  parse: (d) => ({
    baseDir: stringArg(d, "base-dir"),
    files: listArg(optionalStringArg(d, "files")),
    zipFile: stringArg(d, "zip-file")
  }),
  async run({ baseDir, files, zipFile }, ctx) {
    const base = resolveSessionPath(ctx.session, baseDir);
    await assertDirectory(base);
    const target = resolveSessionPath(ctx.session, zipFile);
    const archive = new AdmZip();

    if (files.length === 0) {
      // An earlier archive inside the base directory is not packed into the new one
      archive.addLocalFolder(base, "", (name) => path.resolve(base, name) !== target);
    } else {
      for (const file of files) {
        const absPath = path.resolve(base, file);
        const name = entryName(base, absPath);
        await assertReadableFile(absPath);
        const folder = path.posix.dirname(name);
        archive.addLocalFile(absPath, folder === "." ? "" : folder);
      }
    }

    await fs.ensureDir(path.dirname(target));
    await archive.writeZipPromise(target);
    ctx.logger.debug(`zip wrote ${archive.getEntries().length} entries to ${target}`);
  }
});
