import type { LoadedSource, SourceLoader } from "../types.js";
import { assertReadableFile } from "../utils/validation.js";
import { readDeclaredBounds, sourceFormat } from "../session/bounds.js";

/**
 * SourceLoader that checks the file and reads whatever bounds it declares.
 * The data itself stays opaque.
 */
export function createFileSourceLoader(): SourceLoader {
  return {
    async load(absPath) {
      await assertReadableFile(absPath);
      const format = sourceFormat(absPath);
      const source: LoadedSource = { path: absPath, format };
      const bounds = await readDeclaredBounds(absPath, format);
      if (bounds) {
        source.bounds = bounds;
      }
      return source;
    }
  };
}
