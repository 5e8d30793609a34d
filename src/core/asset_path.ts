import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";

/**
 * Locate `assets/<relPath>` by walking up from the calling module.
 * Works from both src/ (tests) and dist/src/ (built package).
 */
export function resolveAssetPath(relPath: string, fromUrl: string): string {
  let dir = path.dirname(fileURLToPath(fromUrl));

  for (;;) {
    const candidate = path.join(dir, "assets", relPath);
    if (fs.existsSync(candidate)) return candidate;

    const parent = path.dirname(dir);
    if (parent === dir) break;
    dir = parent;
  }

  throw new Error(`resolveAssetPath: assets/${relPath} not found above ${fileURLToPath(fromUrl)}`);
}
