import { createRequire } from "node:module";

const requireJson = createRequire(import.meta.url);

/**
 * Reads `version` from the package manifest, which sits one directory above
 * both `src/` and `dist/`.
 */
export function readPackageVersion(manifestPath = "../package.json"): string {
  const manifest: unknown = requireJson(manifestPath);
  if (
    typeof manifest === "object" &&
    manifest !== null &&
    "version" in manifest &&
    typeof manifest.version === "string"
  ) {
    return manifest.version;
  }
  return "0.0.0";
}

export const VERSION = readPackageVersion();
