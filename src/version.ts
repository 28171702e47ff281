import { readFileSync } from "node:fs";

function readVersionFromPackageJson(): string | null {
  try {
    const raw: unknown = JSON.parse(readFileSync(new URL("../package.json", import.meta.url), "utf8"));
    if (typeof raw === "object" && raw !== null && "version" in raw && typeof raw.version === "string") {
      return raw.version;
    }
    return null;
  } catch {
    return null;
  }
}

// Single source of truth for the current version.
// - Bundled builds: AZURE_CI_UTILS_VERSION set by the packager.
// - Dev/npm builds: package.json (one directory above both src/ and dist/).
export const VERSION = process.env.AZURE_CI_UTILS_VERSION || readVersionFromPackageJson() || "0.0.0";
