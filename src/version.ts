import { createRequire } from "node:module";

const require = createRequire(import.meta.url);

function readPackageVersion(): string | undefined {
  for (const candidate of ["../package.json", "../../package.json"]) {
    try {
      const raw: unknown = require(candidate);
      if (raw && typeof raw === "object" && "version" in raw && typeof raw.version === "string" && raw.version.trim()) {
        return raw.version.trim();
      }
    } catch {
      // Source and dist layouts sit at different depths.
      continue;
    }
  }
  return undefined;
}

// Single source of truth for the CLI version: package.json.
export const APP_VERSION: string = ((): string => {
  const fromPackage = readPackageVersion();
  if (fromPackage) {
    return fromPackage;
  }

  const fromEnv = process.env.npm_package_version;
  if (typeof fromEnv === "string" && fromEnv.trim().length > 0) {
    return fromEnv.trim();
  }

  return "0.0.0";
})();
