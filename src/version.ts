import { createRequire } from "node:module";
import { z } from "zod";

const packageJsonSchema = z.object({ version: z.string().optional() });

function readVersionFromPackageJson(): string | null {
  try {
    const require = createRequire(import.meta.url);
    const pkg = packageJsonSchema.safeParse(require("../package.json"));
    return pkg.success ? (pkg.data.version ?? null) : null;
  } catch {
    return null;
  }
}

// src/ and dist/ both sit one level below package.json.
export const VERSION = process.env.FLEETCONF_VERSION || readVersionFromPackageJson() || "0.0.0";
