import { existsSync, readFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";

/** Version from the nearest package.json above this module (source or dist). */
export function packageVersion(): string {
  let dir = dirname(fileURLToPath(import.meta.url));
  for (let depth = 0; depth < 4; depth++) {
    const candidate = join(dir, "package.json");
    if (existsSync(candidate)) {
      const pkg: unknown = JSON.parse(readFileSync(candidate, "utf-8"));
      if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
        return pkg.version;
      }
    }
    dir = dirname(dir);
  }
  return "0.0.0";
}
