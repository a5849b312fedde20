import { existsSync } from "fs";
import { dirname, join } from "path";
import { fileURLToPath } from "url";

let packageRoot: string | undefined;

/**
 * Directory holding this package's package.json, found by walking up from
 * the compiled (or source) module location.
 */
export function getPackageRoot(): string {
  if (packageRoot) return packageRoot;

  let current = dirname(fileURLToPath(import.meta.url));
  while (!existsSync(join(current, "package.json"))) {
    const parent = dirname(current);
    if (parent === current) {
      throw new Error("Could not locate the autobdd package root");
    }
    current = parent;
  }
  packageRoot = current;
  return packageRoot;
}

export function templatePath(name: string): string {
  return join(getPackageRoot(), "templates", name);
}

export function slugify(text: string): string {
  return text
    .toLowerCase()
    .normalize("NFKD")
    .replace(/[\u0300-\u036f]/g, "")
    .replace(/\u0131/g, "i")
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-|-$/g, "");
}
