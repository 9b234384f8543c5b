import fs from "node:fs";

const PACKAGE_JSON = new URL("../package.json", import.meta.url);

export function readVersion(): string {
  const pkg: unknown = JSON.parse(fs.readFileSync(PACKAGE_JSON, "utf8"));
  if (pkg && typeof pkg === "object" && "version" in pkg && typeof pkg.version === "string") {
    return pkg.version;
  }
  return "0.0.0";
}
