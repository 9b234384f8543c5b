import fs from "node:fs/promises";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { logger } from "../logger.js";
import { copyInto, exists } from "../utils/io.js";
import { STYLESHEET_NAME } from "./render.js";

// assets/ sits at the package root, two levels up from both src/site and dist/site
export const BUNDLED_STYLESHEET = fileURLToPath(new URL("../../assets/table.css", import.meta.url));

function warnMissing(source: string) {
  logger.warn({ source }, "stylesheet not found; page will render unstyled");
}

/** Stylesheet text for inlining, or undefined when the file is absent. */
export async function readStylesheet(source: string = BUNDLED_STYLESHEET): Promise<string | undefined> {
  if (!(await exists(source))) {
    warnMissing(source);
    return undefined;
  }
  return fs.readFile(source, "utf8");
}

/**
 * Copies the stylesheet next to `outFile` under the name the page links to.
 * Returns the destination, or null when the source is absent.
 */
export async function publishStylesheet(
  outFile: string,
  source: string = BUNDLED_STYLESHEET
): Promise<string | null> {
  if (!(await exists(source))) {
    warnMissing(source);
    return null;
  }
  const dest = path.join(path.dirname(outFile), STYLESHEET_NAME);
  await copyInto(source, dest);
  logger.debug({ source, dest }, "stylesheet published");
  return dest;
}
