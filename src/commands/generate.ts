import path from "node:path";
import { loadConfig } from "../config.js";
import { logger } from "../logger.js";
import { publishStylesheet, readStylesheet } from "../site/assets.js";
import { shapeTable } from "../site/columns.js";
import { renderPage, STYLESHEET_NAME, type PageStyles } from "../site/render.js";
import type { GenerateSummary, StyleMode } from "../types.js";
import { readCsvRows, toTable } from "../utils/csv.js";
import { writeText } from "../utils/io.js";

export type GenerateOptions = {
  filterBlankColumns: boolean;
  style: StyleMode;
  title: string;
  heading: string;
  stylesheetPath?: string;
  now: () => Date;
};

function resolveOptions(overrides: Partial<GenerateOptions>): GenerateOptions {
  const cfg = loadConfig();
  return {
    filterBlankColumns: overrides.filterBlankColumns ?? cfg.FILTER_BLANK_COLUMNS,
    style: overrides.style ?? cfg.SITE_STYLE,
    title: overrides.title ?? cfg.SITE_TITLE,
    heading: overrides.heading ?? cfg.SITE_HEADING,
    stylesheetPath: overrides.stylesheetPath ?? cfg.STYLESHEET_PATH,
    now: overrides.now ?? (() => new Date()),
  };
}

async function inlineStyles(source: string | undefined): Promise<PageStyles> {
  const css = await readStylesheet(source);
  return css === undefined ? { kind: "none" } : { kind: "inline", css };
}

/**
 * Load -> (filter) -> render -> (publish stylesheet) -> write.
 * Nothing touches the output location until the page has rendered.
 */
export async function generateCmd(
  input: string,
  output: string,
  overrides: Partial<GenerateOptions> = {}
): Promise<GenerateSummary> {
  const opts = resolveOptions(overrides);
  const outFile = path.resolve(output);

  const raw = toTable(await readCsvRows(input));
  logger.debug({ input, rows: raw.rows.length, columns: raw.header.length }, "csv loaded");

  const table = shapeTable(raw, { filterBlankColumns: opts.filterBlankColumns });
  if (table.header.length !== raw.header.length) {
    logger.debug({ dropped: raw.header.length - table.header.length }, "blank-header columns dropped");
  }

  const styles: PageStyles =
    opts.style === "link" ? { kind: "link", href: STYLESHEET_NAME } : await inlineStyles(opts.stylesheetPath);

  const page = renderPage(table, {
    title: opts.title,
    heading: opts.heading,
    updatedAt: opts.now(),
    styles,
  });

  const stylesheet = opts.style === "link" ? await publishStylesheet(outFile, opts.stylesheetPath) : null;

  await writeText(outFile, page);

  const summary: GenerateSummary = {
    outFile,
    rows: table.rows.length,
    columns: table.header.length,
    stylesheet,
  };
  console.log(`Wrote ${output} (${summary.rows} rows, ${summary.columns} columns)`);
  return summary;
}
