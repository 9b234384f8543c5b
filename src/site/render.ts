import type { Row, Table } from "../types.js";
import { FILTER_SCRIPT } from "./filterScript.js";
import { escapeHtml, formatUpdated } from "./html.js";

export const STYLESHEET_NAME = "styles.css";

export type PageStyles =
  | { kind: "inline"; css: string }
  | { kind: "link"; href: string }
  | { kind: "none" };

export type RenderOptions = {
  title: string;
  heading: string;
  updatedAt: Date;
  styles: PageStyles;
  fonts?: boolean;
};

const FONT_LINKS = [
  `<link rel="preconnect" href="https://fonts.googleapis.com">`,
  `<link rel="preconnect" href="https://fonts.gstatic.com" crossorigin>`,
  `<link href="https://fonts.googleapis.com/css2?family=Roboto:wght@300;400;500;700&display=swap" rel="stylesheet">`,
];

function headerRow(header: Row): string {
  return "<tr>" + header.map((h) => `<th>${escapeHtml(h)}</th>`).join("") + "</tr>";
}

function bodyRow(row: Row): string {
  return "<tr>" + row.map((c) => `<td>${escapeHtml(c)}</td>`).join("") + "</tr>";
}

function styleBlock(styles: PageStyles): string[] {
  switch (styles.kind) {
    case "inline":
      return ["<style>", styles.css.trimEnd(), "</style>"];
    case "link":
      return [`<link rel="stylesheet" href="${escapeHtml(styles.href)}">`];
    case "none":
      return [];
  }
}

/** Renders the full page. Cells are expected to be aligned on the header already. */
export function renderPage(table: Table, opts: RenderOptions): string {
  const head = [
    `<meta charset="utf-8" />`,
    `<meta name="viewport" content="width=device-width,initial-scale=1" />`,
    `<meta name="theme-color" content="#121212" />`,
    ...(opts.fonts === false ? [] : FONT_LINKS),
    `<title>${escapeHtml(opts.title)}</title>`,
    ...styleBlock(opts.styles),
  ];

  const tbody = table.rows.map(bodyRow).join("\n");

  return `<!doctype html>
<html lang="en">
<head>
${head.map((l) => "  " + l).join("\n")}
</head>
<body>
  <div class="container" role="main">
    <h1>${escapeHtml(opts.heading)}</h1>
    <p class="meta">Last updated (UTC): ${formatUpdated(opts.updatedAt)}</p>

    <div class="controls">
      <label for="q" class="sr-only">Search table</label>
      <input id="q" aria-label="Search table" type="search" placeholder="Type to search…" autocomplete="off" />
    </div>

    <div class="table-wrap">
      <table id="tbl" role="table" aria-label="Sheet data">
        <thead>${headerRow(table.header)}</thead>
        <tbody>
${tbody}
        </tbody>
      </table>
    </div>
  </div>

<script>
  ${FILTER_SCRIPT}
</script>
</body>
</html>
`;
}
