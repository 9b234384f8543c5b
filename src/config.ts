import "dotenv/config";
import { ConfigError } from "./errors.js";
import type { StyleMode } from "./types.js";

export type AppConfig = {
  // Page text
  SITE_TITLE: string;
  SITE_HEADING: string;

  // Rendering
  SITE_STYLE: StyleMode;
  FILTER_BLANK_COLUMNS: boolean;

  // Companion stylesheet; undefined means the bundled assets/table.css
  STYLESHEET_PATH?: string;
};

const STYLE_MODES: readonly StyleMode[] = ["inline", "link"];

function str(name: string, def: string): string {
  const v = process.env[name]?.trim();
  if (v && v.length > 0) return v;
  return def;
}

function optStr(name: string): string | undefined {
  const v = process.env[name]?.trim();
  return v ? v : undefined;
}

function bool(name: string, def: boolean): boolean {
  const raw = process.env[name]?.trim().toLowerCase();
  if (!raw) return def;
  if (raw === "1" || raw === "true" || raw === "yes") return true;
  if (raw === "0" || raw === "false" || raw === "no") return false;
  throw new ConfigError(`Invalid env ${name}=${process.env[name]}`);
}

export function parseStyleMode(raw: string, source = "style"): StyleMode {
  const mode = STYLE_MODES.find((m) => m === raw.trim().toLowerCase());
  if (!mode) throw new ConfigError(`Invalid ${source}=${raw} (expected ${STYLE_MODES.join(" | ")})`);
  return mode;
}

export function loadConfig(): AppConfig {
  return {
    SITE_TITLE: str("SITE_TITLE", "Sheet Table"),
    SITE_HEADING: str("SITE_HEADING", "Sheet (Searchable)"),

    SITE_STYLE: parseStyleMode(str("SITE_STYLE", "inline"), "env SITE_STYLE"),
    FILTER_BLANK_COLUMNS: bool("FILTER_BLANK_COLUMNS", true),

    STYLESHEET_PATH: optStr("STYLESHEET_PATH"),
  };
}
