const HTML_ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#x27;",
};

export function escapeHtml(s: string): string {
  return s.replace(/[&<>"']/g, (ch) => HTML_ESCAPES[ch] ?? ch);
}

/** UTC timestamp as `YYYY-MM-DD HH:MM:SSZ`. */
export function formatUpdated(date: Date): string {
  return date.toISOString().slice(0, 19).replace("T", " ") + "Z";
}
