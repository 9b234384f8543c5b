import test from "node:test";
import assert from "node:assert/strict";
import { escapeHtml, formatUpdated } from "../src/site/html.js";

test("escapeHtml escapes ampersands, angle brackets and both quotes", () => {
  assert.equal(
    escapeHtml(`<a href="x">Tom & 'Jerry'</a>`),
    "&lt;a href=&quot;x&quot;&gt;Tom &amp; &#x27;Jerry&#x27;&lt;/a&gt;"
  );
});

test("escapeHtml leaves plain text alone and escapes an existing entity again", () => {
  assert.equal(escapeHtml("plain text 123"), "plain text 123");
  assert.equal(escapeHtml("&amp;"), "&amp;amp;");
});

test("formatUpdated renders UTC with a trailing Z", () => {
  assert.equal(formatUpdated(new Date(Date.UTC(2024, 0, 2, 3, 4, 5, 678))), "2024-01-02 03:04:05Z");
});
