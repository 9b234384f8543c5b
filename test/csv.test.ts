import test from "node:test";
import assert from "node:assert/strict";
import path from "node:path";
import { EmptyInputError, InputReadError } from "../src/errors.js";
import { parseCsvRows, readCsvRows, toTable } from "../src/utils/csv.js";
import { tempDir, writeFixture } from "./helpers.js";

test("parseCsvRows handles quoted commas and doubled quotes", () => {
  const rows = parseCsvRows('a,b\n"x, y","say ""hi"""\n');
  assert.deepEqual(rows, [
    ["a", "b"],
    ["x, y", 'say "hi"'],
  ]);
});

test("parseCsvRows keeps newlines inside quoted fields and accepts CRLF", () => {
  const rows = parseCsvRows('note,n\r\n"line 1\nline 2",2\r\n');
  assert.deepEqual(rows, [
    ["note", "n"],
    ["line 1\nline 2", "2"],
  ]);
});

test("parseCsvRows accepts rows shorter and longer than the header", () => {
  const rows = parseCsvRows("a,b,c\n1\n1,2,3,4\n");
  assert.deepEqual(rows, [["a", "b", "c"], ["1"], ["1", "2", "3", "4"]]);
});

test("parseCsvRows keeps a quote inside an unquoted field as written", () => {
  const rows = parseCsvRows("Name,Height\nAlice,5'10\"\n");
  assert.deepEqual(rows, [
    ["Name", "Height"],
    ["Alice", `5'10"`],
  ]);
});

test("parseCsvRows reads on past text that follows a closing quote", () => {
  const rows = parseCsvRows('A,B\n"x"y,1\n');
  assert.equal(rows.length, 2);
  assert.equal(rows[1].length, 2);
  assert.match(rows[1][0], /x.*y/);
  assert.equal(rows[1][1], "1");
});

test("parseCsvRows keeps a blank line as a record of empty cells", () => {
  const rows = parseCsvRows("A,B\n1,2\n\n3,4\n");
  assert.equal(rows.length, 4);
  assert.ok(rows[2].every((c) => c === ""));
  assert.deepEqual(rows[3], ["3", "4"]);
});

test("parseCsvRows treats a blank first line as a blank header", () => {
  const rows = parseCsvRows("\nA,B\n1,2\n");
  assert.equal(rows.length, 3);
  assert.ok(rows[0].every((c) => c === ""));
  assert.deepEqual(rows[1], ["A", "B"]);
});

test("parseCsvRows removes only one leading byte-order mark", () => {
  const rows = parseCsvRows("\uFEFF\uFEFFName\nAda\n");
  assert.equal(rows[0][0], "\uFEFFName");
});

test("readCsvRows strips a byte-order mark from the first header", async (t) => {
  const dir = await tempDir(t);
  const file = await writeFixture(dir, "bom.csv", "\uFEFFName,Age\nAda,36\n");
  const rows = await readCsvRows(file);
  assert.equal(rows[0][0], "Name");
  assert.deepEqual(rows[1], ["Ada", "36"]);
});

test("readCsvRows rejects an empty file", async (t) => {
  const dir = await tempDir(t);
  const file = await writeFixture(dir, "empty.csv", "");
  await assert.rejects(readCsvRows(file), EmptyInputError);
});

test("readCsvRows treats a BOM-only file as empty", async (t) => {
  const dir = await tempDir(t);
  const file = await writeFixture(dir, "bom-only.csv", "\uFEFF");
  await assert.rejects(readCsvRows(file), EmptyInputError);
});

test("readCsvRows reports a missing file as InputReadError", async (t) => {
  const dir = await tempDir(t);
  await assert.rejects(readCsvRows(path.join(dir, "nope.csv")), InputReadError);
});

test("readCsvRows reports an unterminated quote as InputReadError", async (t) => {
  const dir = await tempDir(t);
  const file = await writeFixture(dir, "bad.csv", 'a,b\n"oops,1\n');
  await assert.rejects(readCsvRows(file), (err: unknown) => {
    assert.ok(err instanceof InputReadError);
    assert.equal(err.code, "INPUT_READ");
    return true;
  });
});

test("toTable splits off the header row", () => {
  const table = toTable([["h1", "h2"], ["a", "b"], ["c"]]);
  assert.deepEqual(table.header, ["h1", "h2"]);
  assert.deepEqual(table.rows, [["a", "b"], ["c"]]);
});
