import fs from "fs";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { csvPathFor, dedupeBy, readCsv, writeCsv, writeJson, readJson } from "./files";

describe("csvPathFor", () => {
  it("swaps a .json suffix or appends .csv", () => {
    expect(csvPathFor("out/gdelt_data.json")).toBe("out/gdelt_data.csv");
    expect(csvPathFor("out/export")).toBe("out/export.csv");
  });
});

describe("dedupeBy", () => {
  it("keeps the first row per key in order", () => {
    const rows = [
      { id: "a", n: 1 },
      { id: "b", n: 2 },
      { id: "a", n: 3 },
    ];
    expect(dedupeBy(rows, (r) => r.id)).toEqual([
      { id: "a", n: 1 },
      { id: "b", n: 2 },
    ]);
  });
});

describe("csv and json files", () => {
  let dir: string;
  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "news-files-"));
  });
  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("writes a header, quotes awkward cells and creates missing directories", () => {
    const file = path.join(dir, "nested", "rows.csv");
    writeCsv(file, [{ title: 'He said "hi", then left', votes: 3, note: null }], [
      "title",
      "votes",
      "note",
    ]);
    expect(fs.readFileSync(file, "utf-8")).toBe(
      'title,votes,note\n"He said ""hi"", then left",3,\n'
    );
    expect(readCsv(file)).toEqual({
      columns: ["title", "votes", "note"],
      rows: [{ title: 'He said "hi", then left', votes: "3", note: "" }],
    });
  });

  it("pretty-prints json", () => {
    const file = path.join(dir, "a.json");
    writeJson(file, [{ a: 1 }]);
    expect(fs.readFileSync(file, "utf-8")).toBe('[\n  {\n    "a": 1\n  }\n]\n');
    expect(readJson(file)).toEqual([{ a: 1 }]);
  });
});
