import { describe, it } from "node:test";
import assert from "node:assert/strict";

import type { InputRow, OutputRecord } from "@rowsift/core";

import { Aggregator } from "../src/aggregator.js";
import { extractRows } from "../src/extract.js";
import { compileRuleSet } from "../src/loader.js";

function record(
  values: [string, string][],
  rules: string[],
  file = "data/a.csv",
  line = 2,
): OutputRecord {
  return { values: new Map(values), rules, source: { file, line } };
}

function row(fields: Record<string, string>, file: string, line: number): InputRow {
  return { fields: new Map(Object.entries(fields)), source: { file, line } };
}

const EMAIL = "[\\w.]+@[\\w.]+";
const PHONE = "\\+?\\d[\\d -]{6,}\\d";

describe("Aggregator", () => {
  it("projects records onto the union schema with empty gaps", () => {
    const agg = new Aggregator();
    agg.add([record([["email", "a@b.test"]], ["email"])]);
    agg.add([record([["phone", "07700 900123"]], ["phone"])]);

    assert.deepEqual(agg.header(), ["email", "phone"]);
    assert.deepEqual(agg.rows(), [
      ["a@b.test", ""],
      ["", "07700 900123"],
    ]);
    assert.equal(agg.size, 2);
  });

  it("keeps arrival order", () => {
    const agg = new Aggregator();
    agg.add([
      record([["n", "3"]], ["n"]),
      record([["n", "1"]], ["n"]),
      record([["n", "2"]], ["n"]),
    ]);
    assert.deepEqual(agg.rows(), [["3"], ["1"], ["2"]]);
  });

  it("has an empty header and no rows before anything is added", () => {
    const agg = new Aggregator();
    assert.deepEqual(agg.header(), []);
    assert.deepEqual(agg.rows(), []);
  });

  it("fills provenance columns", () => {
    const agg = new Aggregator({ ruleField: "_rule", fileField: "_file" });
    agg.add([
      record([["email", "a@b.test"], ["phone", "07700 900123"]], ["email", "phone"], "in/contacts.csv"),
    ]);
    assert.deepEqual(agg.header(), ["_rule", "_file", "email", "phone"]);
    assert.deepEqual(agg.rows(), [["email;phone", "contacts.csv", "a@b.test", "07700 900123"]]);
  });

  it("lists provenance columns in the header even with no records", () => {
    const agg = new Aggregator({ fileField: "_file" });
    assert.deepEqual(agg.header(), ["_file"]);
  });

  it("uses fixed fields and drops others", () => {
    const agg = new Aggregator({ fields: ["phone", "email"] });
    agg.add([record([["email", "a@b.test"], ["zip", "N1"]], ["email", "zip"])]);
    assert.deepEqual(agg.header(), ["phone", "email"]);
    assert.deepEqual(agg.rows(), [["", "a@b.test"]]);
  });

  it("returns a header copy", () => {
    const agg = new Aggregator();
    agg.add([record([["a", "1"]], ["a"])]);
    const header = agg.header();
    header.push("mutated");
    assert.deepEqual(agg.header(), ["a"]);
  });
});

describe("extractRows", () => {
  it("feeds rows through the matcher into the aggregator", async () => {
    const ruleSet = compileRuleSet({ email: { field: "contact", pattern: EMAIL } });
    const agg = new Aggregator();
    const stats = await extractRows(
      [
        row({ contact: "reach me at a.b@example.com" }, "a.csv", 2),
        row({ contact: "no email" }, "a.csv", 3),
        row({ contact: "c@d.test" }, "a.csv", 4),
      ],
      ruleSet,
      agg,
    );

    assert.deepEqual(stats, { rows: 3, matchedRows: 2, records: 2, droppedRows: 0 });
    assert.deepEqual(agg.header(), ["email"]);
    assert.deepEqual(agg.rows(), [["a.b@example.com"], ["c@d.test"]]);
  });

  it("consumes async iterables", async () => {
    const ruleSet = compileRuleSet({ email: { field: "contact", pattern: EMAIL } });
    async function* rows(): AsyncGenerator<InputRow> {
      yield row({ contact: "x@y.test" }, "b.csv", 2);
    }
    const agg = new Aggregator();
    const stats = await extractRows(rows(), ruleSet, agg);
    assert.equal(stats.records, 1);
    assert.deepEqual(agg.rows(), [["x@y.test"]]);
  });

  it("reports rows and matches to hooks", async () => {
    const ruleSet = compileRuleSet({ email: { field: "contact", pattern: EMAIL } });
    const seen: number[] = [];
    const matched: string[] = [];
    await extractRows(
      [row({ contact: "none" }, "a.csv", 2), row({ contact: "e@f.test" }, "a.csv", 3)],
      ruleSet,
      new Aggregator(),
      {
        onRow: (r) => seen.push(r.source.line),
        onMatch: (r, records) => matched.push(`${r.source.line}:${records.length}`),
      },
    );
    assert.deepEqual(seen, [2, 3]);
    assert.deepEqual(matched, ["3:1"]);
  });

  it("counts and reports rows discarded by a drop-row rule", async () => {
    const ruleSet = compileRuleSet([
      { name: "email", field: "contact", pattern: EMAIL },
      { name: "internal", field: "contact", pattern: "@example\\.test", action: "drop-row" },
    ]);
    const agg = new Aggregator();
    const dropped: string[] = [];
    const stats = await extractRows(
      [row({ contact: "ops@example.test" }, "a.csv", 2), row({ contact: "a@b.test" }, "a.csv", 3)],
      ruleSet,
      agg,
      { onDrop: (r, rule) => dropped.push(`${r.source.line}:${rule}`) },
    );
    assert.deepEqual(stats, { rows: 2, matchedRows: 1, records: 1, droppedRows: 1 });
    assert.deepEqual(dropped, ["2:internal"]);
    assert.deepEqual(agg.header(), ["email"]);
    assert.deepEqual(agg.rows(), [["a@b.test"]]);
  });

  it("separate policy yields one output row per firing rule", async () => {
    const ruleSet = compileRuleSet({
      email: { field: "contact", pattern: EMAIL },
      phone: { field: "contact", pattern: PHONE },
    });
    const agg = new Aggregator();
    await extractRows([row({ contact: "a@b.test, 07700 900123" }, "a.csv", 2)], ruleSet, agg);
    assert.deepEqual(agg.header(), ["email", "phone"]);
    assert.deepEqual(agg.rows(), [
      ["a@b.test", ""],
      ["", "07700 900123"],
    ]);
  });

  it("combined policy yields one output row per input row", async () => {
    const ruleSet = compileRuleSet(
      {
        email: { field: "contact", pattern: EMAIL },
        phone: { field: "contact", pattern: PHONE },
      },
      { defaultMergePolicy: "combined" },
    );
    const agg = new Aggregator();
    await extractRows([row({ contact: "a@b.test, 07700 900123" }, "a.csv", 2)], ruleSet, agg);
    assert.deepEqual(agg.header(), ["email", "phone"]);
    assert.deepEqual(agg.rows(), [["a@b.test", "07700 900123"]]);
  });

  it("reconciles non-overlapping headers across files", async () => {
    const ruleSet = compileRuleSet({
      email: { field: "contact", pattern: EMAIL },
      sku: { field: "item", pattern: "SKU-(\\d+)" },
    });
    const agg = new Aggregator({ fileField: "_file" });

    // File B's rows have no "contact" column, file A's have no "item" column.
    await extractRows(
      [row({ item: "SKU-77 widget" }, "dir/b.csv", 2)],
      ruleSet,
      agg,
    );
    await extractRows(
      [row({ contact: "a@b.test" }, "dir/a.csv", 2), row({ contact: "none" }, "dir/a.csv", 3)],
      ruleSet,
      agg,
    );

    assert.deepEqual(agg.header(), ["_file", "sku", "email"]);
    assert.deepEqual(agg.rows(), [
      ["b.csv", "77", ""],
      ["a.csv", "", "a@b.test"],
    ]);
  });
});
