import { describe, it } from "node:test";
import assert from "node:assert/strict";

import type { InputRow, OutputRecord } from "@rowsift/core";

import { compileRuleSet } from "../src/loader.js";
import { evaluateRow, matchRow, matchRule } from "../src/matcher.js";

function row(fields: Record<string, string>, line = 2): InputRow {
  return { fields: new Map(Object.entries(fields)), source: { file: "in.csv", line } };
}

/** Records as plain objects, for deepEqual. */
function plain(records: OutputRecord[]): { values: Record<string, string>; rules: string[] }[] {
  return records.map((r) => ({
    values: Object.fromEntries(r.values),
    rules: [...r.rules],
  }));
}

const EMAIL = "[\\w.]+@[\\w.]+";
const PHONE = "\\+?\\d[\\d -]{6,}\\d";

describe("matchRule", () => {
  it("extracts the matching substring (search semantics)", () => {
    const rule = compileRuleSet({ email: { field: "contact", pattern: EMAIL } }).rules[0];
    assert.equal(matchRule(row({ contact: "reach me at a.b@example.com" }), rule), "a.b@example.com");
  });

  it("returns null when the pattern does not match", () => {
    const rule = compileRuleSet({ email: { field: "contact", pattern: EMAIL } }).rules[0];
    assert.equal(matchRule(row({ contact: "no address here" }), rule), null);
  });

  it("does not fire when the source field is absent", () => {
    const rule = compileRuleSet({ email: { field: "contact", pattern: EMAIL } }).rules[0];
    assert.equal(matchRule(row({ other: "a.b@example.com" }), rule), null);
  });

  it("emits the first capture group by default", () => {
    const rule = compileRuleSet({ id: { field: "ref", pattern: "ORD-(\\d+)" } }).rules[0];
    assert.equal(matchRule(row({ ref: "see ORD-1234 today" }), rule), "1234");
  });

  it("emits the full match with capture: match", () => {
    const rule = compileRuleSet({
      id: { field: "ref", pattern: "ORD-(\\d+)", capture: "match" },
    }).rules[0];
    assert.equal(matchRule(row({ ref: "see ORD-1234 today" }), rule), "ORD-1234");
  });

  it("emits an empty string when the first group did not take part", () => {
    const rule = compileRuleSet({ v: { field: "x", pattern: "(pre)?fix" } }).rules[0];
    assert.equal(matchRule(row({ x: "suffix" }), rule), "");
  });

  it("matches case-insensitively unless caseSensitive is set", () => {
    const loose = compileRuleSet({ v: { field: "x", pattern: "urgent" } }).rules[0];
    const strict = compileRuleSet({
      v: { field: "x", pattern: "urgent", caseSensitive: true },
    }).rules[0];
    assert.equal(matchRule(row({ x: "URGENT: call" }), loose), "URGENT");
    assert.equal(matchRule(row({ x: "URGENT: call" }), strict), null);
  });

  it("tries listed fields in order and the first match wins", () => {
    const rule = compileRuleSet({
      phone: { field: ["mobile", "landline"], pattern: PHONE },
    }).rules[0];
    assert.equal(
      matchRule(row({ landline: "020 7946 0000", mobile: "07700 900123" }), rule),
      "07700 900123",
    );
    assert.equal(
      matchRule(row({ landline: "020 7946 0000", mobile: "none" }), rule),
      "020 7946 0000",
    );
  });

  it("tries every field in header order for '*'", () => {
    const rule = compileRuleSet({ email: { field: "*", pattern: EMAIL } }).rules[0];
    const r = row({ a: "nothing", b: "x@one.test", c: "y@two.test" });
    assert.equal(matchRule(r, rule), "x@one.test");
  });

  it("matches the same value on repeated calls", () => {
    const rule = compileRuleSet({ email: { field: "contact", pattern: EMAIL } }).rules[0];
    const r = row({ contact: "a@b.test" });
    assert.equal(matchRule(r, rule), "a@b.test");
    assert.equal(matchRule(r, rule), "a@b.test");
  });
});

describe("matchRule conditions", () => {
  const rule = compileRuleSet({
    phone: {
      field: "phone",
      pattern: PHONE,
      match: [
        { field: "country", pattern: "^uk$" },
        { field: ["status", "state"], pattern: "active" },
      ],
    },
  }).rules[0];

  it("fires when the pattern and every condition match", () => {
    const r = row({ phone: "07700 900123", country: "UK", state: "active" });
    assert.equal(matchRule(r, rule), "07700 900123");
  });

  it("does not fire when one condition fails", () => {
    assert.equal(matchRule(row({ phone: "07700 900123", country: "fr", status: "active" }), rule), null);
  });

  it("does not fire when a condition's column is absent", () => {
    assert.equal(matchRule(row({ phone: "07700 900123", status: "active" }), rule), null);
  });

  it("emits the value from the rule's own pattern, not a condition's", () => {
    const tagged = compileRuleSet({
      ref: { field: "ref", pattern: "ORD-(\\d+)", match: [{ field: "note", pattern: "(paid)" }] },
    }).rules[0];
    assert.equal(matchRule(row({ ref: "ORD-77", note: "paid" }), tagged), "77");
  });
});

describe("evaluateRow", () => {
  const ruleSet = compileRuleSet([
    { name: "email", field: "contact", pattern: EMAIL },
    { name: "internal", field: "*", pattern: "@example\\.test", action: "drop-row" },
    { name: "phone", field: "contact", pattern: PHONE },
  ]);

  it("drops every record of a row a drop-row rule fires on", () => {
    const result = evaluateRow(row({ contact: "ops@example.test, 07700 900123" }), ruleSet);
    assert.deepEqual(result, { records: [], droppedBy: "internal" });
  });

  it("keeps the row when the drop-row rule does not fire", () => {
    const result = evaluateRow(row({ contact: "a@b.test, 07700 900123" }), ruleSet);
    assert.equal(result.droppedBy, null);
    assert.deepEqual(plain(result.records), [
      { values: { email: "a@b.test" }, rules: ["email"] },
      { values: { phone: "07700 900123" }, rules: ["phone"] },
    ]);
  });

  it("matchRow returns no records for a dropped row", () => {
    assert.deepEqual(matchRow(row({ contact: "ops@example.test" }), ruleSet), []);
  });
});

describe("matchRow", () => {
  it("produces the email record", () => {
    const ruleSet = compileRuleSet({ email: { field: "contact", pattern: EMAIL } });
    const records = matchRow(row({ contact: "reach me at a.b@example.com" }, 5), ruleSet);
    assert.deepEqual(plain(records), [{ values: { email: "a.b@example.com" }, rules: ["email"] }]);
    assert.deepEqual(records[0].source, { file: "in.csv", line: 5 });
  });

  it("returns nothing for a row matching no rule", () => {
    const ruleSet = compileRuleSet({ email: { field: "contact", pattern: EMAIL } });
    assert.deepEqual(matchRow(row({ contact: "nope" }), ruleSet), []);
  });

  it("returns nothing when the source field is absent", () => {
    const ruleSet = compileRuleSet({ email: { field: "contact", pattern: EMAIL } });
    assert.deepEqual(matchRow(row({ name: "a.b@example.com" }), ruleSet), []);
  });

  it("emits one record per firing rule with separate (default)", () => {
    const ruleSet = compileRuleSet({
      email: { field: "contact", pattern: EMAIL },
      phone: { field: "contact", pattern: PHONE },
    });
    const records = matchRow(row({ contact: "a@b.test or +44 7700 900123" }), ruleSet);
    assert.deepEqual(plain(records), [
      { values: { email: "a@b.test" }, rules: ["email"] },
      { values: { phone: "+44 7700 900123" }, rules: ["phone"] },
    ]);
  });

  it("merges firing rules into one record with combined", () => {
    const ruleSet = compileRuleSet({
      email: { field: "contact", pattern: EMAIL, mergePolicy: "combined" },
      phone: { field: "contact", pattern: PHONE, mergePolicy: "combined" },
    });
    const records = matchRow(row({ contact: "a@b.test or +44 7700 900123" }), ruleSet);
    assert.deepEqual(plain(records), [
      { values: { email: "a@b.test", phone: "+44 7700 900123" }, rules: ["email", "phone"] },
    ]);
  });

  it("places the combined record where its first rule fired", () => {
    const ruleSet = compileRuleSet({
      name: { field: "who", pattern: "\\w+", mergePolicy: "separate" },
      email: { field: "contact", pattern: EMAIL, mergePolicy: "combined" },
      tag: { field: "note", pattern: "#(\\w+)", mergePolicy: "separate" },
      phone: { field: "contact", pattern: PHONE, mergePolicy: "combined" },
    });
    const records = matchRow(
      row({ who: "Ada", contact: "a@b.test / 07700 900123", note: "#vip" }),
      ruleSet,
    );
    assert.deepEqual(plain(records), [
      { values: { name: "Ada" }, rules: ["name"] },
      { values: { email: "a@b.test", phone: "07700 900123" }, rules: ["email", "phone"] },
      { values: { tag: "vip" }, rules: ["tag"] },
    ]);
  });

  it("emits a combined record even when only one combined rule fires", () => {
    const ruleSet = compileRuleSet({
      email: { field: "contact", pattern: EMAIL, mergePolicy: "combined" },
      phone: { field: "contact", pattern: PHONE, mergePolicy: "combined" },
    });
    const records = matchRow(row({ contact: "only a@b.test" }), ruleSet);
    assert.deepEqual(plain(records), [{ values: { email: "a@b.test" }, rules: ["email"] }]);
  });

  it("keeps integer-like field names in firing order", () => {
    // List form: an object literal would itself move "2024" to the front.
    const ruleSet = compileRuleSet([
      { name: "note", field: "text", pattern: "\\w+", mergePolicy: "combined" },
      { name: "2024", field: "text", pattern: "\\d+", mergePolicy: "combined" },
    ]);
    const [record] = matchRow(row({ text: "year 2024" }), ruleSet);
    assert.deepEqual([...record.values.keys()], ["note", "2024"]);
  });
});
