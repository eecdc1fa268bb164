import { describe, expect, it } from "vitest";
import { findRule } from "../catalog.js";
import { ProbeError } from "../errors.js";
import { cellText, columnList, countProbe, parseCount, presenceProbe } from "../rule-probes.js";
import type { Rule, RuleContext } from "../types.js";
import { fakeProbeClient } from "./fake-probe-client.js";

const ctx: RuleContext = {
  sourceVersion: 11,
  targetVersion: 15,
  blueGreenRequested: false,
  databaseCount: 1,
  adminDatabase: "postgres",
};

function rule(id: string): Rule {
  const r = findRule(id);
  if (!r) throw new Error(`missing rule ${id}`);
  return r;
}

describe("helpers", () => {
  it("parses counts", () => {
    expect(parseCount("12", "appdb", "x")).toBe(12);
    expect(parseCount(null, "appdb", "x")).toBe(0);
    expect(() => parseCount("twelve", "appdb", "x")).toThrow(ProbeError);
  });

  it("renders cells and column lists", () => {
    expect(cellText(null)).toBe("");
    expect(cellText(new Date("2026-01-02T03:04:05.000Z"))).toBe("2026-01-02T03:04:05.000Z");
    expect(cellText({ a: 1 })).toBe('{"a":1}');
    expect(columnList([{ datname: "a" }, { datname: "b" }], "datname")).toBe("a, b");
  });

  it("countProbe fetches evidence only for a non-zero count", async () => {
    const probe = countProbe({ count: "subscription_count", detail: "subscriptions_list", summary: (n) => `${n} subs` });
    const zero = fakeProbeClient();
    await expect(probe({ database: "appdb", target: null }, zero, ctx)).resolves.toEqual([]);
    expect(zero.calls.map((c) => c.probeId)).toEqual(["subscription_count"]);

    const some = fakeProbeClient({
      scalars: { subscription_count: "2" },
      rows: { subscriptions_list: [{ subname: "s1" }, { subname: "s2" }] },
    });
    await expect(probe({ database: "appdb", target: null }, some, ctx)).resolves.toEqual([
      { summary: "2 subs", detailRows: [{ subname: "s1" }, { subname: "s2" }] },
    ]);
  });

  it("presenceProbe ignores blank values", async () => {
    const probe = presenceProbe({ probe: "capture_trigger", summary: (v) => `found ${v}` });
    const blank = fakeProbeClient({ scalars: { capture_trigger: "  " } });
    await expect(probe({ database: "appdb", target: null }, blank, ctx)).resolves.toEqual([]);
  });
});

describe("catalog probes", () => {
  it("A-3 requires both template databases", async () => {
    const probes = fakeProbeClient({ scalars: { template_database_count: "1" } });
    await expect(rule("A-3").probe({ database: null, target: null }, probes, ctx)).resolves.toEqual([
      { summary: "template1 and template0 are invalid (1 of 2 found with datistemplate = true)" },
    ]);
    expect(probes.calls[0]?.database).toBe("postgres");
  });

  it("A-8 names the installed pg_repack version", async () => {
    const probes = fakeProbeClient({ scalars: { "appdb/extension_version/pg_repack": "1.4.7" } });
    await expect(rule("A-8").probe({ database: "appdb", target: null }, probes, ctx)).resolves.toEqual([
      { summary: "pg_repack 1.4.7 installed - must be dropped before upgrade to PG >= 14" },
    ]);
  });

  it("A-9 reports installed and available versions per extension", async () => {
    const drift = [{ name: "postgis", installed_version: "3.1.4", default_version: "3.4.0" }];
    const probes = fakeProbeClient({ rows: { "appdb/extension_version_drift/postgis": drift } });
    await expect(rule("A-9").probe({ database: "appdb", target: "postgis" }, probes, ctx)).resolves.toEqual([
      { summary: "postgis installed: 3.1.4, available: 3.4.0", detailRows: drift },
    ]);
    await expect(rule("A-9").probe({ database: "appdb", target: "rdkit" }, probes, ctx)).resolves.toEqual([]);
  });

  it("E-5 names the removed type it found", async () => {
    const cols = [
      { nspname: "public", relname: "events", attname: "created" },
      { nspname: "public", relname: "events", attname: "span" },
    ];
    const probes = fakeProbeClient({ rows: { "appdb/removed_type_columns/abstime": cols } });
    await expect(rule("E-5").probe({ database: "appdb", target: "abstime" }, probes, ctx)).resolves.toEqual([
      { summary: "Removed data type 'abstime' found in user tables (2 column(s))", detailRows: cols },
    ]);
  });
});
