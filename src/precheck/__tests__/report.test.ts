import { describe, expect, it } from "vitest";
import { accumulate, openSession, sealSession, type SealedPrecheckSession } from "../aggregator.js";
import { exitStatusFor, formatReportText, renderReport } from "../report.js";
import type { RuleOutcome } from "../types.js";

const OUTCOMES: RuleOutcome[] = [
  {
    ruleId: "A-1",
    applicable: true,
    scopeUnits: 1,
    findings: [
      {
        ruleId: "A-1",
        databaseName: null,
        target: null,
        severity: "error",
        summary: "Uncommitted prepared transactions exist (2)",
        detailRows: [{ gid: "tx-1", database: "appdb" }],
      },
    ],
    probeErrors: [],
  },
  { ruleId: "A-2", applicable: true, scopeUnits: 1, findings: [], probeErrors: [] },
  {
    ruleId: "A-9",
    applicable: true,
    scopeUnits: 8,
    findings: [
      {
        ruleId: "A-9",
        databaseName: "appdb",
        target: "postgis",
        severity: "warning",
        summary: "[appdb] postgis installed: 3.1.4, available: 3.4.0",
        detailRows: [],
      },
    ],
    probeErrors: [],
  },
  {
    ruleId: "E-1",
    applicable: true,
    scopeUnits: 1,
    findings: [],
    probeErrors: [
      {
        ruleId: "E-1",
        databaseName: "appdb",
        target: null,
        code: "probe_timeout",
        message: "E-1 probe timed out after 50ms",
      },
    ],
  },
  { ruleId: "E-4", applicable: false, skipReason: "source version > 11", findings: [], probeErrors: [] },
];

function sealed(opts: { start: string; end: string; outcomes?: RuleOutcome[]; blueGreen?: boolean }): SealedPrecheckSession {
  let s = openSession(
    {
      sourceVersion: 13,
      targetVersion: 16,
      blueGreenRequested: opts.blueGreen ?? false,
      databases: ["appdb"],
      skippedDatabases: [
        { name: "bad;name", reason: "invalid_identifier" },
        { name: "rdsadmin", reason: "system_database" },
      ],
    },
    new Date(opts.start),
  );
  for (const o of opts.outcomes ?? OUTCOMES) s = accumulate(s, o);
  return sealSession(s, new Date(opts.end));
}

describe("exitStatusFor", () => {
  it("clamps to 0..255", () => {
    expect([0, 1, 3, 255, 256, 1000, -4].map(exitStatusFor)).toEqual([0, 1, 3, 255, 255, 255, 0]);
  });
});

describe("renderReport", () => {
  const report = renderReport(sealed({ start: "2026-01-05T10:00:00.000Z", end: "2026-01-05T10:00:09.000Z" }));

  it("groups entries by section in catalog order", () => {
    expect(report.sections.map((s) => [s.section, s.rules.map((r) => `${r.id}:${r.status}`)])).toEqual([
      ["precheck_aurora_rds", ["A-1:failed", "A-2:ok", "A-9:warned"]],
      ["engine_internal", ["E-1:unverified", "E-4:skipped"]],
      ["blue_green", []],
    ]);
  });

  it("attaches remediation only to failed and warned rules", () => {
    const [aurora] = report.sections;
    expect(aurora?.rules.map((r) => r.remediation !== null)).toEqual([true, false, true]);
    expect(aurora?.rules[0]?.remediation).toBe("Please commit or rollback all prepared transactions and try again.");
  });

  it("summarises counts, ids and verdict", () => {
    expect(report.summary).toMatchObject({
      sourceVersion: 13,
      targetVersion: 16,
      deploymentMode: "in_place",
      databaseCount: 1,
      startedAt: "2026-01-05T10:00:00.000Z",
      finishedAt: "2026-01-05T10:00:09.000Z",
      errorCount: 1,
      warningCount: 1,
      probeErrorCount: 1,
      failedRuleIds: ["A-1"],
      warnedRuleIds: ["A-9"],
      unverifiedRuleIds: ["E-1"],
      verdict: "failed",
      exitStatus: 1,
    });
    expect(report.summary.headlines).toEqual([
      "1 error(s) in 1 check(s)",
      "1 warning(s) in 1 check(s)",
      "could not verify 1 check(s)",
    ]);
  });

  it("notes skipped databases and checks that could not be verified", () => {
    expect(report.notes).toEqual([
      { level: "warning", message: "Database 'bad;name' skipped: name is not a safe identifier and was never probed" },
      { level: "info", message: "Database 'rdsadmin' skipped: system database" },
      { level: "warning", message: "Check E-1 could not be verified: 1 probe error(s)" },
    ]);
  });

  it("asks for review when only probes failed", () => {
    const r = renderReport(
      sealed({
        start: "2026-01-05T10:00:00.000Z",
        end: "2026-01-05T10:00:01.000Z",
        outcomes: OUTCOMES.filter((o) => o.ruleId === "E-1"),
      }),
    );
    expect(r.summary.verdict).toBe("review");
    expect(r.summary.exitStatus).toBe(0);
  });

  it("passes a clean run", () => {
    const r = renderReport(
      sealed({ start: "2026-01-05T10:00:00.000Z", end: "2026-01-05T10:00:01.000Z", outcomes: [] }),
    );
    expect(r.summary.verdict).toBe("passed");
  });
});

describe("fingerprint", () => {
  it("ignores timestamps", () => {
    const a = renderReport(sealed({ start: "2026-01-05T10:00:00.000Z", end: "2026-01-05T10:00:09.000Z" }));
    const b = renderReport(sealed({ start: "2026-02-11T23:15:00.000Z", end: "2026-02-11T23:16:42.000Z" }));
    expect(a.fingerprint).toMatch(/^[0-9a-f]{64}$/);
    expect(b.fingerprint).toBe(a.fingerprint);
  });

  it("changes with the findings", () => {
    const a = renderReport(sealed({ start: "2026-01-05T10:00:00.000Z", end: "2026-01-05T10:00:09.000Z" }));
    const b = renderReport(
      sealed({
        start: "2026-01-05T10:00:00.000Z",
        end: "2026-01-05T10:00:09.000Z",
        outcomes: OUTCOMES.filter((o) => o.ruleId !== "A-9"),
      }),
    );
    expect(b.fingerprint).not.toBe(a.fingerprint);
  });

  it("changes with the deployment mode", () => {
    const a = renderReport(sealed({ start: "2026-01-05T10:00:00.000Z", end: "2026-01-05T10:00:09.000Z" }));
    const b = renderReport(
      sealed({ start: "2026-01-05T10:00:00.000Z", end: "2026-01-05T10:00:09.000Z", blueGreen: true }),
    );
    expect(b.fingerprint).not.toBe(a.fingerprint);
  });
});

describe("formatReportText", () => {
  const report = renderReport(sealed({ start: "2026-01-05T10:00:00.000Z", end: "2026-01-05T10:00:09.000Z" }));
  const lines = formatReportText(report).split("\n");

  it("renders section banners and rule headers", () => {
    expect(lines.slice(0, 5)).toEqual([
      "=".repeat(72),
      "SECTION 1: Aurora/RDS Precheck (pg_upgrade_precheck.log)",
      "=".repeat(72),
      "",
      "=== A-1. check_for_prepared_transactions ===",
    ]);
    expect(lines).toContain("SECTION 3: Blue/Green Deployment Checks");
  });

  it("renders each status", () => {
    const a1 = lines.indexOf("=== A-1. check_for_prepared_transactions ===");
    expect(lines.slice(a1, a1 + 4)).toEqual([
      "=== A-1. check_for_prepared_transactions ===",
      "❌ ERROR: Uncommitted prepared transactions exist (2)",
      "    gid: tx-1 | database: appdb",
      "  Remediation: Please commit or rollback all prepared transactions and try again.",
    ]);
    const a2 = lines.indexOf("=== A-2. check_database_not_allow_connect ===");
    expect(lines[a2 + 1]).toBe("✓ OK");
    expect(lines).toContain("⚠️ WARN: [appdb] postgis installed: 3.1.4, available: 3.4.0");
    expect(lines).toContain("? UNVERIFIED: [appdb] probe_timeout: E-1 probe timed out after 50ms");
    const e4 = lines.indexOf("=== E-4. Checking for invalid sql_identifier user columns ===");
    expect(lines[e4 + 1]).toBe("Skipped (source version > 11)");
  });

  it("ends with the summary block", () => {
    expect(lines).toContain("Failed checks:     A-1");
    expect(lines).toContain("Unverified checks: E-1");
    expect(lines).toContain("Deployment mode:   in-place");
    expect(lines).toContain("could not verify 1 check(s)");
    expect(lines).toContain("Verdict: FAILED");
    expect(lines).toContain("  ⚠️ Check E-1 could not be verified: 1 probe error(s)");
    expect(lines[lines.length - 1]).toBe(`Fingerprint: ${report.fingerprint}`);
  });
});
