import stableStringify from "fast-json-stable-stringify";
import { sha256Hex } from "../util/crypto.js";
import type { SealedPrecheckSession } from "./aggregator.js";
import { findRule, RULE_CATALOG, SECTION_ORDER, SECTION_TITLES } from "./catalog.js";
import { cellText } from "./rule-probes.js";
import type { Finding, ProbeFailure, ProbeRow, Rule, RuleOutcome, RuleSection } from "./types.js";

export type RuleStatus = "ok" | "skipped" | "failed" | "warned" | "unverified";

export type ReportRuleEntry = {
  id: string;
  title: string;
  status: RuleStatus;
  skipReason: string | null;
  scopeUnits: number;
  findings: Finding[];
  probeErrors: ProbeFailure[];
  remediation: string | null;
};

export type ReportSection = {
  section: RuleSection;
  title: string;
  rules: ReportRuleEntry[];
};

export type ReportNote = {
  level: "info" | "warning";
  message: string;
};

export type Verdict = "passed" | "review" | "failed";

export type ReportSummary = {
  sourceVersion: number;
  targetVersion: number;
  deploymentMode: "in_place" | "blue_green";
  databaseCount: number;
  databases: string[];
  startedAt: string;
  finishedAt: string;
  errorCount: number;
  warningCount: number;
  probeErrorCount: number;
  failedRuleIds: string[];
  warnedRuleIds: string[];
  unverifiedRuleIds: string[];
  headlines: string[];
  verdict: Verdict;
  exitStatus: number;
};

export type PrecheckReport = {
  sections: ReportSection[];
  notes: ReportNote[];
  summary: ReportSummary;
  fingerprint: string;
};

const MAX_EXIT_STATUS = 255;

export function exitStatusFor(errorCount: number): number {
  if (!Number.isFinite(errorCount) || errorCount <= 0) return 0;
  return Math.min(Math.trunc(errorCount), MAX_EXIT_STATUS);
}

function statusOf(outcome: RuleOutcome): RuleStatus {
  if (!outcome.applicable) return "skipped";
  if (outcome.findings.some((f) => f.severity === "error")) return "failed";
  if (outcome.findings.some((f) => f.severity === "warning")) return "warned";
  if (outcome.probeErrors.length > 0) return "unverified";
  return "ok";
}

function entryFor(rule: Rule, outcome: RuleOutcome): ReportRuleEntry {
  const status = statusOf(outcome);
  const needsRemediation = status === "failed" || status === "warned";
  return {
    id: rule.id,
    title: rule.title,
    status,
    skipReason: outcome.applicable ? null : outcome.skipReason,
    scopeUnits: outcome.applicable ? outcome.scopeUnits : 0,
    findings: [...outcome.findings],
    probeErrors: [...outcome.probeErrors],
    remediation: needsRemediation ? rule.remediation : null,
  };
}

function notesFor(session: SealedPrecheckSession): ReportNote[] {
  const databaseNotes = session.skippedDatabases.map((d): ReportNote =>
    d.reason === "system_database"
      ? { level: "info", message: `Database '${d.name}' skipped: system database` }
      : { level: "warning", message: `Database '${d.name}' skipped: name is not a safe identifier and was never probed` },
  );
  const unverifiedNotes = session.outcomes.flatMap((o): ReportNote[] =>
    o.applicable && o.probeErrors.length > 0
      ? [{ level: "warning", message: `Check ${o.ruleId} could not be verified: ${o.probeErrors.length} probe error(s)` }]
      : [],
  );
  return [...databaseNotes, ...unverifiedNotes];
}

export function headlinesFor(s: {
  errorCount: number;
  warningCount: number;
  failedRuleIds: readonly string[];
  warnedRuleIds: readonly string[];
  unverifiedRuleIds: readonly string[];
}): string[] {
  return [
    `${s.errorCount} error(s) in ${s.failedRuleIds.length} check(s)`,
    `${s.warningCount} warning(s) in ${s.warnedRuleIds.length} check(s)`,
    `could not verify ${s.unverifiedRuleIds.length} check(s)`,
  ];
}

export function verdictFor(s: { errorCount: number; warningCount: number; probeErrorCount: number }): Verdict {
  if (s.errorCount > 0) return "failed";
  if (s.warningCount > 0 || s.probeErrorCount > 0) return "review";
  return "passed";
}

/** sha256 over the stable JSON of the report minus its timestamps. */
export function fingerprintOf(report: Omit<PrecheckReport, "fingerprint">): string {
  const { startedAt: _startedAt, finishedAt: _finishedAt, ...summary } = report.summary;
  return sha256Hex(stableStringify({ sections: report.sections, notes: report.notes, summary }));
}

/**
 * Pure projection of a sealed session. Outcomes whose rule is not in `catalog`
 * are a programming error and throw.
 */
export function renderReport(session: SealedPrecheckSession, catalog: readonly Rule[] = RULE_CATALOG): PrecheckReport {
  const bySection = new Map<RuleSection, ReportRuleEntry[]>();
  for (const outcome of session.outcomes) {
    const rule = findRule(outcome.ruleId, catalog);
    if (!rule) throw new Error(`outcome for unknown rule ${outcome.ruleId}`);
    const list = bySection.get(rule.section) ?? [];
    list.push(entryFor(rule, outcome));
    bySection.set(rule.section, list);
  }

  const sections = SECTION_ORDER.map((section) => ({
    section,
    title: SECTION_TITLES[section],
    rules: bySection.get(section) ?? [],
  }));

  const summary: ReportSummary = {
    sourceVersion: session.sourceVersion,
    targetVersion: session.targetVersion,
    deploymentMode: session.blueGreenRequested ? "blue_green" : "in_place",
    databaseCount: session.databases.length,
    databases: [...session.databases],
    startedAt: session.startedAt.toISOString(),
    finishedAt: session.finishedAt.toISOString(),
    errorCount: session.errorCount,
    warningCount: session.warningCount,
    probeErrorCount: session.probeErrorCount,
    failedRuleIds: [...session.failedRuleIds],
    warnedRuleIds: [...session.warnedRuleIds],
    unverifiedRuleIds: [...session.unverifiedRuleIds],
    headlines: headlinesFor(session),
    verdict: verdictFor(session),
    exitStatus: exitStatusFor(session.errorCount),
  };

  const body = { sections, notes: notesFor(session), summary };
  return { ...body, fingerprint: fingerprintOf(body) };
}

const BANNER = "=".repeat(72);

function evidenceLines(rows: ProbeRow[]): string[] {
  return rows.map(
    (row) =>
      `    ${Object.entries(row)
        .map(([k, v]) => `${k}: ${cellText(v)}`)
        .join(" | ")}`,
  );
}

function unitLabel(databaseName: string | null): string {
  return databaseName === null ? "" : `[${databaseName}] `;
}

function ruleLines(entry: ReportRuleEntry): string[] {
  const out = [`=== ${entry.id}. ${entry.title} ===`];
  if (entry.status === "skipped") {
    out.push(`Skipped (${entry.skipReason ?? "not applicable"})`);
    return out;
  }
  if (entry.status === "ok") {
    out.push("✓ OK");
    return out;
  }
  for (const f of entry.findings) {
    out.push(f.severity === "error" ? `❌ ERROR: ${f.summary}` : `⚠️ WARN: ${f.summary}`);
    out.push(...evidenceLines(f.detailRows));
  }
  for (const p of entry.probeErrors) {
    out.push(`? UNVERIFIED: ${unitLabel(p.databaseName)}${p.code}: ${p.message}`);
  }
  if (entry.remediation !== null) out.push(`  Remediation: ${entry.remediation}`);
  return out;
}

function idList(ids: readonly string[]): string {
  return ids.length === 0 ? "none" : ids.join(", ");
}

export function formatReportText(report: PrecheckReport): string {
  const lines: string[] = [];
  for (const section of report.sections) {
    lines.push(BANNER, section.title, BANNER, "");
    for (const entry of section.rules) {
      lines.push(...ruleLines(entry), "");
    }
  }

  if (report.notes.length > 0) {
    lines.push("Notes:");
    for (const n of report.notes) lines.push(`  ${n.level === "warning" ? "⚠️" : "-"} ${n.message}`);
    lines.push("");
  }

  const s = report.summary;
  lines.push(
    BANNER,
    "SUMMARY",
    BANNER,
    `Source version:    ${s.sourceVersion}`,
    `Target version:    ${s.targetVersion}`,
    `Deployment mode:   ${s.deploymentMode === "blue_green" ? "Blue/Green" : "in-place"}`,
    `Databases checked: ${s.databaseCount}`,
    `Started:           ${s.startedAt}`,
    `Finished:          ${s.finishedAt}`,
    `Errors:            ${s.errorCount}`,
    `Warnings:          ${s.warningCount}`,
    `Probe errors:      ${s.probeErrorCount}`,
    `Failed checks:     ${idList(s.failedRuleIds)}`,
    `Warned checks:     ${idList(s.warnedRuleIds)}`,
    `Unverified checks: ${idList(s.unverifiedRuleIds)}`,
    "",
    ...s.headlines,
    `Verdict: ${s.verdict.toUpperCase()}`,
    `Fingerprint: ${report.fingerprint}`,
  );
  return lines.join("\n");
}
