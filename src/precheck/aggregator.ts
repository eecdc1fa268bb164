import type { RuleOutcome, SkippedDatabase } from "./types.js";

export type SessionInit = {
  sourceVersion: number;
  targetVersion: number;
  blueGreenRequested: boolean;
  databases: readonly string[];
  skippedDatabases: readonly SkippedDatabase[];
};

type SessionState = SessionInit & {
  outcomes: readonly RuleOutcome[];
  errorCount: number;
  warningCount: number;
  probeErrorCount: number;
  failedRuleIds: readonly string[];
  warnedRuleIds: readonly string[];
  unverifiedRuleIds: readonly string[];
  startedAt: Date;
};

export type PrecheckSession = SessionState & { state: "open" };

export type SealedPrecheckSession = SessionState & { state: "sealed"; finishedAt: Date };

export class SessionStateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SessionStateError";
  }
}

export function openSession(init: SessionInit, now: Date = new Date()): PrecheckSession {
  return {
    sourceVersion: init.sourceVersion,
    targetVersion: init.targetVersion,
    blueGreenRequested: init.blueGreenRequested,
    databases: Object.freeze([...init.databases]),
    skippedDatabases: Object.freeze([...init.skippedDatabases]),
    outcomes: [],
    errorCount: 0,
    warningCount: 0,
    probeErrorCount: 0,
    failedRuleIds: [],
    warnedRuleIds: [],
    unverifiedRuleIds: [],
    startedAt: now,
    state: "open",
  };
}

function addOnce(ids: readonly string[], id: string, when: boolean): readonly string[] {
  if (!when || ids.includes(id)) return ids;
  return [...ids, id];
}

/**
 * Folds one rule outcome into the session. Returns a new value; the input is
 * left untouched.
 */
export function accumulate(session: PrecheckSession | SealedPrecheckSession, outcome: RuleOutcome): PrecheckSession {
  if (session.state === "sealed") {
    throw new SessionStateError(`cannot accumulate ${outcome.ruleId} into a sealed session`);
  }
  if (session.outcomes.some((o) => o.ruleId === outcome.ruleId)) {
    throw new SessionStateError(`rule ${outcome.ruleId} was already accumulated`);
  }

  const errors = outcome.findings.filter((f) => f.severity === "error").length;
  const warnings = outcome.findings.filter((f) => f.severity === "warning").length;
  const failures = outcome.probeErrors.length;

  return {
    ...session,
    outcomes: [...session.outcomes, outcome],
    errorCount: session.errorCount + errors,
    warningCount: session.warningCount + warnings,
    probeErrorCount: session.probeErrorCount + failures,
    failedRuleIds: addOnce(session.failedRuleIds, outcome.ruleId, errors > 0),
    warnedRuleIds: addOnce(session.warnedRuleIds, outcome.ruleId, warnings > 0),
    unverifiedRuleIds: addOnce(session.unverifiedRuleIds, outcome.ruleId, failures > 0),
  };
}

export function sealSession(session: PrecheckSession | SealedPrecheckSession, now: Date = new Date()): SealedPrecheckSession {
  if (session.state === "sealed") {
    throw new SessionStateError("session is already sealed");
  }
  return Object.freeze({
    ...session,
    outcomes: Object.freeze([...session.outcomes]),
    failedRuleIds: Object.freeze([...session.failedRuleIds]),
    warnedRuleIds: Object.freeze([...session.warnedRuleIds]),
    unverifiedRuleIds: Object.freeze([...session.unverifiedRuleIds]),
    state: "sealed" as const,
    finishedAt: now,
  });
}
