import type { Logger } from "../logger.js";
import { formatError } from "../util/error-format.js";
import { InflightGateError, type InflightGate } from "../util/inflight_gate.js";
import { ProbeError } from "./errors.js";
import type {
  ExecutedRuleOutcome,
  Finding,
  ProbeClient,
  ProbeFailure,
  ProbeFailureCode,
  ProbeSignal,
  Rule,
  RuleContext,
  ScopeUnit,
} from "./types.js";

export type ExecutorOptions = {
  gate: InflightGate;
  probeTimeoutMs: number;
  logger: Logger;
};

type UnitResult = { unit: ScopeUnit; ok: true; signals: ProbeSignal[] } | { unit: ScopeUnit; ok: false; failure: ProbeFailure };

export function scopeUnits(rule: Rule, databases: readonly string[]): ScopeUnit[] {
  switch (rule.scope) {
    case "cluster":
      return [{ database: null, target: null }];
    case "per_database":
      return databases.map((database) => ({ database, target: null }));
    case "per_database_per_target":
      return databases.flatMap((database) => rule.targets.map((target) => ({ database, target })));
  }
}

function withDeadline<T>(work: Promise<T>, ms: number, onTimeout: () => Error): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => reject(onTimeout()), ms);
    work.then(
      (v) => {
        clearTimeout(timer);
        resolve(v);
      },
      (err: unknown) => {
        clearTimeout(timer);
        reject(err);
      },
    );
  });
}

function failureCode(err: unknown): ProbeFailureCode {
  if (err instanceof ProbeError) return err.code;
  if (err instanceof InflightGateError) return err.code;
  return "probe_failed";
}

function failureMessage(err: unknown): string {
  if (err instanceof ProbeError || err instanceof InflightGateError) return err.message;
  return formatError(err);
}

function unitLabel(unit: ScopeUnit): string {
  if (unit.database === null) return "";
  return `[${unit.database}] `;
}

function toFinding(rule: Rule, unit: ScopeUnit, signal: ProbeSignal): Finding {
  return {
    ruleId: rule.id,
    databaseName: unit.database,
    target: unit.target,
    severity: signal.severity ?? rule.defaultSeverity,
    summary: `${unitLabel(unit)}${signal.summary}`,
    detailRows: signal.detailRows ?? [],
  };
}

async function runUnit(
  rule: Rule,
  unit: ScopeUnit,
  ctx: RuleContext,
  probes: ProbeClient,
  opts: ExecutorOptions,
): Promise<UnitResult> {
  try {
    const token = await opts.gate.acquire();
    const controller = new AbortController();
    const work = Promise.resolve().then(() => rule.probe(unit, probes, ctx, controller.signal));
    // The slot stays taken until the probe itself settles, even past the deadline.
    void work.then(token.release, token.release);
    const signals = await withDeadline(work, opts.probeTimeoutMs, () => {
      const err = new ProbeError("probe_timeout", `${rule.id} probe timed out after ${opts.probeTimeoutMs}ms`, {
        database: unit.database,
        probeId: rule.id,
      });
      controller.abort(err);
      return err;
    });
    return { unit, ok: true, signals };
  } catch (err) {
    const failure: ProbeFailure = {
      ruleId: rule.id,
      databaseName: unit.database,
      target: unit.target,
      code: failureCode(err),
      message: failureMessage(err),
    };
    opts.logger.warn({ rule_id: rule.id, database: unit.database, target: unit.target, code: failure.code, err: failure.message }, "probe failed");
    return { unit, ok: false, failure };
  }
}

/**
 * Runs one applicable rule over its whole scope. Units run concurrently behind the
 * shared gate; a failing unit is recorded and never stops its siblings. Results keep
 * unit order (database, then target) whatever order the probes finish in.
 */
export async function executeRule(
  rule: Rule,
  ctx: RuleContext,
  databases: readonly string[],
  probes: ProbeClient,
  opts: ExecutorOptions,
): Promise<ExecutedRuleOutcome> {
  const units = scopeUnits(rule, databases);
  const startedAt = Date.now();
  opts.logger.debug({ rule_id: rule.id, scope: rule.scope, units: units.length }, "rule started");

  const results = await Promise.all(units.map((unit) => runUnit(rule, unit, ctx, probes, opts)));

  const findings: Finding[] = [];
  const probeErrors: ProbeFailure[] = [];
  for (const r of results) {
    if (r.ok) findings.push(...r.signals.map((s) => toFinding(rule, r.unit, s)));
    else probeErrors.push(r.failure);
  }

  opts.logger.debug(
    {
      rule_id: rule.id,
      findings: findings.length,
      probe_errors: probeErrors.length,
      duration_ms: Date.now() - startedAt,
    },
    "rule finished",
  );
  return { ruleId: rule.id, applicable: true, scopeUnits: units.length, findings, probeErrors };
}
