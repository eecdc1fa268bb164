import type { Logger } from "../logger.js";
import { formatError } from "../util/error-format.js";
import { InflightGate } from "../util/inflight_gate.js";
import { accumulate, openSession, sealSession, type SealedPrecheckSession } from "./aggregator.js";
import { RULE_CATALOG } from "./catalog.js";
import { enumerateDatabases } from "./databases.js";
import { ConnectivityError, InputValidationError } from "./errors.js";
import { executeRule } from "./executor.js";
import type { ProbeClient, Rule, RuleContext, RuleOutcome, VersionContext } from "./types.js";
import { checkApplicability, parseServerVersionNum } from "./version-gate.js";

export type RunPrecheckOptions = {
  sourceVersion: number;
  targetVersion: number;
  blueGreenRequested: boolean;
  probes: ProbeClient;
  catalog?: readonly Rule[];
  concurrency: number;
  probeTimeoutMs: number;
  adminDatabase: string;
  logger: Logger;
  now?: () => Date;
};

export async function detectSourceVersion(probes: ProbeClient): Promise<number> {
  let raw: string | null;
  try {
    raw = await probes.showSetting("server_version_num");
  } catch (err) {
    throw new ConnectivityError(`Could not determine source version: ${formatError(err)}`, { cause: formatError(err) });
  }
  try {
    return parseServerVersionNum(raw);
  } catch (err) {
    if (err instanceof InputValidationError) {
      throw new ConnectivityError(`Could not determine source version: ${err.message}`);
    }
    throw err;
  }
}

async function listDatabaseNames(probes: ProbeClient): Promise<string[]> {
  try {
    return await probes.listDatabases();
  } catch (err) {
    throw new ConnectivityError(`Could not list databases: ${formatError(err)}`, { cause: formatError(err) });
  }
}

/**
 * One full precheck pass. Every applicable rule starts at once and shares one
 * gate, so at most `concurrency` probes are open; outcomes are folded in
 * catalog order once all of them have settled.
 */
export async function runPrecheck(opts: RunPrecheckOptions): Promise<SealedPrecheckSession> {
  const now = opts.now ?? (() => new Date());
  const catalog = opts.catalog ?? RULE_CATALOG;
  const log = opts.logger;

  const { databases, skipped } = enumerateDatabases(await listDatabaseNames(opts.probes));
  for (const d of skipped) {
    if (d.reason === "invalid_identifier") {
      log.warn({ database: d.name }, "skipping database with unsafe name");
    } else {
      log.debug({ database: d.name }, "skipping system database");
    }
  }

  const version: VersionContext = {
    sourceVersion: opts.sourceVersion,
    targetVersion: opts.targetVersion,
    blueGreenRequested: opts.blueGreenRequested,
  };
  const ctx: RuleContext = { ...version, databaseCount: databases.length, adminDatabase: opts.adminDatabase };

  let session = openSession(
    {
      ...version,
      databases,
      skippedDatabases: skipped,
    },
    now(),
  );
  log.info(
    {
      source_version: opts.sourceVersion,
      target_version: opts.targetVersion,
      blue_green: opts.blueGreenRequested,
      databases: databases.length,
      rules: catalog.length,
    },
    "precheck started",
  );

  // Every unit is queued up front; waiting for a slot is not a probe fault, so no queue deadline.
  const gate = new InflightGate({ maxInflight: opts.concurrency, maxQueue: Number.MAX_SAFE_INTEGER });

  const outcomes = await Promise.all(
    catalog.map(async (rule): Promise<RuleOutcome> => {
      const gateResult = checkApplicability(rule, version);
      if (!gateResult.applicable) {
        return { ruleId: rule.id, applicable: false, skipReason: gateResult.reason, findings: [], probeErrors: [] };
      }
      return executeRule(rule, ctx, databases, opts.probes, {
        gate,
        probeTimeoutMs: opts.probeTimeoutMs,
        logger: log,
      });
    }),
  );

  for (const outcome of outcomes) session = accumulate(session, outcome);
  const sealed = sealSession(session, now());

  log.info(
    {
      errors: sealed.errorCount,
      warnings: sealed.warningCount,
      probe_errors: sealed.probeErrorCount,
      gate: gate.stats(),
    },
    "precheck finished",
  );
  return sealed;
}
