import prompts from "prompts";
import { parseCliArgs, promptBlueGreen, promptPassword, type Ask } from "./cli.js";
import type { Env } from "./config.js";
import { createDbRegistry, type DbConnectionOptions, type DbRegistry } from "./db.js";
import type { Logger } from "./logger.js";
import { isPrecheckError } from "./precheck/errors.js";
import { createPostgresProbeClient } from "./precheck/probe-client.js";
import { formatReportText, renderReport, type PrecheckReport } from "./precheck/report.js";
import { detectSourceVersion, runPrecheck } from "./precheck/session.js";
import { assertUpgradePath } from "./precheck/version-gate.js";
import { formatError } from "./util/error-format.js";

export type CliDeps = {
  argv: readonly string[];
  env: Env;
  logger: Logger;
  ask?: Ask;
  openRegistry?: (opts: DbConnectionOptions) => DbRegistry;
  write?: (text: string) => void;
  now?: () => Date;
};

export type CliResult = {
  report: PrecheckReport;
  exitStatus: number;
};

function defaultWrite(text: string): void {
  // eslint-disable-next-line no-console
  console.log(text);
}

/**
 * Validate input, prompt, probe, print. Fatal conditions (bad input, a cancelled
 * prompt, an unreachable server, a downgrade) throw before any report exists.
 */
export async function runCli(deps: CliDeps): Promise<CliResult> {
  const { env, logger } = deps;
  const ask: Ask = deps.ask ?? prompts;
  const args = parseCliArgs(deps.argv);

  const password = await promptPassword(args.user, args.host, ask);

  const registry = (deps.openRegistry ?? createDbRegistry)({
    host: args.host,
    port: args.port,
    user: args.user,
    password,
    sslMode: env.PGSSLMODE,
    connectionTimeoutMs: env.PGCONNECT_TIMEOUT * 1000,
    statementTimeoutMs: env.PRECHECK_PROBE_TIMEOUT_MS,
    maxPerDatabase: env.DB_POOL_MAX_PER_DATABASE,
    idleTimeoutMs: env.DB_POOL_IDLE_TIMEOUT_MS,
    logger,
  });

  try {
    const probes = createPostgresProbeClient(registry, { adminDatabase: env.PRECHECK_ADMIN_DATABASE });
    const sourceVersion = await detectSourceVersion(probes);
    logger.info({ host: args.host, port: args.port, source_version: sourceVersion }, "connected");
    assertUpgradePath(sourceVersion, args.targetVersion);

    const blueGreenRequested = await promptBlueGreen(ask);

    const sealed = await runPrecheck({
      sourceVersion,
      targetVersion: args.targetVersion,
      blueGreenRequested,
      probes,
      concurrency: env.PRECHECK_CONCURRENCY,
      probeTimeoutMs: env.PRECHECK_PROBE_TIMEOUT_MS,
      adminDatabase: env.PRECHECK_ADMIN_DATABASE,
      logger,
      now: deps.now,
    });

    const report = renderReport(sealed);
    const write = deps.write ?? defaultWrite;
    write(env.PRECHECK_REPORT_FORMAT === "json" ? JSON.stringify(report, null, 2) : formatReportText(report));
    return { report, exitStatus: report.summary.exitStatus };
  } finally {
    logger.debug({ databases: registry.openDatabases() }, "closing connection pools");
    await registry.closeAll();
  }
}

/** Process exit status for one run; a fatal error is logged once and maps to 1. */
export async function runCliExitStatus(deps: CliDeps): Promise<number> {
  try {
    const { exitStatus } = await runCli(deps);
    return exitStatus;
  } catch (err) {
    if (isPrecheckError(err)) {
      deps.logger.error({ code: err.code, err: err.message }, "precheck aborted");
    } else {
      deps.logger.error({ code: "unexpected", err: formatError(err) }, "precheck aborted");
    }
    return 1;
  }
}
