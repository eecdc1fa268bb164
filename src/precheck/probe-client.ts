import type { DbRegistry } from "../db.js";
import { formatError } from "../util/error-format.js";
import { isSafeIdentifier } from "./databases.js";
import { ProbeError } from "./errors.js";
import { PROBES, probeArity, type ProbeId } from "./probes.js";
import type { ProbeClient, ProbeRow } from "./types.js";

const SETTING_NAME_RE = /^[a-z][a-z0-9_.]*$/;

export type PostgresProbeClientOptions = {
  adminDatabase: string;
};

function firstColumn(row: ProbeRow | undefined): string | null {
  if (!row) return null;
  const key = Object.keys(row)[0];
  if (key === undefined) return null;
  const v = row[key];
  if (v === null || v === undefined) return null;
  return v instanceof Date ? v.toISOString() : String(v);
}

function assertSafe(database: string, probeId: string, params: readonly string[]): void {
  if (!isSafeIdentifier(database)) {
    throw new ProbeError("unsafe_identifier", `refusing to probe database with unsafe name '${database}'`, {
      database,
      probeId,
    });
  }
  for (const p of params) {
    if (!isSafeIdentifier(p)) {
      throw new ProbeError("unsafe_identifier", `refusing unsafe probe parameter '${p}'`, { database, probeId });
    }
  }
}

export function createPostgresProbeClient(registry: DbRegistry, opts: PostgresProbeClientOptions): ProbeClient {
  const run = async (database: string, probeId: ProbeId, params: readonly string[]): Promise<ProbeRow[]> => {
    assertSafe(database, probeId, params);
    const arity = probeArity(probeId);
    if (params.length !== arity) {
      throw new ProbeError("probe_failed", `probe ${probeId} expects ${arity} parameter(s), got ${params.length}`, {
        database,
        probeId,
      });
    }
    try {
      return await registry.query(database, PROBES[probeId], params);
    } catch (err) {
      throw new ProbeError("probe_failed", `${probeId} on ${database}: ${formatError(err)}`, {
        database,
        probeId,
        cause: err,
      });
    }
  };

  return {
    async rowsQuery(database, probeId, params = []) {
      return run(database, probeId, params);
    },

    async scalarQuery(database, probeId, params = []) {
      const rows = await run(database, probeId, params);
      return firstColumn(rows[0]);
    },

    async listDatabases() {
      const rows = await run(opts.adminDatabase, "list_databases", []);
      return rows.map((r) => firstColumn(r)).filter((name): name is string => name !== null);
    },

    async showSetting(name) {
      if (!SETTING_NAME_RE.test(name)) {
        throw new ProbeError("unsafe_identifier", `refusing unsafe setting name '${name}'`, {
          database: opts.adminDatabase,
          probeId: "current_setting",
        });
      }
      // current_setting(name, missing_ok => true) returns NULL for parameters this server does not define.
      try {
        const rows = await registry.query(opts.adminDatabase, PROBES.current_setting, [name]);
        return firstColumn(rows[0]);
      } catch (err) {
        throw new ProbeError("probe_failed", `current_setting(${name}): ${formatError(err)}`, {
          database: opts.adminDatabase,
          probeId: "current_setting",
          cause: err,
        });
      }
    },
  };
}
