import { describe, expect, it } from "vitest";
import type { DbRegistry } from "../../db.js";
import { ProbeError } from "../errors.js";
import { createPostgresProbeClient } from "../probe-client.js";
import { PROBES, probeArity } from "../probes.js";
import type { ProbeRow } from "../types.js";

type Sent = { database: string; sql: string; params: readonly unknown[] };

function fakeRegistry(answer: (sent: Sent) => ProbeRow[] | Error = () => []) {
  const sent: Sent[] = [];
  const registry: DbRegistry = {
    async query(database, sql, params = []) {
      const call = { database, sql, params };
      sent.push(call);
      const out = answer(call);
      if (out instanceof Error) throw out;
      return out;
    },
    openDatabases: () => [...new Set(sent.map((s) => s.database))],
    closeAll: async () => undefined,
  };
  return { registry, sent };
}

describe("createPostgresProbeClient", () => {
  it("refuses an unsafe database name before querying", async () => {
    const { registry, sent } = fakeRegistry();
    const probes = createPostgresProbeClient(registry, { adminDatabase: "postgres" });
    const err = await probes.scalarQuery("app'; DROP DATABASE x; --", "prepared_xacts_count").catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ProbeError);
    if (err instanceof ProbeError) expect(err.code).toBe("unsafe_identifier");
    expect(sent).toEqual([]);
  });

  it("refuses an unsafe parameter before querying", async () => {
    const { registry, sent } = fakeRegistry();
    const probes = createPostgresProbeClient(registry, { adminDatabase: "postgres" });
    await expect(probes.rowsQuery("appdb", "extension_version_drift", ["postgis' OR '1'='1"])).rejects.toThrow(
      "refusing unsafe probe parameter 'postgis' OR '1'='1'",
    );
    expect(sent).toEqual([]);
  });

  it("binds parameters instead of splicing them", async () => {
    const { registry, sent } = fakeRegistry(() => [{ extname: "chkpass" }]);
    const probes = createPostgresProbeClient(registry, { adminDatabase: "postgres" });
    await expect(probes.scalarQuery("appdb", "extension_installed", ["chkpass"])).resolves.toBe("chkpass");
    expect(sent).toEqual([{ database: "appdb", sql: PROBES.extension_installed, params: ["chkpass"] }]);
    expect(PROBES.extension_installed).not.toContain("chkpass");
  });

  it("checks the parameter count against the template", async () => {
    const { registry, sent } = fakeRegistry();
    const probes = createPostgresProbeClient(registry, { adminDatabase: "postgres" });
    await expect(probes.scalarQuery("appdb", "extension_installed")).rejects.toThrow(
      "probe extension_installed expects 1 parameter(s), got 0",
    );
    expect(sent).toEqual([]);
  });

  it("returns the first column of the first row as text", async () => {
    const { registry } = fakeRegistry((s) => (s.sql === PROBES.prepared_xacts_count ? [{ n: 3 }] : []));
    const probes = createPostgresProbeClient(registry, { adminDatabase: "postgres" });
    await expect(probes.scalarQuery("appdb", "prepared_xacts_count")).resolves.toBe("3");
    await expect(probes.scalarQuery("appdb", "capture_trigger")).resolves.toBeNull();
  });

  it("wraps driver errors as probe failures", async () => {
    const { registry } = fakeRegistry(() => Object.assign(new Error("relation does not exist"), { code: "42P01" }));
    const probes = createPostgresProbeClient(registry, { adminDatabase: "postgres" });
    const err = await probes.rowsQuery("appdb", "tables_with_oids").catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ProbeError);
    if (err instanceof ProbeError) {
      expect(err.code).toBe("probe_failed");
      expect(err.message).toBe("tables_with_oids on appdb: 42P01: relation does not exist");
      expect(err.database).toBe("appdb");
    }
  });

  it("lists databases on the admin database", async () => {
    const { registry, sent } = fakeRegistry(() => [{ datname: "appdb" }, { datname: null }, { datname: "postgres" }]);
    const probes = createPostgresProbeClient(registry, { adminDatabase: "maintenance" });
    await expect(probes.listDatabases()).resolves.toEqual(["appdb", "postgres"]);
    expect(sent.map((s) => s.database)).toEqual(["maintenance"]);
  });

  it("reads settings through current_setting with missing_ok", async () => {
    const { registry, sent } = fakeRegistry((s) =>
      s.params[0] === "rds.logical_replication" ? [{ value: null }] : [{ value: "130012" }],
    );
    const probes = createPostgresProbeClient(registry, { adminDatabase: "postgres" });
    await expect(probes.showSetting("server_version_num")).resolves.toBe("130012");
    await expect(probes.showSetting("rds.logical_replication")).resolves.toBeNull();
    expect(sent[0]).toEqual({ database: "postgres", sql: PROBES.current_setting, params: ["server_version_num"] });
  });

  it("refuses an unsafe setting name", async () => {
    const { registry, sent } = fakeRegistry();
    const probes = createPostgresProbeClient(registry, { adminDatabase: "postgres" });
    await expect(probes.showSetting("work_mem; RESET ALL")).rejects.toBeInstanceOf(ProbeError);
    expect(sent).toEqual([]);
  });
});

describe("probeArity", () => {
  it("counts distinct placeholders", () => {
    expect(probeArity("prepared_xacts_count")).toBe(0);
    expect(probeArity("extension_version_drift")).toBe(1);
    expect(probeArity("removed_type_columns")).toBe(1);
  });
});
