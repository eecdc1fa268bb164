import { ProbeError } from "./errors.js";
import { countProbe, presenceProbe } from "./rule-probes.js";
import type { ProbeClient, ProbeSignal, Rule } from "./types.js";
import { always } from "./version-gate.js";

export const CAPTURE_TRIGGER_NAME = "dts_capture_catalog_start";

export type ReplicationSettings = {
  maxReplicationSlots: number;
  maxWalSenders: number;
  maxLogicalReplicationWorkers: number;
  maxWorkerProcesses: number;
};

export type CapacityCheck = {
  setting: string;
  actual: number;
  op: ">=" | ">";
  required: number;
  requiredLabel: string;
  pass: boolean;
};

/**
 * Blue/green needs one logical slot and one apply worker per database plus one
 * spare. All four comparisons are always evaluated so a single run surfaces
 * every shortfall.
 */
export function evaluateReplicationCapacity(s: ReplicationSettings, databaseCount: number): CapacityCheck[] {
  const requiredSlots = databaseCount + 1;
  const requiredWorkers = databaseCount + 1;
  return [
    {
      setting: "max_replication_slots",
      actual: s.maxReplicationSlots,
      op: ">=",
      required: requiredSlots,
      requiredLabel: "required",
      pass: s.maxReplicationSlots >= requiredSlots,
    },
    {
      setting: "max_wal_senders",
      actual: s.maxWalSenders,
      op: ">=",
      required: s.maxReplicationSlots,
      requiredLabel: "max_replication_slots",
      pass: s.maxWalSenders >= s.maxReplicationSlots,
    },
    {
      setting: "max_logical_replication_workers",
      actual: s.maxLogicalReplicationWorkers,
      op: ">=",
      required: requiredWorkers,
      requiredLabel: "required",
      pass: s.maxLogicalReplicationWorkers >= requiredWorkers,
    },
    {
      setting: "max_worker_processes",
      actual: s.maxWorkerProcesses,
      op: ">",
      required: s.maxLogicalReplicationWorkers,
      requiredLabel: "max_logical_replication_workers",
      pass: s.maxWorkerProcesses > s.maxLogicalReplicationWorkers,
    },
  ];
}

export function describeShortfall(c: CapacityCheck): string {
  const negated = c.op === ">=" ? "<" : "<=";
  return `${c.setting} (${c.actual}) ${negated} ${c.requiredLabel} (${c.required})`;
}

async function readIntSetting(probes: ProbeClient, name: string): Promise<number> {
  const raw = await probes.showSetting(name);
  const s = (raw ?? "").trim();
  if (!/^[0-9]+$/.test(s)) {
    throw new ProbeError("probe_failed", `setting ${name} is not a non-negative integer (got '${raw ?? "null"}')`, {
      database: null,
      probeId: "current_setting",
    });
  }
  return Number(s);
}

export async function readReplicationSettings(probes: ProbeClient): Promise<ReplicationSettings> {
  return {
    maxReplicationSlots: await readIntSetting(probes, "max_replication_slots"),
    maxWalSenders: await readIntSetting(probes, "max_wal_senders"),
    maxLogicalReplicationWorkers: await readIntSetting(probes, "max_logical_replication_workers"),
    maxWorkerProcesses: await readIntSetting(probes, "max_worker_processes"),
  };
}

export const BLUE_GREEN_RULES: readonly Rule[] = [
  {
    id: "BG-1",
    title: "Logical replication parameters",
    section: "blue_green",
    scope: "cluster",
    applicability: always,
    defaultSeverity: "error",
    remediation:
      "Raise the listed parameters in the DB cluster parameter group (max_replication_slots and max_logical_replication_workers to at least database count + 1) and reboot.",
    probe: async (_unit, probes, ctx) => {
      const settings = await readReplicationSettings(probes);
      return evaluateReplicationCapacity(settings, ctx.databaseCount)
        .filter((c) => !c.pass)
        .map(
          (c): ProbeSignal => ({
            summary: describeShortfall(c),
            detailRows: [{ setting: c.setting, actual: c.actual, required: `${c.op} ${c.required}` }],
          }),
        );
    },
  },
  {
    id: "BG-2",
    title: "Logical replication subscriptions",
    section: "blue_green",
    scope: "per_database",
    applicability: always,
    defaultSeverity: "error",
    remediation: "Please drop the SUBSCRIPTION using: DROP SUBSCRIPTION ...;",
    probe: countProbe({
      count: "subscription_count",
      detail: "subscriptions_list",
      summary: (n) => `${n} subscription(s) exist - must be dropped before Blue/Green upgrade`,
    }),
  },
  {
    id: "BG-3",
    title: "Tables without Primary Key",
    section: "blue_green",
    scope: "per_database",
    applicability: always,
    defaultSeverity: "warning",
    remediation:
      "Tables without a primary key need REPLICA IDENTITY FULL for logical replication: add a primary key or run ALTER TABLE ... REPLICA IDENTITY FULL.",
    probe: countProbe({
      count: "tables_without_pk_count",
      detail: "tables_without_pk_list",
      summary: (n) => `${n} table(s) without Primary Key`,
    }),
  },
  {
    id: "BG-4",
    title: "DDL event triggers",
    section: "blue_green",
    scope: "per_database",
    applicability: always,
    defaultSeverity: "warning",
    remediation:
      "DDL triggers may be triggered during CREATE SUBSCRIPTION on the green instance. Consider disabling the DDL triggers.",
    probe: countProbe({
      count: "ddl_event_trigger_count",
      detail: "ddl_event_triggers_list",
      summary: (n) => `${n} DDL event trigger(s) found - may interfere with Blue/Green deployment`,
    }),
  },
  {
    id: "BG-5",
    title: "rds.logical_replication enabled",
    section: "blue_green",
    scope: "cluster",
    applicability: always,
    defaultSeverity: "error",
    remediation: "Set rds.logical_replication=1 in the DB cluster parameter group and reboot.",
    probe: async (_unit, probes) => {
      const value = await probes.showSetting("rds.logical_replication");
      if (value === "on") return [];
      return [{ summary: `rds.logical_replication is NOT enabled (current: ${value ?? "unknown"})` }];
    },
  },
  {
    id: "BG-6",
    title: "DTS trigger",
    section: "blue_green",
    scope: "per_database",
    applicability: always,
    defaultSeverity: "error",
    remediation: `Drop the event trigger before upgrade: DROP EVENT TRIGGER ${CAPTURE_TRIGGER_NAME};`,
    probe: presenceProbe({
      probe: "capture_trigger",
      summary: () => `DTS trigger '${CAPTURE_TRIGGER_NAME}' found - it will cause Blue/Green deployment to fail`,
    }),
  },
];
