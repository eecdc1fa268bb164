import type { ProbeId } from "./probes.js";

export type Severity = "error" | "warning";

export type RuleSection = "precheck_aurora_rds" | "engine_internal" | "blue_green";

export type RuleScope = "cluster" | "per_database" | "per_database_per_target";

export type VersionContext = {
  sourceVersion: number;
  targetVersion: number;
  blueGreenRequested: boolean;
};

export type Applicability = { applicable: true } | { applicable: false; reason: string };

export type VersionPredicate = (v: VersionContext) => Applicability;

export type ProbeRow = Record<string, unknown>;

export interface ProbeClient {
  scalarQuery(database: string, probeId: ProbeId, params?: readonly string[]): Promise<string | null>;
  rowsQuery(database: string, probeId: ProbeId, params?: readonly string[]): Promise<ProbeRow[]>;
  listDatabases(): Promise<string[]>;
  showSetting(name: string): Promise<string | null>;
}

/** One indivisible probe target: the cluster, one database, or a (database, named object) pair. */
export type ScopeUnit = {
  database: string | null;
  target: string | null;
};

export type RuleContext = VersionContext & {
  databaseCount: number;
  adminDatabase: string;
};

/** A non-empty probe result. The executor turns each signal into one finding. */
export type ProbeSignal = {
  summary: string;
  detailRows?: ProbeRow[];
  severity?: Severity;
};

// `signal` fires once the executor has given up on the unit; probes issue no further queries after it.
export type RuleProbe = (
  unit: ScopeUnit,
  probes: ProbeClient,
  ctx: RuleContext,
  signal?: AbortSignal,
) => Promise<ProbeSignal[]>;

type RuleBase = {
  readonly id: string;
  readonly title: string;
  readonly section: RuleSection;
  readonly applicability: VersionPredicate;
  readonly defaultSeverity: Severity;
  readonly probe: RuleProbe;
  readonly remediation: string;
};

export type Rule =
  | (RuleBase & { readonly scope: "cluster" | "per_database" })
  | (RuleBase & { readonly scope: "per_database_per_target"; readonly targets: readonly string[] });

export type Finding = {
  ruleId: string;
  databaseName: string | null;
  target: string | null;
  severity: Severity;
  summary: string;
  detailRows: ProbeRow[];
};

export type ProbeFailureCode = "probe_failed" | "probe_timeout" | "unsafe_identifier" | "queue_full" | "queue_timeout";

export type ProbeFailure = {
  ruleId: string;
  databaseName: string | null;
  target: string | null;
  code: ProbeFailureCode;
  message: string;
};

export type SkippedRuleOutcome = {
  ruleId: string;
  applicable: false;
  skipReason: string;
  findings: [];
  probeErrors: [];
};

export type ExecutedRuleOutcome = {
  ruleId: string;
  applicable: true;
  scopeUnits: number;
  findings: Finding[];
  probeErrors: ProbeFailure[];
};

export type RuleOutcome = SkippedRuleOutcome | ExecutedRuleOutcome;

export type SkippedDatabase = {
  name: string;
  reason: "system_database" | "invalid_identifier";
};
