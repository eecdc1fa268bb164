import { BLUE_GREEN_RULES } from "./blue-green.js";
import { isSafeIdentifier } from "./databases.js";
import {
  cellText,
  columnList,
  countProbe,
  fixedParams,
  parseCount,
  presenceProbe,
  rowsProbe,
  targetParam,
  unitDatabase,
} from "./rule-probes.js";
import type { ProbeRow, Rule, RuleSection } from "./types.js";
import { allOf, always, sourceAtMost, sourceBelow, targetAtLeast, withReason } from "./version-gate.js";

// Extensions that ship several versions per engine release; a stale installed version blocks pg_upgrade.
export const MULTI_VERSION_EXTENSIONS = [
  "postgis",
  "pgrouting",
  "postgis_raster",
  "postgis_tiger_geocoder",
  "postgis_topology",
  "address_standardizer",
  "address_standardizer_data_us",
  "rdkit",
] as const;

export const REMOVED_DATA_TYPES = ["abstime", "reltime", "tinterval"] as const;

export const SECTION_ORDER: readonly RuleSection[] = ["precheck_aurora_rds", "engine_internal", "blue_green"];

export const SECTION_TITLES: Record<RuleSection, string> = {
  precheck_aurora_rds: "SECTION 1: Aurora/RDS Precheck (pg_upgrade_precheck.log)",
  engine_internal: "SECTION 2: Engine Checks (pg_upgrade_internal.log)",
  blue_green: "SECTION 3: Blue/Green Deployment Checks",
};

const DROP_COLUMNS = "Please drop the problem columns and try again.";

function columnCount(rows: ProbeRow[]): string {
  return `${rows.length} column(s)`;
}

const AURORA_RDS_RULES: readonly Rule[] = [
  {
    id: "A-1",
    title: "check_for_prepared_transactions",
    section: "precheck_aurora_rds",
    scope: "cluster",
    applicability: always,
    defaultSeverity: "error",
    remediation: "Please commit or rollback all prepared transactions and try again.",
    probe: countProbe({
      count: "prepared_xacts_count",
      detail: "prepared_xacts_list",
      summary: (n) => `Uncommitted prepared transactions exist (${n})`,
    }),
  },
  {
    id: "A-2",
    title: "check_database_not_allow_connect",
    section: "precheck_aurora_rds",
    scope: "cluster",
    applicability: always,
    defaultSeverity: "error",
    remediation: "Please ensure all non-template0 databases allow connections and try again.",
    probe: rowsProbe({
      probe: "databases_disallowing_connections",
      summary: (rows) => `Database connection settings error: ${columnList(rows, "datname")} do not allow connections`,
    }),
  },
  {
    id: "A-3",
    title: "check_template_0_and_template1",
    section: "precheck_aurora_rds",
    scope: "cluster",
    applicability: always,
    defaultSeverity: "error",
    remediation: "Make sure that template1 and template0 exist and have datistemplate set to 't'.",
    probe: async (unit, probes, ctx) => {
      const database = unitDatabase(unit, ctx);
      const raw = await probes.scalarQuery(database, "template_database_count");
      const n = parseCount(raw, database, "template_database_count");
      if (n === 2) return [];
      return [{ summary: `template1 and template0 are invalid (${n} of 2 found with datistemplate = true)` }];
    },
  },
  {
    id: "A-4",
    title: "check_for_invalid_database",
    section: "precheck_aurora_rds",
    scope: "cluster",
    applicability: always,
    defaultSeverity: "error",
    remediation:
      "To identify invalid databases, run 'SELECT datname FROM pg_catalog.pg_database WHERE datconnlimit = -2;', remove them with 'DROP DATABASE', and try again.",
    probe: rowsProbe({
      probe: "invalid_databases",
      summary: (rows) => `Invalid database(s) found (datconnlimit = -2): ${columnList(rows, "datname")}`,
    }),
  },
  {
    id: "A-5",
    title: "check_for_replication_slots",
    section: "precheck_aurora_rds",
    scope: "cluster",
    applicability: sourceBelow(17, "source 17+ supports logical slot migration"),
    defaultSeverity: "error",
    remediation: "Please drop all logical replication slots and try again.",
    probe: countProbe({
      count: "replication_slot_count",
      detail: "logical_replication_slots",
      summary: (n) => `${n} replication slot(s) exist - must be dropped before upgrade`,
    }),
  },
  {
    id: "A-6",
    title: "check_chkpass_extension",
    section: "precheck_aurora_rds",
    scope: "per_database",
    applicability: targetAtLeast(11),
    defaultSeverity: "error",
    remediation: "This extension is not supported in the target version. Please drop the extension and try again.",
    probe: presenceProbe({
      probe: "extension_installed",
      params: fixedParams("chkpass"),
      summary: () => "chkpass extension installed - not supported in PG >= 11",
    }),
  },
  {
    id: "A-7",
    title: "check_tsearch2_extension",
    section: "precheck_aurora_rds",
    scope: "per_database",
    applicability: targetAtLeast(11),
    defaultSeverity: "error",
    remediation: "This extension is not supported in the target version. Please drop the extension and try again.",
    probe: presenceProbe({
      probe: "extension_installed",
      params: fixedParams("tsearch2"),
      summary: () => "tsearch2 extension installed - not supported in PG >= 11",
    }),
  },
  {
    id: "A-8",
    title: "check_pg_repack_extension",
    section: "precheck_aurora_rds",
    scope: "per_database",
    applicability: targetAtLeast(14),
    defaultSeverity: "error",
    remediation: "Drop the extension and try again.",
    probe: presenceProbe({
      probe: "extension_version",
      params: fixedParams("pg_repack"),
      summary: (version) => `pg_repack ${version} installed - must be dropped before upgrade to PG >= 14`,
    }),
  },
  {
    id: "A-9",
    title: "check_for_multi_extensions_version",
    section: "precheck_aurora_rds",
    scope: "per_database_per_target",
    targets: MULTI_VERSION_EXTENSIONS,
    applicability: always,
    defaultSeverity: "warning",
    remediation: "You can either drop the extension or upgrade the extension and try the upgrade again.",
    probe: rowsProbe({
      probe: "extension_version_drift",
      params: targetParam,
      summary: (rows, unit) => {
        const r: ProbeRow = rows[0] ?? {};
        const name = cellText(r["name"]) || (unit.target ?? "");
        return `${name} installed: ${cellText(r["installed_version"])}, available: ${cellText(r["default_version"])}`;
      },
    }),
  },
];

const ENGINE_RULES: readonly Rule[] = [
  {
    id: "E-1",
    title: "Checking for system-defined composite types in user tables",
    section: "engine_internal",
    scope: "per_database",
    applicability: always,
    defaultSeverity: "error",
    remediation: `System-defined composite type OIDs are not stable across PostgreSQL versions. ${DROP_COLUMNS}`,
    probe: rowsProbe({
      probe: "system_composite_type_columns",
      summary: (rows) => `System-defined composite types in user tables (${columnCount(rows)})`,
    }),
  },
  {
    id: "E-2",
    title: "Checking for reg* data types in user tables",
    section: "engine_internal",
    scope: "per_database",
    applicability: always,
    defaultSeverity: "error",
    remediation: `The reg* data types reference system OIDs that are not preserved by pg_upgrade. ${DROP_COLUMNS}`,
    probe: rowsProbe({
      probe: "reg_type_columns",
      summary: (rows) => `reg* data types in user tables (${columnCount(rows)})`,
    }),
  },
  {
    id: "E-3",
    title: "Checking for incompatible aclitem data type in user tables",
    section: "engine_internal",
    scope: "per_database",
    applicability: withReason(allOf(sourceAtMost(15), targetAtLeast(16)), "not applicable for this upgrade path"),
    defaultSeverity: "error",
    remediation: `The internal format of "aclitem" changed in PostgreSQL version 16. ${DROP_COLUMNS}`,
    probe: rowsProbe({
      probe: "aclitem_columns",
      summary: (rows) => `'aclitem' data type found - format changed in PG 16 (${columnCount(rows)})`,
    }),
  },
  {
    id: "E-4",
    title: "Checking for invalid sql_identifier user columns",
    section: "engine_internal",
    scope: "per_database",
    applicability: sourceAtMost(11),
    defaultSeverity: "error",
    remediation: `The on-disk format of "sql_identifier" changed in PostgreSQL version 12. ${DROP_COLUMNS}`,
    probe: rowsProbe({
      probe: "sql_identifier_columns",
      summary: (rows) => `'sql_identifier' data type found - format changed in PG 12 (${columnCount(rows)})`,
    }),
  },
  {
    id: "E-5",
    title: "Checking for removed abstime & reltime & tinterval data type in user tables",
    section: "engine_internal",
    scope: "per_database_per_target",
    targets: REMOVED_DATA_TYPES,
    applicability: sourceAtMost(11),
    defaultSeverity: "error",
    remediation:
      "These types were removed in PostgreSQL version 12. Please drop the problem columns, or change them to another data type, and try again.",
    probe: rowsProbe({
      probe: "removed_type_columns",
      params: targetParam,
      summary: (rows, unit) => `Removed data type '${unit.target ?? ""}' found in user tables (${columnCount(rows)})`,
    }),
  },
  {
    id: "E-6",
    title: "Checking for user-defined encoding conversions",
    section: "engine_internal",
    scope: "per_database",
    applicability: sourceAtMost(13),
    defaultSeverity: "error",
    remediation:
      "The conversion function parameters changed in PostgreSQL version 14. Please remove the encoding conversions and try again.",
    probe: rowsProbe({
      probe: "user_encoding_conversions",
      summary: (rows) => `User-defined encoding conversions found: ${columnList(rows, "conname")}`,
    }),
  },
  {
    id: "E-7",
    title: "Checking for user-defined postfix operators",
    section: "engine_internal",
    scope: "per_database",
    applicability: sourceAtMost(13),
    defaultSeverity: "error",
    remediation:
      "Postfix operators are not supported anymore. Consider dropping them and replacing them with prefix operators or function calls.",
    probe: rowsProbe({
      probe: "user_postfix_operators",
      summary: (rows) => `User-defined postfix operators found: ${columnList(rows, "oprname")}`,
    }),
  },
  {
    id: "E-8",
    title: "check_for_incompatible_polymorphics",
    section: "engine_internal",
    scope: "per_database",
    applicability: sourceAtMost(13),
    defaultSeverity: "error",
    remediation:
      'User-defined objects referring to internal polymorphic functions with "anyarray" or "anyelement" arguments must be dropped before upgrading and restored afterwards, changed to use "anycompatiblearray" and "anycompatible".',
    probe: rowsProbe({
      probe: "incompatible_polymorphics",
      summary: (rows) => `Incompatible polymorphic functions found: ${columnList(rows, "objname")}`,
    }),
  },
  {
    id: "E-9",
    title: "Checking for tables WITH OIDS",
    section: "engine_internal",
    scope: "per_database",
    applicability: sourceAtMost(11),
    defaultSeverity: "error",
    remediation: "Tables declared WITH OIDS are not supported anymore. Remove the oid column using: ALTER TABLE ... SET WITHOUT OIDS;",
    probe: rowsProbe({
      probe: "tables_with_oids",
      summary: (rows) =>
        `Tables WITH OIDS found: ${rows.map((r) => `${cellText(r["nspname"])}.${cellText(r["relname"])}`).join(", ")}`,
    }),
  },
];

/** Freezes the catalog after checking ids are unique and fan-out targets are safe identifiers. */
export function defineCatalog(rules: readonly Rule[]): readonly Rule[] {
  const seen = new Set<string>();
  for (const rule of rules) {
    if (seen.has(rule.id)) throw new Error(`duplicate rule id in catalog: ${rule.id}`);
    seen.add(rule.id);
    if (rule.scope === "per_database_per_target") {
      if (rule.targets.length === 0) throw new Error(`rule ${rule.id} fans out over an empty target list`);
      const bad = rule.targets.find((t) => !isSafeIdentifier(t));
      if (bad !== undefined) throw new Error(`rule ${rule.id} has unsafe target '${bad}'`);
    }
    Object.freeze(rule);
  }
  return Object.freeze([...rules]);
}

export const RULE_CATALOG: readonly Rule[] = defineCatalog([...AURORA_RDS_RULES, ...ENGINE_RULES, ...BLUE_GREEN_RULES]);

export function findRule(id: string, catalog: readonly Rule[] = RULE_CATALOG): Rule | undefined {
  return catalog.find((r) => r.id === id);
}
