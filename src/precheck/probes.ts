// Fixed, read-only catalog probes. Names reach them only as bound parameters.

/**
 * Columns of user tables, matviews and indexes whose type is (or is built on) one
 * of the root types: domains over it, arrays of it, composites containing it,
 * and ranges over it, recursively.
 */
function userColumnsOfTypeSql(rootOidsSql: string): string {
  return `
    WITH RECURSIVE oids AS (
      ${rootOidsSql}
      UNION ALL
      SELECT * FROM (
        WITH x AS (SELECT oid FROM oids)
        SELECT t.oid FROM pg_catalog.pg_type t, x WHERE typbasetype = x.oid AND typtype = 'd'
        UNION ALL
        SELECT t.oid FROM pg_catalog.pg_type t, x WHERE typelem = x.oid AND typtype = 'b'
        UNION ALL
        SELECT t.oid
        FROM pg_catalog.pg_type t, pg_catalog.pg_class c, pg_catalog.pg_attribute a, x
        WHERE t.typtype = 'c'
          AND t.oid = c.reltype
          AND c.oid = a.attrelid
          AND NOT a.attisdropped
          AND a.atttypid = x.oid
        UNION ALL
        SELECT t.oid
        FROM pg_catalog.pg_type t, pg_catalog.pg_range r, x
        WHERE t.typtype = 'r' AND r.rngtypid = t.oid AND r.rngsubtype = x.oid
      ) foo
    )
    SELECT n.nspname AS schema, c.relname AS relation, a.attname AS column
    FROM pg_catalog.pg_class c, pg_catalog.pg_namespace n, pg_catalog.pg_attribute a
    WHERE c.oid = a.attrelid
      AND NOT a.attisdropped
      AND a.atttypid IN (SELECT oid FROM oids)
      AND c.relkind IN ('r', 'm', 'i')
      AND c.relnamespace = n.oid
      AND n.nspname !~ '^pg_temp_'
      AND n.nspname !~ '^pg_toast_temp_'
      AND n.nspname NOT IN ('pg_catalog', 'information_schema')
    ORDER BY 1, 2, 3
  `;
}

const POLYMORPHIC_ARRAY_FUNCS = `ARRAY[
  'array_append(anyarray,anyelement)',
  'array_cat(anyarray,anyarray)',
  'array_prepend(anyelement,anyarray)',
  'array_remove(anyarray,anyelement)',
  'array_replace(anyarray,anyelement,anyelement)',
  'array_position(anyarray,anyelement)',
  'array_position(anyarray,anyelement,integer)',
  'array_positions(anyarray,anyelement)',
  'width_bucket(anyelement,anyarray)'
]::regprocedure[]`;

const DDL_EVENT_TRIGGER_FILTER = `
  evtevent IN ('ddl_command_start', 'ddl_command_end', 'sql_drop')
  AND evtname <> 'dts_capture_catalog_start'
`;

const TABLES_WITHOUT_PK_FILTER = `
  c.relkind = 'r'
  AND n.nspname NOT IN ('pg_catalog', 'information_schema', 'pg_toast', 'rdsadmin')
  AND NOT EXISTS (
    SELECT 1 FROM pg_catalog.pg_constraint con
    WHERE con.conrelid = c.oid AND con.contype = 'p'
  )
`;

export const PROBES = {
  list_databases: `
    SELECT datname
    FROM pg_catalog.pg_database
    WHERE datistemplate = false
    ORDER BY datname
  `,
  current_setting: `SELECT current_setting($1, true) AS value`,

  prepared_xacts_count: `SELECT count(*)::text AS n FROM pg_catalog.pg_prepared_xacts`,
  prepared_xacts_list: `
    SELECT gid, prepared, owner, database
    FROM pg_catalog.pg_prepared_xacts
    ORDER BY prepared, gid
  `,
  databases_disallowing_connections: `
    SELECT datname
    FROM pg_catalog.pg_database
    WHERE datname <> 'template0'
      AND NOT datallowconn
    ORDER BY datname
  `,
  template_database_count: `
    SELECT count(*)::text AS n
    FROM pg_catalog.pg_database
    WHERE datistemplate
      AND datname IN ('template0', 'template1')
  `,
  invalid_databases: `
    SELECT datname
    FROM pg_catalog.pg_database
    WHERE datconnlimit = -2
    ORDER BY datname
  `,
  replication_slot_count: `SELECT count(*)::text AS n FROM pg_catalog.pg_replication_slots`,
  logical_replication_slots: `
    SELECT slot_name, plugin, slot_type, database, active
    FROM pg_catalog.pg_replication_slots
    WHERE slot_type = 'logical'
    ORDER BY slot_name
  `,

  extension_installed: `SELECT extname FROM pg_catalog.pg_extension WHERE extname = $1`,
  extension_version: `SELECT extversion FROM pg_catalog.pg_extension WHERE extname = $1`,
  extension_version_drift: `
    SELECT name, installed_version, default_version
    FROM pg_catalog.pg_available_extensions
    WHERE name = $1
      AND installed_version IS NOT NULL
      AND default_version <> installed_version
  `,

  system_composite_type_columns: userColumnsOfTypeSql(`
    SELECT t.oid
    FROM pg_catalog.pg_type t
    LEFT JOIN pg_catalog.pg_namespace n ON t.typnamespace = n.oid
    WHERE typtype = 'c'
      AND (t.oid < 16384 OR nspname = 'information_schema')
  `),
  reg_type_columns: userColumnsOfTypeSql(`
    SELECT oid
    FROM pg_catalog.pg_type t
    WHERE t.typnamespace = (SELECT oid FROM pg_catalog.pg_namespace WHERE nspname = 'pg_catalog')
      AND t.typname IN (
        'regcollation', 'regconfig', 'regdictionary', 'regnamespace',
        'regoper', 'regoperator', 'regproc', 'regprocedure'
      )
  `),
  aclitem_columns: userColumnsOfTypeSql(`SELECT 'pg_catalog.aclitem'::pg_catalog.regtype AS oid`),
  sql_identifier_columns: userColumnsOfTypeSql(`SELECT 'information_schema.sql_identifier'::pg_catalog.regtype AS oid`),
  // to_regtype yields NULL (no match) on servers where the type no longer exists.
  removed_type_columns: userColumnsOfTypeSql(`SELECT pg_catalog.to_regtype('pg_catalog.' || $1)::oid AS oid`),
  user_encoding_conversions: `
    SELECT c.oid AS conoid, c.conname, n.nspname
    FROM pg_catalog.pg_conversion c, pg_catalog.pg_namespace n
    WHERE c.connamespace = n.oid
      AND c.oid >= 16384
    ORDER BY n.nspname, c.conname
  `,
  user_postfix_operators: `
    SELECT o.oid AS oproid, n.nspname AS oprnsp, o.oprname, tn.nspname AS typnsp, t.typname
    FROM pg_catalog.pg_operator o,
         pg_catalog.pg_namespace n,
         pg_catalog.pg_type t,
         pg_catalog.pg_namespace tn
    WHERE o.oprnamespace = n.oid
      AND o.oprleft = t.oid
      AND t.typnamespace = tn.oid
      AND o.oprright = 0
      AND o.oid >= 16384
    ORDER BY n.nspname, o.oprname
  `,
  incompatible_polymorphics: `
    SELECT 'aggregate' AS objkind, p.oid::regprocedure::text AS objname
    FROM pg_catalog.pg_proc AS p
    JOIN pg_catalog.pg_aggregate AS a ON a.aggfnoid = p.oid
    JOIN pg_catalog.pg_proc AS transfn ON transfn.oid = a.aggtransfn
    WHERE p.oid >= 16384
      AND a.aggtransfn = ANY(${POLYMORPHIC_ARRAY_FUNCS})
      AND a.aggtranstype = ANY(ARRAY['anyarray', 'anyelement']::regtype[])
    UNION ALL
    SELECT 'aggregate' AS objkind, p.oid::regprocedure::text AS objname
    FROM pg_catalog.pg_proc AS p
    JOIN pg_catalog.pg_aggregate AS a ON a.aggfnoid = p.oid
    JOIN pg_catalog.pg_proc AS finalfn ON finalfn.oid = a.aggfinalfn
    WHERE p.oid >= 16384
      AND a.aggfinalfn = ANY(${POLYMORPHIC_ARRAY_FUNCS})
      AND a.aggtranstype = ANY(ARRAY['anyarray', 'anyelement']::regtype[])
    UNION ALL
    SELECT 'operator' AS objkind, op.oid::regoperator::text AS objname
    FROM pg_catalog.pg_operator AS op
    WHERE op.oid >= 16384
      AND oprcode = ANY(${POLYMORPHIC_ARRAY_FUNCS})
      AND oprleft = ANY(ARRAY['anyarray', 'anyelement']::regtype[])
  `,
  // relhasoids only exists up to PG 11; the rule is gated accordingly.
  tables_with_oids: `
    SELECT n.nspname, c.relname
    FROM pg_catalog.pg_class c, pg_catalog.pg_namespace n
    WHERE c.relnamespace = n.oid
      AND c.relhasoids
      AND n.nspname NOT IN ('pg_catalog')
    ORDER BY n.nspname, c.relname
  `,

  subscription_count: `SELECT count(*)::text AS n FROM pg_catalog.pg_subscription`,
  subscriptions_list: `
    SELECT subname, subslotname, subenabled
    FROM pg_catalog.pg_subscription
    ORDER BY subname
  `,
  tables_without_pk_count: `
    SELECT count(*)::text AS n
    FROM pg_catalog.pg_class c
    JOIN pg_catalog.pg_namespace n ON c.relnamespace = n.oid
    WHERE ${TABLES_WITHOUT_PK_FILTER}
  `,
  tables_without_pk_list: `
    SELECT n.nspname AS schema,
           c.relname AS table_name,
           CASE c.relreplident
             WHEN 'd' THEN 'DEFAULT'
             WHEN 'n' THEN 'NOTHING'
             WHEN 'f' THEN 'FULL'
             WHEN 'i' THEN 'INDEX'
           END AS replica_identity
    FROM pg_catalog.pg_class c
    JOIN pg_catalog.pg_namespace n ON c.relnamespace = n.oid
    WHERE ${TABLES_WITHOUT_PK_FILTER}
    ORDER BY n.nspname, c.relname
  `,
  ddl_event_trigger_count: `
    SELECT count(*)::text AS n
    FROM pg_catalog.pg_event_trigger
    WHERE ${DDL_EVENT_TRIGGER_FILTER}
  `,
  ddl_event_triggers_list: `
    SELECT evtname AS trigger_name,
           evtevent AS event,
           evtfoid::regproc::text AS function_name,
           evtenabled AS enabled
    FROM pg_catalog.pg_event_trigger
    WHERE ${DDL_EVENT_TRIGGER_FILTER}
    ORDER BY evtname
  `,
  capture_trigger: `
    SELECT evtname
    FROM pg_catalog.pg_event_trigger
    WHERE evtname = 'dts_capture_catalog_start'
  `,
} as const satisfies Record<string, string>;

export type ProbeId = keyof typeof PROBES;

/** Number of `$n` placeholders each probe expects. */
export function probeArity(probeId: ProbeId): number {
  const found = PROBES[probeId].match(/\$[0-9]+/g) ?? [];
  return new Set(found).size;
}
