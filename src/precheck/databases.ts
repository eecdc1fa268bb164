import type { SkippedDatabase } from "./types.js";

export const SYSTEM_DATABASES: ReadonlySet<string> = new Set(["template0", "template1", "rdsadmin"]);

const IDENTIFIER_RE = /^[a-zA-Z0-9_-]+$/;
const MAX_IDENTIFIER_LEN = 63;

/**
 * The only names that may reach a probe: database names, extension names and
 * type names are all checked against this before a query is sent.
 */
export function isSafeIdentifier(name: string): boolean {
  return name.length > 0 && name.length <= MAX_IDENTIFIER_LEN && IDENTIFIER_RE.test(name);
}

export type DatabaseEnumeration = {
  databases: readonly string[];
  skipped: readonly SkippedDatabase[];
};

function byCodeUnit(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

export function enumerateDatabases(rawNames: readonly string[]): DatabaseEnumeration {
  const keep = new Set<string>();
  const skipped = new Map<string, SkippedDatabase>();

  for (const name of rawNames) {
    if (SYSTEM_DATABASES.has(name)) {
      skipped.set(name, { name, reason: "system_database" });
      continue;
    }
    if (!isSafeIdentifier(name)) {
      skipped.set(name, { name, reason: "invalid_identifier" });
      continue;
    }
    keep.add(name);
  }

  return {
    databases: Object.freeze([...keep].sort(byCodeUnit)),
    skipped: Object.freeze([...skipped.values()].sort((a, b) => byCodeUnit(a.name, b.name))),
  };
}
