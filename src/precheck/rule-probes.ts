import { ProbeError } from "./errors.js";
import type { ProbeId } from "./probes.js";
import type { ProbeRow, ProbeSignal, RuleContext, RuleProbe, ScopeUnit } from "./types.js";

export type UnitParams = (unit: ScopeUnit) => string[];

export const noParams: UnitParams = () => [];

export const fixedParams =
  (...params: string[]): UnitParams =>
  () =>
    params;

/** The fan-out target (extension or type name) as the probe's only parameter. */
export const targetParam: UnitParams = (unit) => (unit.target === null ? [] : [unit.target]);

export function unitDatabase(unit: ScopeUnit, ctx: RuleContext): string {
  return unit.database ?? ctx.adminDatabase;
}

export function parseCount(raw: string | null, database: string, probeId: string): number {
  const s = (raw ?? "0").trim();
  if (!/^[0-9]+$/.test(s)) {
    throw new ProbeError("probe_failed", `${probeId} returned a non-numeric count '${s}'`, { database, probeId });
  }
  return Number(s);
}

export function cellText(v: unknown): string {
  if (v === null || v === undefined) return "";
  if (v instanceof Date) return v.toISOString();
  if (typeof v === "object") return JSON.stringify(v);
  return String(v);
}

/** Non-zero count ⇒ one signal, with evidence rows from `detail` when given. */
export function countProbe(def: {
  count: ProbeId;
  detail?: ProbeId;
  params?: UnitParams;
  summary: (n: number, unit: ScopeUnit) => string;
}): RuleProbe {
  return async (unit, probes, ctx, signal) => {
    const database = unitDatabase(unit, ctx);
    const params = (def.params ?? noParams)(unit);
    const n = parseCount(await probes.scalarQuery(database, def.count, params), database, def.count);
    if (n <= 0) return [];
    signal?.throwIfAborted();
    const detailRows = def.detail ? await probes.rowsQuery(database, def.detail, params) : [];
    return [{ summary: def.summary(n, unit), detailRows }];
  };
}

/** Any returned row ⇒ one signal carrying all rows as evidence. */
export function rowsProbe(def: {
  probe: ProbeId;
  params?: UnitParams;
  summary: (rows: ProbeRow[], unit: ScopeUnit) => string;
}): RuleProbe {
  return async (unit, probes, ctx) => {
    const rows = await probes.rowsQuery(unitDatabase(unit, ctx), def.probe, (def.params ?? noParams)(unit));
    if (rows.length === 0) return [];
    return [{ summary: def.summary(rows, unit), detailRows: rows }];
  };
}

/** A non-null scalar ⇒ one signal. */
export function presenceProbe(def: {
  probe: ProbeId;
  params?: UnitParams;
  summary: (value: string, unit: ScopeUnit) => string;
}): RuleProbe {
  return async (unit, probes, ctx) => {
    const value = await probes.scalarQuery(unitDatabase(unit, ctx), def.probe, (def.params ?? noParams)(unit));
    if (value === null || value.trim().length === 0) return [];
    const signal: ProbeSignal = { summary: def.summary(value, unit) };
    return [signal];
  };
}

export function columnList(rows: ProbeRow[], column: string): string {
  return rows.map((r) => cellText(r[column])).join(", ");
}
