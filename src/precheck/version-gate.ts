import { formatError } from "../util/error-format.js";
import { InputValidationError } from "./errors.js";
import type { Applicability, Rule, VersionContext, VersionPredicate } from "./types.js";

export const SUPPORTED_TARGET_VERSIONS = [11, 12, 13, 14, 15, 16, 17] as const;

export type TargetVersion = (typeof SUPPORTED_TARGET_VERSIONS)[number];

const APPLICABLE: Applicability = { applicable: true };

export const always: VersionPredicate = () => APPLICABLE;

export function sourceAtMost(max: number, reason = `source version > ${max}`): VersionPredicate {
  return (v) => (v.sourceVersion <= max ? APPLICABLE : { applicable: false, reason });
}

export function sourceBelow(limit: number, reason = `source version >= ${limit}`): VersionPredicate {
  return (v) => (v.sourceVersion < limit ? APPLICABLE : { applicable: false, reason });
}

export function targetAtLeast(min: number, reason = `target version < ${min}`): VersionPredicate {
  return (v) => (v.targetVersion >= min ? APPLICABLE : { applicable: false, reason });
}

/** Applicable only when every predicate is; the first skip reason wins. */
export function allOf(...predicates: VersionPredicate[]): VersionPredicate {
  return (v) => {
    for (const p of predicates) {
      const r = p(v);
      if (!r.applicable) return r;
    }
    return APPLICABLE;
  };
}

export function withReason(predicate: VersionPredicate, reason: string): VersionPredicate {
  return (v) => (predicate(v).applicable ? APPLICABLE : { applicable: false, reason });
}

export function checkApplicability(rule: Rule, v: VersionContext): Applicability {
  if (rule.section === "blue_green" && !v.blueGreenRequested) {
    return { applicable: false, reason: "Blue/Green checks not requested" };
  }
  try {
    return rule.applicability(v);
  } catch (err) {
    return { applicable: false, reason: `applicability check failed: ${formatError(err)}` };
  }
}

/** `SHOW server_version_num` → major version (130012 → 13, 90624 → 9). */
export function parseServerVersionNum(raw: string | null): number {
  const s = (raw ?? "").trim();
  if (!/^[0-9]{5,6}$/.test(s)) {
    throw new InputValidationError("invalid_input", `unrecognized server_version_num: '${s}'`);
  }
  return Math.trunc(Number(s) / 10_000);
}

export function isSupportedTargetVersion(v: number): v is TargetVersion {
  return SUPPORTED_TARGET_VERSIONS.some((x) => x === v);
}

export function assertUpgradePath(sourceVersion: number, targetVersion: number): void {
  if (sourceVersion >= targetVersion) {
    throw new InputValidationError(
      "unsupported_upgrade_path",
      `Source version (${sourceVersion}) >= Target version (${targetVersion}); this precheck is for upgrading TO version ${targetVersion}.`,
      { source_version: sourceVersion, target_version: targetVersion },
    );
  }
}
