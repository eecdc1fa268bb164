function isRecord(v: unknown): v is Record<string, unknown> {
  return !!v && typeof v === "object" && !Array.isArray(v);
}

function safeJson(value: unknown): string {
  const seen = new WeakSet<object>();
  try {
    const text = JSON.stringify(value, (_key, v: unknown) => {
      if (!v || typeof v !== "object") return v;
      if (seen.has(v)) return "[circular]";
      seen.add(v);
      return v;
    });
    return text ?? String(value);
  } catch {
    return String(value);
  }
}

function trimmedString(v: unknown): string {
  return typeof v === "string" ? v.trim() : "";
}

function nestedMessages(err: Record<string, unknown> | Error): string[] {
  const nested = "errors" in err ? err.errors : undefined;
  if (!Array.isArray(nested)) return [];
  return nested.map((e: unknown) => formatError(e)).filter((x) => x.length > 0);
}

// pg's DatabaseError carries the SQLSTATE in `code`; socket errors carry ECONNREFUSED etc.
function errorCode(err: Record<string, unknown> | Error): string {
  return "code" in err ? trimmedString(err.code) : "";
}

export function formatError(err: unknown): string {
  if (typeof err === "string") {
    const s = err.trim();
    return s.length > 0 ? s : "unknown_error";
  }

  if (err instanceof Error) {
    const msg = err.message.trim();
    const code = errorCode(err);
    if (msg.length > 0) return code.length > 0 && !msg.includes(code) ? `${code}: ${msg}` : msg;
    // AggregateError from multi-address connects has an empty message.
    const nested = nestedMessages(err);
    if (nested.length > 0) return nested.join(" | ");
    if (code.length > 0) return code;
    return err.name || "unknown_error";
  }

  if (isRecord(err)) {
    const nested = nestedMessages(err);
    if (nested.length > 0) return nested.join(" | ");
    const code = errorCode(err);
    if (code.length > 0) {
      const msg = trimmedString(err.message);
      return msg.length > 0 ? `${code}: ${msg}` : code;
    }
    const json = safeJson(err);
    return json.trim().length > 0 ? json : "unknown_error";
  }

  const s = String(err ?? "").trim();
  return s.length > 0 ? s : "unknown_error";
}
