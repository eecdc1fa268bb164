import { describe, expect, it } from "vitest";
import { createDbRegistry, sslConfig, type DbConnectionOptions } from "../db.js";
import { silentLogger } from "../logger.js";

const opts: DbConnectionOptions = {
  host: "127.0.0.1",
  port: 5432,
  user: "postgres",
  password: "test-secret",
  sslMode: "disable",
  connectionTimeoutMs: 1_000,
  statementTimeoutMs: 1_000,
  maxPerDatabase: 1,
  idleTimeoutMs: 1_000,
  logger: silentLogger(),
};

describe("sslConfig", () => {
  it("maps sslmode onto pg options", () => {
    expect(sslConfig("disable")).toBe(false);
    expect(sslConfig("require")).toEqual({ rejectUnauthorized: false });
    expect(sslConfig("verify-full")).toEqual({ rejectUnauthorized: true });
  });
});

describe("createDbRegistry", () => {
  it("opens no pool until a database is queried", async () => {
    const registry = createDbRegistry(opts);
    expect(registry.openDatabases()).toEqual([]);
    await expect(registry.closeAll()).resolves.toBeUndefined();
  });
});
