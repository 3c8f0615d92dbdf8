import { describe, it, expect, vi } from "vitest";
import { parseEnv, resolveLogLevel, resolveTrustProxy } from "../env.js";

describe("parseEnv()", () => {
  it("applies defaults for the memory driver", () => {
    const env = parseEnv({ STORE_DRIVER: "memory" });
    expect(env).toMatchObject({
      NODE_ENV: "development",
      PORT: 4000,
      TAX_RATE: "0.13",
      INVOICE_NUMBER_PREFIX: "INV",
      ALLOW_TRANSACTION_CASCADE_DELETE: false,
      LOCK_TIMEOUT_MS: 5000,
    });
  });

  it("reads boolean flags literally", () => {
    expect(parseEnv({ STORE_DRIVER: "memory", ALLOW_TRANSACTION_CASCADE_DELETE: "false" }).ALLOW_TRANSACTION_CASCADE_DELETE).toBe(false);
    expect(parseEnv({ STORE_DRIVER: "memory", ALLOW_TRANSACTION_CASCADE_DELETE: "1" }).ALLOW_TRANSACTION_CASCADE_DELETE).toBe(true);
  });

  it("rejects invalid configuration", () => {
    const spy = vi.spyOn(console, "error").mockImplementation(() => undefined);
    expect(() => parseEnv({ STORE_DRIVER: "mongo" })).toThrow("Invalid environment configuration");
    expect(() => parseEnv({ STORE_DRIVER: "memory", TAX_RATE: "1.5" })).toThrow("Invalid environment configuration");
    expect(() =>
      parseEnv({
        NODE_ENV: "production",
        MONGODB_URI: "mongodb://localhost:27017",
        MONGO_ALLOW_NON_TRANSACTIONAL: "true",
      }),
    ).toThrow("Invalid environment configuration");
    spy.mockRestore();
  });

  it("treats a blank URI as missing", () => {
    const spy = vi.spyOn(console, "error").mockImplementation(() => undefined);
    expect(() => parseEnv({ STORE_DRIVER: "mongo", MONGODB_URI: "  " })).toThrow();
    spy.mockRestore();
  });
});

describe("resolveLogLevel()", () => {
  it("prefers an explicit level", () => {
    expect(resolveLogLevel({ LOG_LEVEL: "warn", NODE_ENV: "production" })).toBe("warn");
  });

  it("falls back by environment", () => {
    expect(resolveLogLevel({ LOG_LEVEL: undefined, NODE_ENV: "production" })).toBe("info");
    expect(resolveLogLevel({ LOG_LEVEL: undefined, NODE_ENV: "test" })).toBe("silent");
    expect(resolveLogLevel({ LOG_LEVEL: undefined, NODE_ENV: "development" })).toBe("debug");
  });
});

describe("resolveTrustProxy()", () => {
  it("trusts no proxy unless configured", () => {
    expect(resolveTrustProxy(undefined)).toBe(false);
    expect(resolveTrustProxy("false")).toBe(false);
    expect(parseEnv({ STORE_DRIVER: "memory", TRUST_PROXY: "" }).TRUST_PROXY).toBeUndefined();
  });

  it("accepts a flag or an address list", () => {
    expect(resolveTrustProxy("true")).toBe(true);
    expect(resolveTrustProxy("10.0.0.1, 192.168.0.0/16")).toEqual(["10.0.0.1", "192.168.0.0/16"]);
  });
});
