import { describe, expect, it } from "vitest";
import { loadConfig } from "./config";

describe("loadConfig", () => {
  it("falls back to defaults for unset and empty variables", () => {
    expect(loadConfig({ PORT: "", MAX_ROW_BYTES: "" })).toEqual({
      port: 3000,
      databasePath: "./data/ticketing.db",
      logLevel: "info",
      maxRowBytes: 1024,
    });
  });

  it("reads every setting", () => {
    expect(
      loadConfig({
        PORT: "8080",
        DB_PATH: "/var/lib/ticketing/store.db",
        LOG_LEVEL: "warn",
        MAX_ROW_BYTES: "2048",
      })
    ).toEqual({
      port: 8080,
      databasePath: "/var/lib/ticketing/store.db",
      logLevel: "warn",
      maxRowBytes: 2048,
    });
  });

  it("rejects a row bound that is not a positive integer", () => {
    expect(() => loadConfig({ MAX_ROW_BYTES: "lots" })).toThrow(/^Invalid environment: MAX_ROW_BYTES: /);
    expect(() => loadConfig({ MAX_ROW_BYTES: "0" })).toThrow(/MAX_ROW_BYTES/);
  });

  it("rejects an unknown log level", () => {
    expect(() => loadConfig({ LOG_LEVEL: "chatty" })).toThrow(/LOG_LEVEL/);
  });
});
