import { describe, it, expect, afterEach } from "vitest";
import { getConfig, resetConfig } from "../src/config.js";

describe("getConfig", () => {
  afterEach(() => {
    resetConfig();
  });

  it("applies defaults", () => {
    resetConfig();
    expect(getConfig({})).toEqual({ LOG_LEVEL: "warn", LOG_PRETTY: true });
  });

  it("reads settings from the environment", () => {
    resetConfig();
    expect(
      getConfig({
        LOG_LEVEL: "debug",
        LOG_PRETTY: "false",
        VOSUMMARY_CONTACTS_FILE: "/etc/vosummary/contacts.yaml",
      }),
    ).toEqual({
      LOG_LEVEL: "debug",
      LOG_PRETTY: false,
      VOSUMMARY_CONTACTS_FILE: "/etc/vosummary/contacts.yaml",
    });
  });

  it("rejects an unknown log level", () => {
    resetConfig();
    expect(() => getConfig({ LOG_LEVEL: "loud" })).toThrow();
  });
});
