import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { readConfig } from "@nscli/shared";
import {
  maskSecret,
  requireSettings,
  resolveSettings,
  saveSettings,
} from "./settings.ts";

describe("resolveSettings", () => {
  const env = {
    NIGHTSCOUT_HOST: "env-host",
    NIGHTSCOUT_PORT: "8080",
    NIGHTSCOUT_API_SECRET: "env-secret",
  };
  const config = { host: "cfg-host", port: "9090", apiSecret: "cfg-secret" };

  it("prefers flags over env over config", () => {
    const r = resolveSettings({ host: "flag-host" }, env, config);
    expect(r.host).toEqual({ value: "flag-host", source: "flag" });
    expect(r.port).toEqual({ value: "8080", source: "env" });
    expect(r.apiSecret).toEqual({ value: "env-secret", source: "env" });
  });

  it("falls back to the config file", () => {
    const r = resolveSettings({}, {}, config);
    expect(r.host).toEqual({ value: "cfg-host", source: "config" });
    expect(r.apiSecret).toEqual({ value: "cfg-secret", source: "config" });
  });

  it("uses loopback and port 80 by default, with no secret", () => {
    const r = resolveSettings({}, {}, {});
    expect(r.host).toEqual({ value: "127.0.0.1", source: "default" });
    expect(r.port).toEqual({ value: "80", source: "default" });
    expect(r.apiSecret).toBeNull();
  });

  it("ignores empty environment values", () => {
    const r = resolveSettings({}, { NIGHTSCOUT_HOST: "" }, {});
    expect(r.host.source).toBe("default");
  });
});

describe("requireSettings", () => {
  it("requires a secret", () => {
    expect(() => requireSettings(resolveSettings({}, {}, {}))).toThrow(
      "No API secret configured.",
    );
  });

  it("rejects a port that is not a number in range", () => {
    expect(() =>
      requireSettings(resolveSettings({ apiSecret: "s", port: "http" }, {}, {})),
    ).toThrow('Invalid port "http" (from flag)');
    expect(() =>
      requireSettings(resolveSettings({ apiSecret: "s" }, { NIGHTSCOUT_PORT: "70000" }, {})),
    ).toThrow('Invalid port "70000" (from env)');
  });

  it("returns plain connection settings", () => {
    expect(requireSettings(resolveSettings({ apiSecret: "test-secret" }, {}, {}))).toEqual({
      host: "127.0.0.1",
      port: "80",
      apiSecret: "test-secret",
    });
  });
});

describe("saveSettings", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "nscli-settings-"));
    vi.stubEnv("NSCLI_CONFIG_DIR", dir);
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    rmSync(dir, { recursive: true, force: true });
  });

  it("merges updates over the stored file", () => {
    saveSettings({ host: "ns.local", apiSecret: "test-secret" });
    saveSettings({ port: "1337", host: undefined });

    expect(readConfig("nightscout")).toEqual({
      host: "ns.local",
      apiSecret: "test-secret",
      port: "1337",
    });
  });
});

describe("maskSecret", () => {
  it("shows only the ends of long secrets", () => {
    expect(maskSecret("test-secret-value")).toBe("test...alue");
    expect(maskSecret("short")).toBe("****");
  });
});
