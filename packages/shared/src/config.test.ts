import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync, statSync, writeFileSync, readFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { getModuleConfigPath, readConfig, writeConfig } from "./config.ts";

let dir: string;

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), "nscli-config-"));
  vi.stubEnv("NSCLI_CONFIG_DIR", dir);
});

afterEach(() => {
  vi.unstubAllEnvs();
  rmSync(dir, { recursive: true, force: true });
});

describe("config", () => {
  it("returns null when the module has no file", () => {
    expect(readConfig("nightscout")).toBeNull();
  });

  it("writes pretty JSON with owner-only permissions and reads it back", () => {
    const path = writeConfig("nightscout", { host: "ns.local" });

    expect(path).toBe(join(dir, "nightscout.json"));
    expect(readFileSync(path, "utf-8")).toBe('{\n  "host": "ns.local"\n}\n');
    expect(statSync(path).mode & 0o777).toBe(0o600);
    expect(readConfig<{ host: string }>("nightscout")).toEqual({ host: "ns.local" });
  });

  it("names the file when it is not valid JSON", () => {
    writeFileSync(getModuleConfigPath("nightscout"), "{ nope");
    expect(() => readConfig("nightscout")).toThrow(
      `Invalid config file ${join(dir, "nightscout.json")}:`,
    );
  });
});
