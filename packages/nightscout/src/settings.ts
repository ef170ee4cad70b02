import { readConfig, writeConfig } from "@nscli/shared";
import type { ConnectionSettings, SettingSource } from "./types.ts";

export const TOOL = "nightscout";

export const DEFAULT_HOST = "127.0.0.1";
export const DEFAULT_PORT = "80";

export const ENV = {
  host: "NIGHTSCOUT_HOST",
  port: "NIGHTSCOUT_PORT",
  apiSecret: "NIGHTSCOUT_API_SECRET",
} as const;

/** Shape of `<config dir>/nightscout.json` */
export type NightscoutConfig = Partial<ConnectionSettings>;

/** Values given on the command line; undefined when the flag was omitted */
export type SettingFlags = Partial<ConnectionSettings>;

type Key = keyof ConnectionSettings;

export interface Resolved<T> {
  value: T;
  source: SettingSource;
}

export interface ResolvedSettings {
  host: Resolved<string>;
  port: Resolved<string>;
  apiSecret: Resolved<string> | null;
}

function pick(
  key: Key,
  flags: SettingFlags,
  env: NodeJS.ProcessEnv,
  config: NightscoutConfig,
): Resolved<string> | null {
  const flag = flags[key];
  if (flag) return { value: flag, source: "flag" };
  const fromEnv = env[ENV[key]];
  if (fromEnv) return { value: fromEnv, source: "env" };
  const fromConfig = config[key];
  if (fromConfig) return { value: String(fromConfig), source: "config" };
  return null;
}

/**
 * Resolve each setting: flag, then environment, then config file, then default.
 * The API secret has no default.
 */
export function resolveSettings(
  flags: SettingFlags,
  env: NodeJS.ProcessEnv = process.env,
  config: NightscoutConfig = readConfig<NightscoutConfig>(TOOL) ?? {},
): ResolvedSettings {
  return {
    host: pick("host", flags, env, config) ?? { value: DEFAULT_HOST, source: "default" },
    port: pick("port", flags, env, config) ?? { value: DEFAULT_PORT, source: "default" },
    apiSecret: pick("apiSecret", flags, env, config),
  };
}

export function requireSettings(resolved: ResolvedSettings): ConnectionSettings {
  if (!resolved.apiSecret) {
    throw new Error(
      `No API secret configured. Set ${ENV.apiSecret}, pass --api-secret, or run: ${TOOL} setup --api-secret <secret>`,
    );
  }
  const port = resolved.port.value;
  const n = Number(port);
  if (!/^\d+$/.test(port) || n < 1 || n > 65535) {
    throw new Error(`Invalid port "${port}" (from ${resolved.port.source})`);
  }
  return {
    host: resolved.host.value,
    port,
    apiSecret: resolved.apiSecret.value,
  };
}

/** Merge `updates` over the stored config and write it back. Returns the file path. */
export function saveSettings(updates: NightscoutConfig): string {
  const current = readConfig<NightscoutConfig>(TOOL) ?? {};
  const next: NightscoutConfig = { ...current };
  for (const key of ["host", "port", "apiSecret"] as const) {
    const value = updates[key];
    if (value) next[key] = value;
  }
  return writeConfig(TOOL, next);
}

export function maskSecret(secret: string): string {
  if (secret.length <= 8) return "****";
  return secret.slice(0, 4) + "..." + secret.slice(-4);
}
