import { existsSync, mkdirSync, readFileSync, openSync, writeSync, closeSync, chmodSync } from "node:fs";
import { join } from "node:path";
import { homedir } from "node:os";

function getConfigDir(): string {
  const dir = process.env.NSCLI_CONFIG_DIR || join(homedir(), ".config", "nscli");
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true, mode: 0o700 });
  }
  return dir;
}

export function getModuleConfigPath(module: string): string {
  return join(getConfigDir(), `${module}.json`);
}

export function readConfig<T>(module: string): T | null {
  const path = getModuleConfigPath(module);
  if (!existsSync(path)) return null;
  try {
    return JSON.parse(readFileSync(path, "utf-8")) as T;
  } catch (e: unknown) {
    throw new Error(`Invalid config file ${path}: ${(e as Error).message}`);
  }
}

export function writeConfig<T>(module: string, data: T): string {
  const filePath = getModuleConfigPath(module);
  const content = JSON.stringify(data, null, 2) + "\n";
  // Mode applies only when the file is created; chmod below covers the rest.
  const fd = openSync(filePath, "w", 0o600);
  try {
    writeSync(fd, content);
  } finally {
    closeSync(fd);
  }
  chmodSync(filePath, 0o600);
  return filePath;
}
