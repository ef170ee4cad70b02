/** Types shared by the nightscout CLI and its provider */

export const DEFAULT_UNITS = "mg/dL";

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

/**
 * One reading as the server sent it. Defaults fill absent keys only;
 * a present value passes through whatever its type.
 */
export interface Reading {
  timestamp: JsonValue;
  sgv: JsonValue;
  units: JsonValue;
  direction: JsonValue;
}

/** Time range for a history query. `start <= end`. */
export interface HistoryWindow {
  start: Date;
  end: Date;
}

export interface ConnectionSettings {
  host: string;
  port: string;
  apiSecret: string;
}

export type SettingSource = "flag" | "env" | "config" | "default";

export interface GlucoseProvider {
  latest(): Promise<Reading | null>;
  history(window: HistoryWindow): Promise<Reading[]>;
  status(): Promise<ServerStatus>;
  json(path: string): Promise<unknown>;
}

export interface ServerStatus {
  name: string | null;
  version: string | null;
}
