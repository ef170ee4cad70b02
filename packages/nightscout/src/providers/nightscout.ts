import { HttpClient, HttpError } from "@nscli/shared";
import { DEFAULT_UNITS } from "../types.ts";
import type {
  ConnectionSettings,
  GlucoseProvider,
  HistoryWindow,
  JsonValue,
  Reading,
  ServerStatus,
} from "../types.ts";

const ENTRIES_PATH = "/api/v1/entries.json";
const STATUS_PATH = "/api/v1/status.json";

/** Ceiling on history results; high enough to mean "everything in range". */
export const HISTORY_MAX_COUNT = 10000;

const MINUTE_MS = 60_000;
const DAY_MS = 24 * 60 * MINUTE_MS;

// ── Raw API types ────────────────────────────────────────────────

export interface RawEntry {
  dateString?: JsonValue;
  sgv?: JsonValue;
  units?: JsonValue;
  direction?: JsonValue;
  [key: string]: JsonValue | undefined;
}

interface RawStatus {
  name?: string;
  version?: string;
}

// ── Helpers ──────────────────────────────────────────────────────

export function baseUrlFor(settings: Pick<ConnectionSettings, "host" | "port">): string {
  return `http://${settings.host}:${settings.port}`;
}

/**
 * Window ending `daysAgo` days before `now` and spanning `periodMinutes`.
 * A negative `daysAgo` puts the end in the future.
 */
export function historyWindow(
  daysAgo: number,
  periodMinutes: number,
  now: Date = new Date(),
): HistoryWindow {
  if (!Number.isInteger(daysAgo)) {
    throw new RangeError(`days-ago must be an integer, got ${daysAgo}`);
  }
  if (!Number.isInteger(periodMinutes) || periodMinutes < 0) {
    throw new RangeError(`period must be a non-negative integer, got ${periodMinutes}`);
  }
  const end = new Date(now.getTime() - daysAgo * DAY_MS);
  const start = new Date(end.getTime() - periodMinutes * MINUTE_MS);
  return { start, end };
}

export function historyParams(window: HistoryWindow): Record<string, string> {
  return {
    "find[dateString][$gte]": window.start.toISOString(),
    "find[dateString][$lte]": window.end.toISOString(),
    count: String(HISTORY_MAX_COUNT),
  };
}

export function mapEntry(e: RawEntry): Reading {
  return {
    timestamp: e.dateString === undefined ? null : e.dateString,
    sgv: e.sgv === undefined ? null : e.sgv,
    units: e.units === undefined ? DEFAULT_UNITS : e.units,
    direction: e.direction === undefined ? "" : e.direction,
  };
}

function isRecord(v: unknown): v is RawEntry {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function asEntries(body: unknown, path: string): RawEntry[] {
  if (!Array.isArray(body)) {
    throw new HttpError(`Expected an array of entries from GET ${path}`);
  }
  return body.map((e: unknown): RawEntry => (isRecord(e) ? e : {}));
}

// ── Provider ─────────────────────────────────────────────────────

export interface ProviderOptions {
  onRequest?: (method: string, url: string) => void;
}

export function createNightscoutProvider(
  settings: ConnectionSettings,
  opts: ProviderOptions = {},
): GlucoseProvider {
  const baseUrl = baseUrlFor(settings);
  const http = new HttpClient({
    baseUrl,
    headers: { "API-SECRET": settings.apiSecret },
    onRequest: opts.onRequest,
  });

  return {
    async latest() {
      const body = await http.get<unknown>(ENTRIES_PATH, { count: "1" });
      const [first] = asEntries(body, ENTRIES_PATH);
      return first ? mapEntry(first) : null;
    },

    async history(window) {
      const body = await http.get<unknown>(ENTRIES_PATH, historyParams(window));
      return asEntries(body, ENTRIES_PATH).map(mapEntry);
    },

    async status() {
      const body = await http.get<RawStatus | null>(STATUS_PATH);
      return {
        name: body?.name ?? null,
        version: body?.version ?? null,
      } satisfies ServerStatus;
    },

    async json(path) {
      return http.get(path);
    },
  };
}
