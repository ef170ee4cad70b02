import { Command, CommanderError, InvalidArgumentError } from "commander";
import { error as showError } from "@nscli/shared";
import * as out from "@nscli/shared/output";
import {
  createNightscoutProvider,
  baseUrlFor,
  historyWindow,
} from "./providers/nightscout.ts";
import {
  TOOL,
  resolveSettings,
  requireSettings,
  saveSettings,
  maskSecret,
} from "./settings.ts";
import type { SettingFlags } from "./settings.ts";
import type { GlucoseProvider, JsonValue, Reading } from "./types.ts";

const NOT_AVAILABLE = "N/A";

// Date-time with an explicit offset; anything else is printed as sent.
const ISO_WITH_OFFSET = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(:\d{2}(\.\d+)?)?(Z|[+-]\d{2}:\d{2})$/;

export interface ProgramContext {
  env?: NodeJS.ProcessEnv;
  now?: () => Date;
}

type GlobalOptions = SettingFlags & {
  verbose?: boolean;
};

type HistoryOptions = {
  daysAgo: number;
  period: number;
  jsonl?: boolean;
};

// ── Formatting helpers ───────────────────────────────────────────

/** Text form of a field: strings as-is, null as N/A, anything else as JSON. */
export function fieldText(v: JsonValue): string {
  if (v === null) return NOT_AVAILABLE;
  return typeof v === "string" ? v : JSON.stringify(v);
}

/**
 * UTC form of a server timestamp that carries its own offset.
 * Timestamps without one, or not ISO-8601 at all, are printed raw.
 */
export function isoTimestamp(raw: JsonValue): string {
  if (typeof raw !== "string" || !ISO_WITH_OFFSET.test(raw)) return fieldText(raw);
  const d = new Date(raw);
  return Number.isNaN(d.getTime()) ? raw : d.toISOString();
}

export function formatLatest(r: Reading): string {
  return [isoTimestamp(r.timestamp), fieldText(r.sgv), fieldText(r.units), fieldText(r.direction)].join(" ");
}

export function formatHistoryLine(r: Reading): string {
  return [fieldText(r.timestamp), fieldText(r.sgv), fieldText(r.units)].join(" ");
}

export function formatJsonl(r: Reading): string {
  return JSON.stringify({
    timestamp: r.timestamp,
    sgv: r.sgv,
    units: r.units,
    direction: r.direction,
  });
}

function integer(value: string): number {
  if (!/^-?\d+$/.test(value)) {
    throw new InvalidArgumentError("Not an integer.");
  }
  return parseInt(value, 10);
}

function nonNegativeInt(value: string): number {
  if (!/^\d+$/.test(value)) {
    throw new InvalidArgumentError("Not a non-negative integer.");
  }
  return parseInt(value, 10);
}

// ── Program ──────────────────────────────────────────────────────

export function createProgram(ctx: ProgramContext = {}): Command {
  const env = ctx.env ?? process.env;
  const now = ctx.now ?? (() => new Date());

  const program = new Command();
  program
    .name(TOOL)
    .description("Nightscout glucose data CLI")
    .version("0.1.0")
    .option("--host <host>", "Nightscout host (env: NIGHTSCOUT_HOST, default: 127.0.0.1)")
    .option("--port <port>", "Nightscout port (env: NIGHTSCOUT_PORT, default: 80)")
    .option("--api-secret <secret>", "API secret (env: NIGHTSCOUT_API_SECRET)")
    .option("-v, --verbose", "Log requests to stderr")
    .exitOverride();

  program.hook("preAction", () => {
    out.setVerbose(program.opts<GlobalOptions>().verbose === true);
  });

  function provider(): GlucoseProvider {
    const settings = requireSettings(resolveSettings(program.opts<GlobalOptions>(), env));
    return createNightscoutProvider(settings, {
      onRequest: (method, url) => out.debug(`${method} ${url}`),
    });
  }

  // ── Data commands ──────────────────────────────────────────────

  program
    .command("get")
    .description("Latest glucose reading")
    .action(async () => {
      const r = await provider().latest();
      if (!r) {
        console.log("No data available");
        return;
      }
      console.log(formatLatest(r));
    });

  program
    .command("history")
    .description("Readings in a time window")
    .option("--days-ago <n>", "End the window this many days before now", integer, 0)
    .option("--period <minutes>", "Window length in minutes", nonNegativeInt, 1440)
    .option("--jsonl", "One JSON object per line")
    .action(async (opts: HistoryOptions) => {
      const window = historyWindow(opts.daysAgo, opts.period, now());
      out.debug(`window ${window.start.toISOString()} .. ${window.end.toISOString()}`);

      const readings = await provider().history(window);
      const format = opts.jsonl ? formatJsonl : formatHistoryLine;
      for (const r of readings) {
        console.log(format(r));
      }
    });

  program
    .command("json <path>")
    .description("Raw JSON from any API path (e.g. /api/v1/status.json)")
    .action(async (path: string) => {
      out.json(await provider().json(path.startsWith("/") ? path : `/${path}`));
    });

  // ── Config commands ────────────────────────────────────────────

  program
    .command("setup")
    .description("Save --host, --port and --api-secret to the config file")
    .action(() => {
      const { host, port, apiSecret } = program.opts<GlobalOptions>();
      if (!host && !port && !apiSecret) {
        throw new Error("Nothing to save. Pass --host, --port or --api-secret.");
      }
      const path = saveSettings({ host, port, apiSecret });
      out.success(`Settings saved to ${path}`);
    });

  program
    .command("status")
    .description("Show resolved settings and check the server")
    .action(async () => {
      const resolved = resolveSettings(program.opts<GlobalOptions>(), env);
      out.table(
        ["Setting", "Value", "Source"],
        [
          ["host", resolved.host.value, resolved.host.source],
          ["port", resolved.port.value, resolved.port.source],
          [
            "api-secret",
            resolved.apiSecret ? maskSecret(resolved.apiSecret.value) : "(not set)",
            resolved.apiSecret?.source ?? "",
          ],
          ["url", baseUrlFor({ host: resolved.host.value, port: resolved.port.value }), ""],
        ],
      );
      out.blank();

      const status = await provider().status();
      out.success("Nightscout API: OK");
      if (status.name || status.version) {
        out.info(`Server: ${status.name ?? "nightscout"} ${status.version ?? ""}`.trimEnd());
      }
    });

  return program;
}

/** Run the CLI and return the process exit code. */
export async function main(argv: string[], ctx: ProgramContext = {}): Promise<number> {
  const program = createProgram(ctx);
  try {
    await program.parseAsync(argv);
    return 0;
  } catch (e: unknown) {
    // Commander has already printed its own message (or help)
    if (e instanceof CommanderError) return e.exitCode;
    showError(e instanceof Error ? e.message : String(e));
    return 1;
  }
}
