import chalk from "chalk";

let verbose = false;

export function setVerbose(on: boolean): void {
  verbose = on;
}

export function table(
  headers: string[],
  rows: (string | number | boolean | undefined | null)[][]
): void {
  // Calculate column widths
  const widths = headers.map((h, i) =>
    Math.max(
      h.length,
      ...rows.map((r) => String(r[i] ?? "").length)
    )
  );

  const headerLine = headers
    .map((h, i) => chalk.bold(h.padEnd(widths[i] ?? 0)))
    .join("  ");
  console.log(headerLine);
  console.log(widths.map((w) => "─".repeat(w)).join("  "));

  for (const row of rows) {
    const line = row
      .map((cell, i) => String(cell ?? "").padEnd(widths[i] ?? 0))
      .join("  ");
    console.log(line.trimEnd());
  }
}

export function success(text: string): void {
  console.log(chalk.green(text));
}

export function error(text: string): void {
  console.error(chalk.red(`Error: ${text}`));
}

export function info(text: string): void {
  console.log(chalk.dim(text));
}

/** Diagnostics for --verbose. Goes to stderr so piped data stays clean. */
export function debug(text: string): void {
  if (!verbose) return;
  console.error(chalk.gray(text));
}

export function json(data: unknown): void {
  console.log(JSON.stringify(data, null, 2));
}

export function blank(): void {
  console.log();
}
