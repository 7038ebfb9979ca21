// src/cli-util.ts
import type { Command } from "commander";

export function isDirectRun(mod: NodeJS.Module): boolean {
  return require.main === mod;
}

/**
 * Minimal CLI bootstrap:
 * - If `mod` is the process entry point, parse argv and run the program
 * - If imported, do nothing (so tests can drive `buildProgram` directly)
 */
export function cliEntrypoint(
  mod: NodeJS.Module,
  buildProgram: () => Command,
  opts?: { label?: string },
): void {
  if (!isDirectRun(mod)) return;
  const program = buildProgram();
  program.parseAsync(process.argv).catch((err: unknown) => {
    const label = opts?.label || program.name() || "command";
    console.error(`${label} fatal:`, err instanceof Error ? err.stack : err);
    process.exit(1);
  });
}

export function exitCodeOf(code: number | string | null | undefined): number {
  if (code == null || code === "") return 0;
  const n = Number(code);
  return Number.isFinite(n) ? n : 1;
}

/** Handy for tests: run a command with custom argv without process.exit */
export async function parseAndRun(
  buildProgram: () => Command,
  argv: string[],
): Promise<number> {
  const program = buildProgram();
  program.exitOverride();
  process.exitCode = undefined;
  await program.parseAsync(argv, { from: "user" });
  const code = exitCodeOf(process.exitCode);
  process.exitCode = undefined;
  return code;
}
