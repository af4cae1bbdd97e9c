/**
 * Console logging with a bracketed component prefix, e.g.
 * `[campaign] Creating Gardening/ios (attempt 1)`.
 *
 * Everything that logs takes a Logger so tests can swap in a recorder.
 */

export type Logger = Pick<Console, "log" | "warn" | "error">;

export const consoleLogger: Logger = console;

/**
 * Wrap a logger so every line carries `[component]` in front.
 */
export function withPrefix(logger: Logger, component: string): Logger {
  const tag = `[${component}]`;
  return {
    log: (...args: unknown[]) => logger.log(tag, ...args),
    warn: (...args: unknown[]) => logger.warn(tag, ...args),
    error: (...args: unknown[]) => logger.error(tag, ...args),
  };
}

/** Logger that keeps every line in memory (tests, dry runs). */
export class RecordingLogger implements Logger {
  readonly lines: Array<{ level: "log" | "warn" | "error"; text: string }> =
    [];

  log(...args: unknown[]): void {
    this.lines.push({ level: "log", text: args.map(String).join(" ") });
  }

  warn(...args: unknown[]): void {
    this.lines.push({ level: "warn", text: args.map(String).join(" ") });
  }

  error(...args: unknown[]): void {
    this.lines.push({ level: "error", text: args.map(String).join(" ") });
  }

  textAt(level: "log" | "warn" | "error"): string[] {
    return this.lines.filter((l) => l.level === level).map((l) => l.text);
  }
}

/**
 * Message text of anything thrown, truncated for logs and checkpoints.
 */
export function describeError(error: unknown, maxLength = 2000): string {
  const message =
    error instanceof Error ? error.message : String(error ?? "unknown error");
  return message.slice(0, maxLength);
}
