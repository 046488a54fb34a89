import type { BuildLogger } from "@inkwell/core";

export type LoggerMode = "normal" | "quiet";

export function createConsoleLogger(mode: LoggerMode = "normal"): BuildLogger {
  return {
    // Progress lines only in normal mode; problems are always printed
    ...(mode === "normal" ? { log: (line: string) => console.log(line) } : {}),
    warn: (line) => console.warn(line),
    error: (line) => console.error(line),
  };
}
