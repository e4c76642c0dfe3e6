import { EXTREMA_LOG_STDOUT } from "../config/env";

export type LogLevel = "info" | "warn" | "error";

let stdoutEnabled = EXTREMA_LOG_STDOUT;

export function setLogStdout(enabled: boolean): void {
  stdoutEnabled = enabled;
}

const timestamp = (): string =>
  new Date().toLocaleTimeString("en-US", {
    hour: "numeric",
    minute: "2-digit",
    second: "2-digit",
    hour12: true,
  });

export function log(message: string, source = "extrema", level: LogLevel = "info") {
  const line = `${timestamp()} [${source}] ${message}`;
  if (level === "error") {
    console.error(line);
    return;
  }
  if (level === "warn") {
    console.warn(line);
    return;
  }
  if (!stdoutEnabled) return;
  console.log(line);
}
