import pino, { type Level, type LevelWithSilent, type Logger } from "pino";

const LOG_LEVELS: readonly LevelWithSilent[] = [
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
];

function isLogLevel(value: string | undefined): value is LevelWithSilent {
  return LOG_LEVELS.some((level) => level === value);
}

function initialLevel(): LevelWithSilent {
  const fromEnv = process.env.CACHESCOPE_LOG_LEVEL;
  return isLogLevel(fromEnv) ? fromEnv : "info";
}

/** Logs go to stderr so that reports on stdout stay clean */
const rootLogger = pino(
  { name: "cachescope", level: initialLevel() },
  pino.destination(2)
);

const children = new Set<Logger>();

/**
 * Get a logger bound to a component name.
 * Children pick up later level changes made through setLogLevel.
 */
export function getLogger(component: string): Logger {
  const child = rootLogger.child({ component });
  children.add(child);
  return child;
}

export function setLogLevel(level: Level | "silent"): void {
  rootLogger.level = level;
  for (const child of children) {
    child.level = level;
  }
}

export type { Logger };
