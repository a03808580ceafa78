import { Logger, type ILogObj } from "tslog";

const LEVELS = {
  silly: 0,
  trace: 1,
  debug: 2,
  info: 3,
  warn: 4,
  error: 5,
  fatal: 6
} as const;

type LevelName = keyof typeof LEVELS;
type LogFormat = "pretty" | "json" | "hidden";

function isLevelName(value: string): value is LevelName {
  return value in LEVELS;
}

function isLogFormat(value: string): value is LogFormat {
  return value === "pretty" || value === "json" || value === "hidden";
}

export type LoggerOptions = {
  name?: string;
  level?: string;
  format?: string;
  /**
   * "stderr" keeps stdout free for program output (CLI results, MCP JSON-RPC).
   * Entries are then written as JSON lines.
   */
  destination?: "stdout" | "stderr";
};

/**
 * Build a tslog logger. Unknown level or format names fall back to info and pretty.
 */
export function createLogger(options: LoggerOptions = {}): Logger<ILogObj> {
  const level = options.level?.toLowerCase() ?? "info";
  const format = options.format?.toLowerCase() ?? "pretty";
  const toStderr = options.destination === "stderr";
  const logger = new Logger<ILogObj>({
    name: options.name ?? "itinera",
    minLevel: isLevelName(level) ? LEVELS[level] : LEVELS.info,
    type: toStderr ? "hidden" : isLogFormat(format) ? format : "pretty",
    prettyLogTemplate: "{{yyyy}}-{{mm}}-{{dd}} {{hh}}:{{MM}}:{{ss}} {{logLevelName}} [{{name}}] "
  });
  if (toStderr && format !== "hidden") {
    logger.attachTransport((logObj) => {
      process.stderr.write(`${JSON.stringify(logObj)}\n`);
    });
  }
  return logger;
}

export type AppLogger = Logger<ILogObj>;

export function createLoggerFromEnv(
  destination: "stdout" | "stderr" = "stdout",
  env: NodeJS.ProcessEnv = process.env
): AppLogger {
  return createLogger({
    destination,
    ...(env.ITINERA_LOG_LEVEL !== undefined && { level: env.ITINERA_LOG_LEVEL }),
    ...(env.ITINERA_LOG_FORMAT !== undefined && { format: env.ITINERA_LOG_FORMAT })
  });
}

export const logger: AppLogger = createLoggerFromEnv();
