type LogLevel = "debug" | "info" | "warn" | "error";

/** `silent` is only a threshold: nothing is ever logged at it. */
type Threshold = LogLevel | "silent";

const LEVELS: Record<Threshold, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

function isThreshold(value: string | undefined): value is Threshold {
  return value !== undefined && Object.hasOwn(LEVELS, value);
}

const envLevel = process.env.LOG_LEVEL;
const minLevel = LEVELS[isThreshold(envLevel) ? envLevel : "info"];
const jsonMode = process.env.LOG_FORMAT === "json";

interface LogEntry {
  ts: string;
  level: LogLevel;
  component: string;
  msg: string;
  jobId?: string;
}

function emit(entry: LogEntry): void {
  if (LEVELS[entry.level] < minLevel) return;

  if (jsonMode) {
    const stream = entry.level === "error" || entry.level === "warn" ? process.stderr : process.stdout;
    stream.write(JSON.stringify(entry) + "\n");
    return;
  }

  const prefix = `[${entry.component}]`;
  const jobTag = entry.jobId ? ` (${entry.jobId})` : "";
  const text = `${prefix}${jobTag} ${entry.msg}`;

  switch (entry.level) {
    case "debug":
      console.debug(text);
      break;
    case "info":
      console.log(text);
      break;
    case "warn":
      console.warn(text);
      break;
    case "error":
      console.error(text);
      break;
  }
}

export function createLogger(component: string, jobId?: string) {
  function makeEntry(lvl: LogLevel, msg: string): LogEntry {
    return {
      ts: new Date().toISOString(),
      level: lvl,
      component,
      msg,
      ...(jobId ? { jobId } : {}),
    };
  }

  return {
    debug: (msg: string) => emit(makeEntry("debug", msg)),
    info: (msg: string) => emit(makeEntry("info", msg)),
    warn: (msg: string) => emit(makeEntry("warn", msg)),
    error: (msg: string) => emit(makeEntry("error", msg)),
    child: (childJobId: string) => createLogger(component, childJobId),
  };
}

export type Logger = ReturnType<typeof createLogger>;
