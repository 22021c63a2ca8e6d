export type PipelineLogLevel = "debug" | "info" | "warn" | "error";

export type PipelineLogEntry = {
  at: string;
  level: PipelineLogLevel;
  message: string;
  duration_ms?: number;
};

export type PipelineLogger = {
  entries: PipelineLogEntry[];
  debug: (message: string) => void;
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
  startTimer: (label: string) => () => number;
};

const LEVEL_RANK: Record<PipelineLogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

// stdout carries the single JSON response, so every level goes to stderr.
export function createPipelineLogger(options?: {
  level?: PipelineLogLevel;
  silent?: boolean;
}): PipelineLogger {
  const entries: PipelineLogEntry[] = [];
  const threshold = LEVEL_RANK[options?.level ?? "info"];

  const push = (level: PipelineLogLevel, message: string, duration_ms?: number) => {
    if (LEVEL_RANK[level] < threshold) return;
    const entry: PipelineLogEntry = {
      at: new Date().toISOString(),
      level,
      message,
      ...(duration_ms === undefined ? {} : { duration_ms }),
    };
    entries.push(entry);

    if (options?.silent) return;
    console.error(`[chart:${level}] ${message}`);
  };

  return {
    entries,
    debug: (message) => push("debug", message),
    info: (message) => push("info", message),
    warn: (message) => push("warn", message),
    error: (message) => push("error", message),
    startTimer: (label) => {
      const start = Date.now();
      return () => {
        const duration = Date.now() - start;
        push("debug", `${label} took ${duration}ms`, duration);
        return duration;
      };
    },
  };
}

let sharedLogger: PipelineLogger | null = null;

export function getDefaultLogger(): PipelineLogger {
  if (!sharedLogger) {
    const raw = (process.env.CHART_VIZ_LOG_LEVEL ?? "info").toLowerCase();
    const level: PipelineLogLevel =
      raw === "debug" || raw === "warn" || raw === "error" ? raw : "info";
    sharedLogger = createPipelineLogger({ level, silent: process.env.NODE_ENV === "test" });
  }
  return sharedLogger;
}
