type Level = "debug" | "info" | "warn" | "error";

const levelOrder: Record<Level, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const isLevel = (value: string | undefined): value is Level =>
  value !== undefined && Object.prototype.hasOwnProperty.call(levelOrder, value);

const envLevel = process.env.LOG_LEVEL?.trim().toLowerCase();
const minLevel = levelOrder[isLevel(envLevel) ? envLevel : "info"];

const nowIso = () => new Date().toISOString();

const shouldLog = (level: Level) => levelOrder[level] >= minLevel;

// sample buffers must never end up in the log stream
const AUDIO_KEYS = new Set(["audio", "samples", "pcm", "payload"]);

const redactString = (value: string): string =>
  value
    .replace(/Bearer\s+[A-Za-z0-9._-]+/g, "Bearer [REDACTED]")
    .replace(/(token\s*[:=]\s*)([^\s"']+)/gi, "$1[REDACTED]");

const redact = (key: string, value: unknown): unknown => {
  if (AUDIO_KEYS.has(key) && value !== undefined) return "[REDACTED_AUDIO]";
  if (typeof value !== "string") return value;
  return redactString(value);
};

const safeJson = (fields: Record<string, unknown>): Record<string, unknown> =>
  JSON.parse(
    JSON.stringify(fields, (k, v) => {
      if (!k) return v;
      return redact(k, v);
    }),
  );

const baseLog = (level: Level, msg: string, fields?: Record<string, unknown>) => {
  if (!shouldLog(level)) return;
  const payload = {
    t: nowIso(),
    level,
    component: "openjtalk",
    msg,
    ...(fields ? safeJson(fields) : {}),
  };
  // eslint-disable-next-line no-console
  console.log(JSON.stringify(payload));
};

export const errMessage = (e: unknown): string => (e instanceof Error ? e.message : String(e));

export const log = {
  debug: (msg: string, fields?: Record<string, unknown>) => baseLog("debug", msg, fields),
  info: (msg: string, fields?: Record<string, unknown>) => baseLog("info", msg, fields),
  warn: (msg: string, fields?: Record<string, unknown>) => baseLog("warn", msg, fields),
  error: (msg: string, fields?: Record<string, unknown>) => baseLog("error", msg, fields),
};
