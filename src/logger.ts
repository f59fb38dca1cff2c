import fs from "fs";
import path from "path";
import { cfg } from "./config.js";

type Level = "error" | "warn" | "info" | "debug" | "trace";

const LEVELS: Record<Level, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
  trace: 4
};

function isLevel(value: string): value is Level {
  return value in LEVELS;
}

const configuredLevel: Level = isLevel(cfg.log.level) ? cfg.log.level : "info";

const minLevel = LEVELS[configuredLevel];
const consoleEnabled = cfg.log.console;
const logFile = cfg.log.file;

const REDACTED = "[redacted]";
const SECRET_KEY = /token|authorization|password|secret/i;
const secrets = new Set<string>();

let stream: fs.WriteStream | null = null;

function ensureStream() {
  if (!logFile) return null;
  if (stream) return stream;
  try {
    fs.mkdirSync(path.dirname(logFile), { recursive: true });
  } catch (e) {
    console.error('[logger] failed to create log directory', e);
  }
  try {
    stream = fs.createWriteStream(logFile, { flags: "a" });

    stream.on('error', (err) => {
      console.error('[logger] write stream error', err);
      stream?.end();
      stream = null;
    });
  } catch (e) {
    console.error("[logger] failed to create log file stream", e);
    stream = null;
  }
  return stream;
}

/** Values registered here are replaced in every message and metadata string. */
export function registerSecret(value: string | null | undefined) {
  const trimmed = value?.trim();
  if (trimmed && trimmed.length >= 4) secrets.add(trimmed);
}

function scrub(text: string): string {
  let out = text;
  for (const secret of secrets) {
    out = out.split(secret).join(REDACTED);
  }
  return out;
}

export function redact(value: unknown): unknown {
  if (typeof value === "string") return scrub(value);
  if (value instanceof Error) {
    const base: Record<string, unknown> = {
      name: value.name,
      message: scrub(value.message),
      stack: value.stack ? scrub(value.stack) : undefined
    };
    for (const [key, v] of Object.entries(value)) {
      if (v !== undefined) base[key] = SECRET_KEY.test(key) ? REDACTED : redact(v);
    }
    return base;
  }
  if (!value || typeof value !== "object") return value;
  if (Array.isArray(value)) return value.map(redact);
  const out: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(value)) {
    out[k] = SECRET_KEY.test(k) ? REDACTED : redact(v);
  }
  return out;
}

function write(level: Level, message: string, meta?: unknown) {
  if (LEVELS[level] > minLevel) return;
  const msg = scrub(message);
  const entry: Record<string, unknown> = {
    ts: new Date().toISOString(),
    level,
    msg
  };
  if (meta !== undefined) entry.meta = redact(meta);

  if (consoleEnabled) {
    const consoleMethod = level === "error" ? console.error : level === "warn" ? console.warn : console.log;
    if (entry.meta !== undefined) {
      consoleMethod(`[${level}] ${msg}`, entry.meta);
    } else {
      consoleMethod(`[${level}] ${msg}`);
    }
  }
  const s = ensureStream();
  if (s) {
    s.write(JSON.stringify(entry) + "\n");
  }
}

export function closeLogger(): Promise<void> {
  const s = stream;
  stream = null;
  if (!s) return Promise.resolve();
  return new Promise((resolve) => s.end(() => resolve()));
}

export const logger = {
  error(message: string, meta?: unknown) { write("error", message, meta); },
  warn(message: string, meta?: unknown) { write("warn", message, meta); },
  info(message: string, meta?: unknown) { write("info", message, meta); },
  debug(message: string, meta?: unknown) { write("debug", message, meta); },
  trace(message: string, meta?: unknown) { write("trace", message, meta); }
};
