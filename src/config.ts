import "dotenv/config";
import path from "path";

export function expandHome(p: string | undefined): string | undefined {
  if (!p) return p;
  return p.replace(
    /^~(?=$|\/|\\)/,
    process.env.HOME || process.env.USERPROFILE || "~",
  );
}

export function bool(v: string | undefined, def = false) {
  if (v === undefined || !v.trim().length) return def;
  return ["1", "true", "yes", "on"].includes(v.trim().toLowerCase());
}

const gitSshKeyPath = (() => {
  const raw = process.env.GIT_SSH_KEY_PATH;
  if (!raw || !raw.trim().length) return "";
  return path.resolve(expandHome(raw.trim()) ?? raw.trim());
})();

const logLevelRaw = (process.env.LOG_LEVEL || "info").trim().toLowerCase();
const logConsole = bool(process.env.LOG_CONSOLE, true);
const logFile = (() => {
  const custom = process.env.LOG_FILE;
  if (custom && custom.trim().length) {
    return path.resolve(expandHome(custom.trim()) ?? custom.trim());
  }
  return "";
})();

export const cfg = {
  userAgent: "repo-launch",

  git: {
    sshKeyPath: gitSshKeyPath,
  },

  log: {
    level: logLevelRaw,
    console: logConsole,
    file: logFile,
  },
};
