import { execFile } from "child_process";
import { promisify } from "util";
import { cfg } from "../config.js";

const execGit = promisify(execFile);

export type GitRunOptions = { cwd?: string };
export type GitOutput = { stdout: string; stderr: string };

// Allow tests to override how git is executed without relying on spy semantics on ESM exports
type RunGitImpl = (args: string[], options?: GitRunOptions) => Promise<GitOutput>;
let runGitImpl: RunGitImpl | null = null;

export function gitEnv(): NodeJS.ProcessEnv {
  const env = { ...process.env };
  env.GIT_TERMINAL_PROMPT = "0";
  if (cfg.git.sshKeyPath) {
    env.GIT_SSH_COMMAND = `ssh -i "${cfg.git.sshKeyPath}" -o IdentitiesOnly=yes`;
  }
  return env;
}

export async function runGit(args: string[], options: GitRunOptions = {}): Promise<GitOutput> {
  if (runGitImpl) return runGitImpl(args, options);
  const { stdout, stderr } = await execGit("git", args, {
    cwd: options.cwd,
    env: gitEnv(),
    encoding: "utf8",
  });
  return { stdout, stderr };
}

// Test-only hook to override git execution
export function __setRunGitImplForTests(impl?: RunGitImpl | null) {
  runGitImpl = impl || null;
}

export type GitFailure = {
  exitCode: number | null;
  stdout: string;
  stderr: string;
};

/** execFile rejects with the exit status in `code` (a string such as ENOENT when git never started). */
export function describeGitFailure(error: unknown): GitFailure {
  if (!error || typeof error !== "object") {
    return { exitCode: null, stdout: "", stderr: String(error) };
  }
  const code = "code" in error ? error.code : undefined;
  const stdout = "stdout" in error && typeof error.stdout === "string" ? error.stdout : "";
  let stderr = "stderr" in error && typeof error.stderr === "string" ? error.stderr : "";
  if (!stderr && error instanceof Error) stderr = error.message;
  return {
    exitCode: typeof code === "number" ? code : null,
    stdout,
    stderr,
  };
}
