import { logger } from "../logger.js";
import { LocalToolError } from "../errors.js";
import { err, ok, type Result } from "../util/result.js";
import { runGit, describeGitFailure } from "./core.js";
import { maskRemote } from "./utils/remoteUtils.js";

export const DEFAULT_COMMIT_MESSAGE = "Initial commit";
export const DEFAULT_BRANCH = "main";
export const DEFAULT_REMOTE_NAME = "origin";

export type PublishStepName = "init" | "add" | "commit" | "branch" | "remote" | "push";

/**
 * `abort` stops at the first failing step; `continue` runs every step
 * regardless and leaves the decision to the caller.
 */
export type FailurePolicy = "abort" | "continue";

export interface PublishOptions {
  cwd: string;
  remoteUrl: string;
  branch: string;
  commitMessage: string;
  remoteName: string;
  failurePolicy: FailurePolicy;
}

export interface PublishStep {
  step: PublishStepName;
  args: string[];
}

export interface StepResult extends PublishStep {
  ok: boolean;
  exitCode: number | null;
  stdout: string;
  stderr: string;
}

export interface PublishOutcome {
  results: StepResult[];
  failures: LocalToolError[];
  /** True when the abort policy stopped the sequence before its last step. */
  halted: boolean;
}

export function sanitizeCommitMessage(message: string) {
  return message.replace(/\s+/g, " ").trim() || DEFAULT_COMMIT_MESSAGE;
}

export function planPublishSteps(
  options: Pick<PublishOptions, "remoteUrl" | "branch" | "commitMessage" | "remoteName">,
): PublishStep[] {
  const message = sanitizeCommitMessage(options.commitMessage);
  return [
    { step: "init", args: ["init"] },
    { step: "add", args: ["add", "."] },
    { step: "commit", args: ["commit", "-m", message] },
    { step: "branch", args: ["branch", "-M", options.branch] },
    { step: "remote", args: ["remote", "add", options.remoteName, options.remoteUrl] },
    { step: "push", args: ["push", "-u", options.remoteName, options.branch] },
  ];
}

/** Only the remote URL can carry credentials; every other argument is logged verbatim. */
function displayArgs(planned: PublishStep) {
  if (planned.step !== "remote") return [...planned.args];
  return planned.args.map((arg, i) => (i === planned.args.length - 1 ? maskRemote(arg) : arg));
}

export async function runPublishStep(
  planned: PublishStep,
  cwd: string,
): Promise<Result<StepResult, LocalToolError>> {
  logger.debug("git step", { step: planned.step, args: displayArgs(planned), cwd });
  try {
    const { stdout, stderr } = await runGit(planned.args, { cwd });
    return ok({ ...planned, ok: true, exitCode: 0, stdout, stderr });
  } catch (e) {
    const failure = describeGitFailure(e);
    return err(
      new LocalToolError({
        step: planned.step,
        args: displayArgs(planned),
        exitCode: failure.exitCode,
        stdout: failure.stdout,
        stderr: failure.stderr,
      }),
    );
  }
}

export async function publishLocalRepository(options: PublishOptions): Promise<PublishOutcome> {
  const steps = planPublishSteps(options);
  const results: StepResult[] = [];
  const failures: LocalToolError[] = [];

  for (const [index, planned] of steps.entries()) {
    const result = await runPublishStep(planned, options.cwd);
    if (result.ok) {
      results.push(result.value);
      continue;
    }

    const error = result.error;
    failures.push(error);
    results.push({
      ...planned,
      ok: false,
      exitCode: error.exitCode,
      stdout: error.stdout,
      stderr: error.stderr,
    });
    logger.warn("git step failed", {
      step: planned.step,
      exitCode: error.exitCode,
      stderr: error.stderr.trim(),
      policy: options.failurePolicy,
    });

    if (options.failurePolicy === "abort") {
      return { results, failures, halted: index < steps.length - 1 };
    }
  }

  logger.info("local publish sequence finished", {
    cwd: options.cwd,
    branch: options.branch,
    remote: maskRemote(options.remoteUrl),
    failed: failures.map((f) => f.step),
  });
  return { results, failures, halted: false };
}
