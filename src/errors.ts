export type RepoLaunchErrorCode =
  | "CONFIGURATION"
  | "REMOTE_PROVISIONING"
  | "LOCAL_TOOL";

export abstract class RepoLaunchError extends Error {
  abstract readonly code: RepoLaunchErrorCode;
}

/** Missing token, owner or name, or any other invalid run parameter. */
export class ConfigurationError extends RepoLaunchError {
  readonly code = "CONFIGURATION";
  readonly problems: string[];

  constructor(problems: string[]) {
    super(`Invalid configuration: ${problems.join("; ")}`);
    this.name = "ConfigurationError";
    this.problems = problems;
  }
}

export class RemoteProvisioningError extends RepoLaunchError {
  readonly code = "REMOTE_PROVISIONING";
  /** HTTP status, or 0 when no response was received. */
  readonly status: number;
  readonly apiMessage?: string;

  constructor(message: string, details: { status: number; apiMessage?: string }) {
    super(message);
    this.name = "RemoteProvisioningError";
    this.status = details.status;
    this.apiMessage = details.apiMessage;
  }
}

export class LocalToolError extends RepoLaunchError {
  readonly code = "LOCAL_TOOL";
  readonly step: string;
  readonly args: string[];
  /** Process exit code, or null when git could not be started at all. */
  readonly exitCode: number | null;
  readonly stdout: string;
  readonly stderr: string;

  constructor(details: {
    step: string;
    args: string[];
    exitCode: number | null;
    stdout?: string;
    stderr: string;
  }) {
    const reason = details.exitCode === null ? "could not run" : `exit ${details.exitCode}`;
    const stderr = details.stderr.trim();
    super(`git ${details.args[0] ?? ""} failed (${reason})${stderr ? `: ${stderr}` : ""}`);
    this.name = "LocalToolError";
    this.step = details.step;
    this.args = details.args;
    this.exitCode = details.exitCode;
    this.stdout = details.stdout ?? "";
    this.stderr = details.stderr;
  }
}

export function isRepoLaunchError(error: unknown): error is RepoLaunchError {
  return error instanceof RepoLaunchError;
}
