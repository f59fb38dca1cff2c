import type { LocalToolError, RemoteProvisioningError } from "../errors.js";
import {
  planPublishSteps,
  publishLocalRepository,
  type PublishStep,
  type StepResult,
} from "../git/publish.js";
import { maskRemote, resolveRemoteUrl } from "../git/utils/remoteUtils.js";
import {
  buildAuthorizationHeader,
  buildCreateRepositoryBody,
  type CreateRepositoryBody,
} from "../hosting/GitHubHost.js";
import type { RemoteDescriptor, RepositoryHost } from "../hosting/RepositoryHost.js";
import { logger, registerSecret } from "../logger.js";
import type { Result } from "../util/result.js";
import type { RunConfig } from "./configResolver.js";

export interface ProvisionDeps {
  host: RepositoryHost;
}

export interface ProvisionReport {
  dryRun: boolean;
  remoteUrl: string;
  createUrl: string;
  requestBody: CreateRepositoryBody;
  plannedSteps: PublishStep[];
  /** Null on a dry run, where nothing is sent. */
  remote: Result<RemoteDescriptor, RemoteProvisioningError> | null;
  steps: StepResult[];
  failures: LocalToolError[];
  ok: boolean;
}

/**
 * Creates the remote repository, then runs the local publish sequence
 * against the URL derived from owner, name and transport.
 *
 * Under the `abort` policy the first provisioning or git failure is thrown.
 * Under `continue` every step runs once and failures are collected in the report.
 */
export async function provisionAndPublish(
  config: RunConfig,
  deps: ProvisionDeps,
): Promise<ProvisionReport> {
  registerSecret(config.token);

  const { request } = config;
  const requestBody = buildCreateRepositoryBody(request);
  const createUrl = `${config.apiUrl}/user/repos`;
  const remoteUrl = resolveRemoteUrl(request.owner, request.repoName, request.useSsh, config.host);
  const plannedSteps = planPublishSteps({ ...config.publish, remoteUrl });

  if (config.dryRun) {
    logger.info("dry run: nothing sent, no git command executed", {
      createUrl,
      remote: maskRemote(remoteUrl),
    });
    return {
      dryRun: true,
      remoteUrl,
      createUrl,
      requestBody,
      plannedSteps,
      remote: null,
      steps: [],
      failures: [],
      ok: true,
    };
  }

  // Validates the token before the host sees the request
  buildAuthorizationHeader(config.token);

  const remote = await deps.host.createRepository(request, config.token);
  if (!remote.ok) {
    if (config.failurePolicy === "abort") throw remote.error;
    logger.warn("remote provisioning failed, continuing with local publish", {
      host: deps.host.name,
      status: remote.error.status,
      error: remote.error.message,
    });
  }

  logger.info("initializing local repository", {
    cwd: config.publish.cwd,
    remote: maskRemote(remoteUrl),
  });
  const outcome = await publishLocalRepository({
    ...config.publish,
    remoteUrl,
    failurePolicy: config.failurePolicy,
  });

  const firstFailure = outcome.failures[0];
  if (firstFailure && config.failurePolicy === "abort") throw firstFailure;

  return {
    dryRun: false,
    remoteUrl,
    createUrl,
    requestBody,
    plannedSteps,
    remote,
    steps: outcome.results,
    failures: outcome.failures,
    ok: remote.ok && outcome.failures.length === 0,
  };
}
