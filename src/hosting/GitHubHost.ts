import { fetch } from "undici";
import { cfg } from "../config.js";
import { ConfigurationError, RemoteProvisioningError } from "../errors.js";
import { logger } from "../logger.js";
import {
  ApiErrorSchema,
  CreatedRepositorySchema,
  type ProvisionRequest,
} from "../schema.js";
import { err, ok, type Result } from "../util/result.js";
import type { RemoteDescriptor, RepositoryHost } from "./RepositoryHost.js";

export const DEFAULT_API_URL = "https://api.github.com";

export type CreateRepositoryBody = {
  name: string;
  private: boolean;
  description: string;
};

export function buildCreateRepositoryBody(request: ProvisionRequest): CreateRepositoryBody {
  return {
    name: request.repoName,
    private: request.isPrivate,
    description: request.description,
  };
}

/** Refuses to produce a header for an empty token so nothing unauthenticated goes out. */
export function buildAuthorizationHeader(token: string | undefined) {
  const trimmed = (token ?? "").trim();
  if (!trimmed) {
    throw new ConfigurationError(["GITHUB_TOKEN is not set"]);
  }
  return `token ${trimmed}`;
}

function apiMessageFrom(data: unknown): string | undefined {
  const parsed = ApiErrorSchema.safeParse(data);
  if (!parsed.success) return undefined;
  const details = (parsed.data.errors ?? [])
    .map((e) => e.message)
    .filter((m): m is string => Boolean(m));
  return details.length ? `${parsed.data.message} (${details.join(", ")})` : parsed.data.message;
}

export class GitHubHost implements RepositoryHost {
  readonly name = "github";
  protected readonly apiUrl: string;
  protected readonly userAgent: string;

  constructor(options: { apiUrl?: string; userAgent?: string } = {}) {
    this.apiUrl = (options.apiUrl || DEFAULT_API_URL).replace(/\/+$/, "");
    this.userAgent = options.userAgent || cfg.userAgent;
  }

  async createRepository(
    request: ProvisionRequest,
    token: string,
  ): Promise<Result<RemoteDescriptor, RemoteProvisioningError>> {
    const authorization = buildAuthorizationHeader(token);
    const url = `${this.apiUrl}/user/repos`;
    const body = buildCreateRepositoryBody(request);

    logger.info("creating remote repository", { url, name: body.name, private: body.private });

    let status: number;
    let text: string;
    try {
      const res = await fetch(url, {
        method: "POST",
        headers: {
          Authorization: authorization,
          Accept: "application/vnd.github+json",
          "Content-Type": "application/json",
          "User-Agent": this.userAgent,
        },
        body: JSON.stringify(body),
      });
      status = res.status;
      text = await res.text();
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.warn("github request exception", { url, error: message });
      return err(new RemoteProvisioningError(`GitHub request failed: ${message}`, { status: 0 }));
    }

    let data: unknown = null;
    try {
      data = text ? JSON.parse(text) : null;
    } catch {
      data = null;
    }

    if (status !== 201) {
      const apiMessage = apiMessageFrom(data);
      logger.warn("github create repository failed", { url, status, response: apiMessage });
      return err(
        new RemoteProvisioningError(
          `GitHub API returned ${status}${apiMessage ? `: ${apiMessage}` : ""}`,
          { status, apiMessage },
        ),
      );
    }

    const parsed = CreatedRepositorySchema.safeParse(data);
    if (!parsed.success) {
      return err(
        new RemoteProvisioningError("GitHub API returned an unexpected repository payload", {
          status,
        }),
      );
    }

    logger.info("remote repository created", { fullName: parsed.data.full_name });
    return ok({
      fullName: parsed.data.full_name,
      htmlUrl: parsed.data.html_url,
      cloneUrl: parsed.data.clone_url,
      sshUrl: parsed.data.ssh_url,
      isPrivate: parsed.data.private,
    });
  }
}
