import { readFile } from "fs/promises";
import path from "path";
import { parse as yamlParse } from "yaml";
import { expandHome } from "../config.js";
import { ConfigurationError } from "../errors.js";
import {
  DEFAULT_BRANCH,
  DEFAULT_COMMIT_MESSAGE,
  DEFAULT_REMOTE_NAME,
  type FailurePolicy,
} from "../git/publish.js";
import { DEFAULT_HOST } from "../git/utils/remoteUtils.js";
import {
  ConfigFileSchema,
  ProvisionRequestSchema,
  PublishSettingsSchema,
  describeIssues,
  type ConfigFile,
  type ProvisionRequest,
} from "../schema.js";

/** Values taken from command-line flags; they win over the config file and the environment. */
export interface CliOverrides {
  configFile?: string;
  owner?: string;
  name?: string;
  description?: string;
  isPrivate?: boolean;
  useSsh?: boolean;
  branch?: string;
  message?: string;
  cwd?: string;
  failurePolicy?: FailurePolicy;
  dryRun?: boolean;
}

export interface RunConfig {
  request: Readonly<ProvisionRequest>;
  token: string;
  host: string;
  apiUrl: string;
  publish: {
    cwd: string;
    branch: string;
    commitMessage: string;
    remoteName: string;
  };
  failurePolicy: FailurePolicy;
  dryRun: boolean;
}

type Env = Record<string, string | undefined>;

const TRUE_VALUES = ["1", "true", "yes", "on"];
const FALSE_VALUES = ["0", "false", "no", "off"];

/** Unlike `bool`, an unrecognised value is a problem rather than `false`. */
function envFlag(env: Env, key: string, def: boolean, problems: string[]): boolean {
  const raw = env[key];
  if (raw === undefined || !raw.trim().length) return def;
  const normalized = raw.trim().toLowerCase();
  if (TRUE_VALUES.includes(normalized)) return true;
  if (FALSE_VALUES.includes(normalized)) return false;
  problems.push(`${key}: expected a boolean, got ${JSON.stringify(raw)}`);
  return def;
}

function nonEmpty(value: string | undefined): string | undefined {
  if (value === undefined) return undefined;
  return value.trim().length ? value : undefined;
}

export async function loadConfigFile(filePath: string): Promise<ConfigFile> {
  const resolved = path.resolve(expandHome(filePath) ?? filePath);
  let raw: string;
  try {
    raw = await readFile(resolved, "utf-8");
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError([`cannot read config file ${resolved}: ${reason}`]);
  }

  let parsed: unknown;
  try {
    // YAML is a superset of JSON, so .json files load through the same parser
    parsed = yamlParse(raw);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError([`cannot parse config file ${resolved}: ${reason}`]);
  }

  const result = ConfigFileSchema.safeParse(parsed ?? {});
  if (!result.success) {
    throw new ConfigurationError(describeIssues(result.error, path.basename(resolved)));
  }
  return result.data;
}

export async function resolveRunConfig(
  overrides: CliOverrides = {},
  env: Env = process.env,
): Promise<RunConfig> {
  const file: ConfigFile = overrides.configFile
    ? await loadConfigFile(overrides.configFile)
    : {};

  const dryRun = overrides.dryRun ?? false;
  const problems: string[] = [];

  const requestResult = ProvisionRequestSchema.safeParse({
    owner: overrides.owner ?? file.owner ?? env.GITHUB_OWNER ?? "",
    repoName: overrides.name ?? file.name ?? env.GITHUB_REPO ?? "",
    description: overrides.description ?? file.description ?? env.GITHUB_DESCRIPTION ?? "",
    isPrivate: overrides.isPrivate ?? file.private ?? envFlag(env, "GITHUB_PRIVATE", true, problems),
    useSsh: overrides.useSsh ?? file.ssh ?? envFlag(env, "GITHUB_USE_SSH", false, problems),
  });
  if (!requestResult.success) problems.push(...describeIssues(requestResult.error));

  const publishResult = PublishSettingsSchema.safeParse({
    cwd: path.resolve(overrides.cwd ?? process.cwd()),
    branch: overrides.branch ?? file.branch ?? nonEmpty(env.GIT_DEFAULT_BRANCH) ?? DEFAULT_BRANCH,
    commitMessage: overrides.message ?? file.message ?? DEFAULT_COMMIT_MESSAGE,
    remoteName: DEFAULT_REMOTE_NAME,
  });
  if (!publishResult.success) problems.push(...describeIssues(publishResult.error));

  const token = (env.GITHUB_TOKEN ?? "").trim();
  if (!token && !dryRun) problems.push("GITHUB_TOKEN is not set");

  if (!requestResult.success || !publishResult.success || problems.length) {
    throw new ConfigurationError(problems);
  }

  const host = (nonEmpty(file.host) ?? nonEmpty(env.GITHUB_HOST) ?? DEFAULT_HOST).trim();
  const apiUrl = (nonEmpty(env.GITHUB_API_URL)?.trim() ?? `https://api.${host}`).replace(/\/+$/, "");

  return {
    request: Object.freeze({ ...requestResult.data }),
    token,
    host,
    apiUrl,
    publish: publishResult.data,
    failurePolicy: overrides.failurePolicy ?? "abort",
    dryRun,
  };
}
