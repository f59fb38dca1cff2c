import { isRepoLaunchError } from "./errors.js";
import { GitHubHost } from "./hosting/GitHubHost.js";
import type { RepositoryHost } from "./hosting/RepositoryHost.js";
import { cfg } from "./config.js";
import { logger } from "./logger.js";
import {
  resolveRunConfig,
  type CliOverrides,
  type RunConfig,
} from "./provision/configResolver.js";
import { provisionAndPublish, type ProvisionReport } from "./provision/workflow.js";

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export type ParsedArgs =
  | { kind: "help" }
  | { kind: "run"; overrides: CliOverrides };

const VALUE_FLAGS = {
  "--config": "configFile",
  "--owner": "owner",
  "--name": "name",
  "--description": "description",
  "--branch": "branch",
  "--message": "message",
  "--cwd": "cwd",
} as const satisfies Record<string, keyof CliOverrides>;

type ValueFlag = keyof typeof VALUE_FLAGS;

function isValueFlag(flag: string): flag is ValueFlag {
  return Object.prototype.hasOwnProperty.call(VALUE_FLAGS, flag);
}

export function printUsage(write: (line: string) => void = console.error) {
  write("Usage: repo-launch [options]");
  write("");
  write("Creates a GitHub repository and pushes the current directory to it.");
  write("");
  write("Options:");
  write("  --config <file>       YAML or JSON file with owner, name, description, private, ssh, host, branch, message");
  write("  --owner <login>       Account that will own the repository (GITHUB_OWNER)");
  write("  --name <repo>         Repository name (GITHUB_REPO)");
  write("  --description <text>  Repository description (GITHUB_DESCRIPTION)");
  write("  --private | --public  Visibility, private by default (GITHUB_PRIVATE)");
  write("  --ssh | --https       Remote transport, HTTPS by default (GITHUB_USE_SSH)");
  write("  --branch <name>       Primary branch, default main (GIT_DEFAULT_BRANCH)");
  write("  --message <text>      Commit message, default \"Initial commit\"");
  write("  --cwd <dir>           Directory to publish, default the current directory");
  write("  --continue-on-error   Run every step even after a failure");
  write("  --dry-run             Print the request and git commands without running them");
  write("  -h, --help            Show this help");
  write("");
  write("Environment:");
  write("  GITHUB_TOKEN          Required. Token used to create the repository");
}

export function parseCliArgs(argv: string[]): ParsedArgs {
  const overrides: CliOverrides = {};

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === "-h" || arg === "--help") return { kind: "help" };

    const eq = arg.startsWith("--") ? arg.indexOf("=") : -1;
    const flag = eq > 0 ? arg.slice(0, eq) : arg;

    if (isValueFlag(flag)) {
      let value: string | undefined;
      if (eq > 0) {
        value = arg.slice(eq + 1);
      } else {
        const next = argv[i + 1];
        if (next !== undefined && !next.startsWith("--")) {
          value = next;
          i++;
        }
      }
      if (value === undefined) throw new UsageError(`Missing value for ${flag}`);
      overrides[VALUE_FLAGS[flag]] = value;
      continue;
    }

    if (eq > 0) throw new UsageError(`Unknown option: ${flag}`);

    switch (arg) {
      case "--private":
        overrides.isPrivate = true;
        break;
      case "--public":
        overrides.isPrivate = false;
        break;
      case "--ssh":
        overrides.useSsh = true;
        break;
      case "--https":
        overrides.useSsh = false;
        break;
      case "--continue-on-error":
        overrides.failurePolicy = "continue";
        break;
      case "--dry-run":
        overrides.dryRun = true;
        break;
      default:
        throw new UsageError(
          arg.startsWith("-") ? `Unknown option: ${arg}` : `Unexpected argument: ${arg}`,
        );
    }
  }

  return { kind: "run", overrides };
}

export function formatCommand(args: string[]) {
  return ["git", ...args]
    .map((a) => (/[\s"']/.test(a) || a === "" ? JSON.stringify(a) : a))
    .join(" ");
}

export interface CliDeps {
  env?: Record<string, string | undefined>;
  createHost?: (config: RunConfig) => RepositoryHost;
  out?: (line: string) => void;
  err?: (line: string) => void;
}

function report(result: ProvisionReport, out: (line: string) => void, errOut: (line: string) => void) {
  if (result.dryRun) {
    out("Dry run: no request sent, no git command executed");
    out(`POST ${result.createUrl} ${JSON.stringify(result.requestBody)}`);
    out(`Remote URL: ${result.remoteUrl}`);
    for (const step of result.plannedSteps) out(formatCommand(step.args));
    return 0;
  }

  if (result.remote && !result.remote.ok) {
    errOut(`Remote provisioning failed: ${result.remote.error.message}`);
  }
  for (const failure of result.failures) {
    errOut(`Step ${failure.step} failed: ${failure.message}`);
  }
  if (!result.ok) {
    const count = result.failures.length + (result.remote && !result.remote.ok ? 1 : 0);
    errOut(`Completed with ${count} failure(s): ${result.remoteUrl}`);
    return 1;
  }

  if (result.remote?.ok) out(`Repository: ${result.remote.value.htmlUrl}`);
  out(`Deployment complete: ${result.remoteUrl}`);
  return 0;
}

/** Runs the CLI and resolves to the process exit code. */
export async function main(argv: string[], deps: CliDeps = {}): Promise<number> {
  const out = deps.out ?? ((line: string) => console.log(line));
  const errOut = deps.err ?? ((line: string) => console.error(line));

  let parsed: ParsedArgs;
  try {
    parsed = parseCliArgs(argv);
  } catch (e) {
    if (!(e instanceof UsageError)) throw e;
    errOut(`Error: ${e.message}`);
    printUsage(errOut);
    return 2;
  }

  if (parsed.kind === "help") {
    printUsage(out);
    return 0;
  }

  try {
    const config = await resolveRunConfig(parsed.overrides, deps.env ?? process.env);
    const host = deps.createHost
      ? deps.createHost(config)
      : new GitHubHost({ apiUrl: config.apiUrl, userAgent: cfg.userAgent });
    const result = await provisionAndPublish(config, { host });
    return report(result, out, errOut);
  } catch (e) {
    if (!isRepoLaunchError(e)) throw e;
    logger.debug("repo-launch failed", { code: e.code, error: e.message });
    errOut(`Error: ${e.message}`);
    return 1;
  }
}
