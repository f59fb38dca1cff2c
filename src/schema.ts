import { z } from "zod";

const OWNER_PATTERN = /^[A-Za-z0-9-]+$/;
const REPO_NAME_PATTERN = /^[A-Za-z0-9._-]+$/;

export const ProvisionRequestSchema = z.object({
  owner: z
    .string()
    .trim()
    .min(1, "owner is required")
    .regex(OWNER_PATTERN, "owner may only contain letters, digits and hyphens"),
  repoName: z
    .string()
    .trim()
    .min(1, "repository name is required")
    .regex(
      REPO_NAME_PATTERN,
      "repository name may only contain letters, digits, '.', '_' and '-'",
    ),
  description: z.string(),
  isPrivate: z.boolean(),
  useSsh: z.boolean(),
});
export type ProvisionRequest = z.infer<typeof ProvisionRequestSchema>;

export const PublishSettingsSchema = z.object({
  cwd: z.string().min(1),
  branch: z.string().trim().min(1, "branch is required"),
  commitMessage: z.string(),
  remoteName: z.string().min(1),
});

export const ConfigFileSchema = z
  .object({
    owner: z.string().optional(),
    name: z.string().optional(),
    description: z.string().optional(),
    private: z.boolean().optional(),
    ssh: z.boolean().optional(),
    host: z.string().optional(),
    branch: z.string().optional(),
    message: z.string().optional(),
  })
  .strict();
export type ConfigFile = z.infer<typeof ConfigFileSchema>;

/** The subset of GitHub's repository payload this tool reports. */
export const CreatedRepositorySchema = z.object({
  full_name: z.string(),
  html_url: z.string(),
  clone_url: z.string(),
  ssh_url: z.string(),
  private: z.boolean(),
});

export const ApiErrorSchema = z.object({
  message: z.string(),
  errors: z
    .array(z.object({ message: z.string().optional() }).passthrough())
    .optional(),
});

export function describeIssues(error: z.ZodError, prefix?: string): string[] {
  return error.issues.map((issue) => {
    const key = [prefix, ...issue.path.map(String)].filter(Boolean).join(".");
    return key ? `${key}: ${issue.message}` : issue.message;
  });
}
