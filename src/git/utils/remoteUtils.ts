export const DEFAULT_HOST = "github.com";

export function resolveRemoteUrl(
  owner: string,
  repoName: string,
  useSsh: boolean,
  host: string = DEFAULT_HOST,
): string {
  if (useSsh) return `git@${host}:${owner}/${repoName}.git`;
  return `https://${host}/${owner}/${repoName}.git`;
}

export function maskRemote(remote: string) {
  try {
    const url = new URL(remote);
    url.username = "";
    url.password = "";
    return `${url.protocol}//${url.host}${url.pathname}${url.search}`;
  } catch {
    return remote;
  }
}
