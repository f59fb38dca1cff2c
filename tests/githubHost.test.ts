import { describe, it, expect, vi, beforeEach } from 'vitest';
import { fetch, Response } from 'undici';
import {
  GitHubHost,
  buildAuthorizationHeader,
  buildCreateRepositoryBody,
} from '../src/hosting/GitHubHost.js';
import { ConfigurationError, RemoteProvisioningError } from '../src/errors.js';
import type { ProvisionRequest } from '../src/schema.js';

vi.mock('undici', async () => {
  const undici = await vi.importActual<typeof import('undici')>('undici');
  return {
    ...undici,
    fetch: vi.fn(),
  };
});

const request: ProvisionRequest = {
  owner: 'bob',
  repoName: 'demo',
  description: 'Demo project',
  isPrivate: false,
  useSsh: false,
};

const createdPayload = {
  id: 1,
  full_name: 'bob/demo',
  html_url: 'https://github.com/bob/demo',
  clone_url: 'https://github.com/bob/demo.git',
  ssh_url: 'git@github.com:bob/demo.git',
  private: false,
};

function respond(status: number, body: unknown) {
  vi.mocked(fetch).mockResolvedValueOnce(
    new Response(JSON.stringify(body), {
      status,
      headers: { 'Content-Type': 'application/json' },
    }),
  );
}

beforeEach(() => {
  vi.mocked(fetch).mockReset();
});

describe('buildCreateRepositoryBody', () => {
  it('carries exactly name, private and description', () => {
    const body = buildCreateRepositoryBody({
      owner: 'someone',
      repoName: 'x',
      description: 'd',
      isPrivate: true,
      useSsh: true,
    });
    expect(JSON.stringify(body)).toBe('{"name":"x","private":true,"description":"d"}');
  });
});

describe('buildAuthorizationHeader', () => {
  it('uses the token scheme', () => {
    expect(buildAuthorizationHeader('test-secret')).toBe('token test-secret');
  });

  it('rejects an empty or blank token', () => {
    expect(() => buildAuthorizationHeader('')).toThrow(ConfigurationError);
    expect(() => buildAuthorizationHeader('   ')).toThrow('GITHUB_TOKEN is not set');
    expect(() => buildAuthorizationHeader(undefined)).toThrow(ConfigurationError);
  });
});

describe('GitHubHost.createRepository', () => {
  it('sends one authenticated POST to /user/repos', async () => {
    respond(201, createdPayload);
    const host = new GitHubHost();

    const result = await host.createRepository(request, 'test-secret');

    expect(fetch).toHaveBeenCalledTimes(1);
    const [url, init] = vi.mocked(fetch).mock.calls[0];
    expect(url).toBe('https://api.github.com/user/repos');
    expect(init?.method).toBe('POST');
    expect(init?.headers).toEqual({
      Authorization: 'token test-secret',
      Accept: 'application/vnd.github+json',
      'Content-Type': 'application/json',
      'User-Agent': 'repo-launch',
    });
    expect(JSON.parse(String(init?.body))).toEqual({
      name: 'demo',
      private: false,
      description: 'Demo project',
    });

    expect(result).toEqual({
      ok: true,
      value: {
        fullName: 'bob/demo',
        htmlUrl: 'https://github.com/bob/demo',
        cloneUrl: 'https://github.com/bob/demo.git',
        sshUrl: 'git@github.com:bob/demo.git',
        isPrivate: false,
      },
    });
  });

  it('targets a custom API base without a doubled slash', async () => {
    respond(201, createdPayload);
    const host = new GitHubHost({ apiUrl: 'https://ghe.example.com/api/v3/' });

    await host.createRepository(request, 'test-secret');

    expect(vi.mocked(fetch).mock.calls[0][0]).toBe('https://ghe.example.com/api/v3/user/repos');
  });

  it('never sends a request without a token', async () => {
    const host = new GitHubHost();

    await expect(host.createRepository(request, '')).rejects.toBeInstanceOf(ConfigurationError);
    expect(fetch).not.toHaveBeenCalled();
  });

  it('reports a name collision with the API detail', async () => {
    respond(422, {
      message: 'Repository creation failed.',
      errors: [{ resource: 'Repository', code: 'custom', field: 'name', message: 'name already exists on this account' }],
    });
    const host = new GitHubHost();

    const result = await host.createRepository(request, 'test-secret');

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(RemoteProvisioningError);
    expect(result.error.status).toBe(422);
    expect(result.error.message).toBe(
      'GitHub API returned 422: Repository creation failed. (name already exists on this account)',
    );
  });

  it('reports bad credentials', async () => {
    respond(401, { message: 'Bad credentials' });

    const result = await new GitHubHost().createRepository(request, 'test-secret');

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.status).toBe(401);
    expect(result.error.apiMessage).toBe('Bad credentials');
    expect(result.error.message).toBe('GitHub API returned 401: Bad credentials');
  });

  it('turns a network failure into a provisioning error with status 0', async () => {
    vi.mocked(fetch).mockRejectedValueOnce(new TypeError('fetch failed'));

    const result = await new GitHubHost().createRepository(request, 'test-secret');

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.status).toBe(0);
    expect(result.error.message).toBe('GitHub request failed: fetch failed');
  });

  it('rejects a 201 response that is not a repository', async () => {
    respond(201, { unexpected: true });

    const result = await new GitHubHost().createRepository(request, 'test-secret');

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.status).toBe(201);
    expect(result.error.message).toBe('GitHub API returned an unexpected repository payload');
  });
});
