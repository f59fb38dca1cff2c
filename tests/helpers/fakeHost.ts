import type { RemoteDescriptor, RepositoryHost } from '../../src/hosting/RepositoryHost.js';
import { RemoteProvisioningError } from '../../src/errors.js';
import type { ProvisionRequest } from '../../src/schema.js';
import { err, ok, type Result } from '../../src/util/result.js';

export type HostCall = { request: ProvisionRequest; token: string };

/** In-process stand-in for a hosting platform; fails with `failure` when given one. */
export class FakeHost implements RepositoryHost {
  readonly name = 'fake';
  readonly calls: HostCall[] = [];

  constructor(private readonly failure?: { status: number; message: string }) {}

  async createRepository(
    request: ProvisionRequest,
    token: string,
  ): Promise<Result<RemoteDescriptor, RemoteProvisioningError>> {
    this.calls.push({ request, token });
    if (this.failure) {
      return err(new RemoteProvisioningError(this.failure.message, { status: this.failure.status }));
    }
    return ok({
      fullName: `${request.owner}/${request.repoName}`,
      htmlUrl: `https://github.com/${request.owner}/${request.repoName}`,
      cloneUrl: `https://github.com/${request.owner}/${request.repoName}.git`,
      sshUrl: `git@github.com:${request.owner}/${request.repoName}.git`,
      isPrivate: request.isPrivate,
    });
  }
}
