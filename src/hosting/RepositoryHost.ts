import type { RemoteProvisioningError } from "../errors.js";
import type { ProvisionRequest } from "../schema.js";
import type { Result } from "../util/result.js";

export interface RemoteDescriptor {
  fullName: string;
  htmlUrl: string;
  cloneUrl: string;
  sshUrl: string;
  isPrivate: boolean;
}

/** One implementation per hosting platform. */
export interface RepositoryHost {
  readonly name: string;
  createRepository(
    request: ProvisionRequest,
    token: string,
  ): Promise<Result<RemoteDescriptor, RemoteProvisioningError>>;
}
