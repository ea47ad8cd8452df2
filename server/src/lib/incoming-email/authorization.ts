import { AuthorizationPolicy, Capability, Project, User } from '../../types/incoming-email';
import {
  UserBlockedError,
  UserNotAuthorizedError,
  UserNotFoundError
} from '../../types/incoming-email-errors';

export interface AuthorizedInput {
  author: User;
  project: Project;
}

/**
 * Gate every content-creating path goes through.
 *
 * Checks run in a fixed order: existence, then blocked state, then capability.
 * A blocked user is reported as blocked even when they also lack access.
 * Resolves with the same author and project once both are known to be usable.
 */
export async function checkInput(
  author: User | null,
  project: Project | null,
  capability: Capability,
  policy: AuthorizationPolicy
): Promise<AuthorizedInput> {
  if (!author) {
    throw new UserNotFoundError();
  }

  if (author.blocked) {
    throw new UserBlockedError();
  }

  // A missing project is reported the same way as missing access
  if (!project || !(await policy.hasCapability(author, project, capability))) {
    throw new UserNotAuthorizedError();
  }

  return { author, project };
}
