import { QueryExecutor } from './db/transaction-utils';
import { AuthorizationPolicy, Capability, Project, User } from '../types/incoming-email';

/**
 * Project member access levels
 */
export enum AccessLevel {
  GUEST = 10,
  REPORTER = 20,
  DEVELOPER = 30,
  MAINTAINER = 40,
  OWNER = 50
}

/**
 * Minimum access level each capability needs
 */
export const REQUIRED_ACCESS: Record<Capability, AccessLevel> = {
  create_note: AccessLevel.GUEST,
  create_issue: AccessLevel.GUEST
};

/**
 * Capability checks backed by project membership.
 *
 * - Admins can do anything
 * - Archived projects accept nothing
 * - On public and internal projects every signed-in user counts as a guest
 */
export class ProjectAccessPolicy implements AuthorizationPolicy {
  constructor(private db: QueryExecutor) {}

  async hasCapability(user: User, project: Project, capability: Capability): Promise<boolean> {
    if (user.blocked) return false;
    if (user.admin) return true;
    if (project.archived) return false;

    const level = await this.accessLevel(user, project);
    return level >= REQUIRED_ACCESS[capability];
  }

  async accessLevel(user: User, project: Project): Promise<number> {
    const result = await this.db.query<{ access_level: number }>(
      'SELECT access_level FROM project_members WHERE project_id = $1 AND user_id = $2 LIMIT 1',
      [project.id, user.id]
    );

    const memberLevel = result.rows[0]?.access_level ?? 0;
    if (project.visibility !== 'private') {
      return Math.max(memberLevel, AccessLevel.GUEST);
    }
    return memberLevel;
  }
}
