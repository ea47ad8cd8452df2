import { AccessLevel, ProjectAccessPolicy } from '../project-access-policy';
import { Project, User } from '../../types/incoming-email';
import { createFakePool } from './test-utils';

const user: User = { id: 3, username: 'jane', email: 'jane@example.com', blocked: false, admin: false };
const privateProject: Project = { id: 7, fullPath: 'acme/widgets', visibility: 'private', archived: false };

function policyWithMembership(accessLevel: number | null) {
  const fake = createFakePool(() => (accessLevel === null ? [] : [{ access_level: accessLevel }]));
  return { policy: new ProjectAccessPolicy(fake.pool), queries: fake.queries };
}

describe('ProjectAccessPolicy', () => {
  it('should allow members at guest level to comment and open issues', async () => {
    const { policy, queries } = policyWithMembership(AccessLevel.GUEST);

    await expect(policy.hasCapability(user, privateProject, 'create_note')).resolves.toBe(true);
    await expect(policy.hasCapability(user, privateProject, 'create_issue')).resolves.toBe(true);
    expect(queries[0].values).toEqual([7, 3]);
  });

  it('should deny non-members of a private project', async () => {
    const { policy } = policyWithMembership(null);

    await expect(policy.hasCapability(user, privateProject, 'create_note')).resolves.toBe(false);
  });

  it('should treat any user as a guest on public and internal projects', async () => {
    const { policy } = policyWithMembership(null);

    await expect(policy.hasCapability(user, { ...privateProject, visibility: 'public' }, 'create_issue')).resolves.toBe(true);
    await expect(policy.hasCapability(user, { ...privateProject, visibility: 'internal' }, 'create_note')).resolves.toBe(true);
  });

  it('should deny everything on archived projects except to admins', async () => {
    const { policy, queries } = policyWithMembership(AccessLevel.OWNER);
    const archived = { ...privateProject, archived: true };

    await expect(policy.hasCapability(user, archived, 'create_note')).resolves.toBe(false);
    await expect(policy.hasCapability({ ...user, admin: true }, archived, 'create_note')).resolves.toBe(true);
    expect(queries).toHaveLength(0);
  });

  it('should deny blocked users', async () => {
    const { policy } = policyWithMembership(AccessLevel.OWNER);

    await expect(policy.hasCapability({ ...user, blocked: true }, privateProject, 'create_note')).resolves.toBe(false);
  });
});
