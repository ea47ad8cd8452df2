import { UserRepository } from '../user-repository';
import { ProjectRepository } from '../project-repository';
import { SentNotificationRepository } from '../sent-notification-repository';
import { createFakePool } from '../../__tests__/test-utils';

const janeRow = { id: 3, username: 'jane', email: 'Jane@Example.com', state: 'active', admin: false };
const projectRow = { id: 7, full_path: 'acme/widgets', visibility: 'internal', archived: false };

describe('UserRepository', () => {
  it('should match addresses case-insensitively', async () => {
    const { pool, queries } = createFakePool(() => [janeRow]);
    const users = new UserRepository(pool);

    const user = await users.findByAnyEmail('  JANE@example.com ');

    expect(user).toEqual({ id: 3, username: 'jane', email: 'Jane@Example.com', blocked: false, admin: false });
    expect(queries[0].values).toEqual(['jane@example.com']);
  });

  it('should map the blocked state', async () => {
    const { pool } = createFakePool(() => [{ ...janeRow, state: 'blocked' }]);

    const user = await new UserRepository(pool).findById(3);

    expect(user?.blocked).toBe(true);
  });

  it('should skip the query for a blank address', async () => {
    const { pool, queries } = createFakePool(() => [janeRow]);

    await expect(new UserRepository(pool).findByAnyEmail('  ')).resolves.toBeNull();
    expect(queries).toHaveLength(0);
  });
});

describe('ProjectRepository', () => {
  it('should resolve a namespaced routing key to a project', async () => {
    const { pool, queries } = createFakePool(() => [projectRow]);

    const project = await new ProjectRepository(pool).findByRoutingKey('acme/widgets');

    expect(project).toEqual({ id: 7, fullPath: 'acme/widgets', visibility: 'internal', archived: false });
    expect(queries[0].values).toEqual(['acme/widgets']);
  });

  it('should not read a key without a namespace as a project path', async () => {
    const { pool, queries } = createFakePool(() => [projectRow]);

    await expect(new ProjectRepository(pool).findByRoutingKey('0123abcd')).resolves.toBeNull();
    expect(queries).toHaveLength(0);
  });

  it('should treat an unknown visibility as private', async () => {
    const { pool } = createFakePool(() => [{ ...projectRow, visibility: 'secret' }]);

    const project = await new ProjectRepository(pool).findById(7);

    expect(project?.visibility).toBe('private');
  });
});

describe('SentNotificationRepository', () => {
  function repositoryWith(notification: Record<string, unknown> | null, noteableExists = true) {
    const fake = createFakePool((text) => {
      if (text.includes('FROM sent_notifications')) return notification ? [notification] : [];
      if (text.includes('FROM users')) return [janeRow];
      if (text.includes('FROM projects')) return [projectRow];
      if (text.includes('FROM issues') || text.includes('FROM merge_requests')) {
        return noteableExists ? [{ id: 42 }] : [];
      }
      return [];
    });
    const repository = new SentNotificationRepository(
      fake.pool,
      new UserRepository(fake.pool),
      new ProjectRepository(fake.pool)
    );
    return { repository, queries: fake.queries };
  }

  const issueNotification = {
    reply_key: 'abc123',
    project_id: 7,
    recipient_id: 3,
    noteable_type: 'Issue',
    noteable_id: 42,
    commit_id: null,
    line_code: null
  };

  it('should load the recipient, project and noteable for a reply key', async () => {
    const { repository } = repositoryWith(issueNotification);

    const context = await repository.findByReplyKey('abc123');

    expect(context).toEqual({
      replyKey: 'abc123',
      recipient: { id: 3, username: 'jane', email: 'Jane@Example.com', blocked: false, admin: false },
      project: { id: 7, fullPath: 'acme/widgets', visibility: 'internal', archived: false },
      noteable: { type: 'Issue', id: 42 },
      noteableType: 'Issue',
      noteableId: 42,
      commitId: null,
      lineCode: null
    });
  });

  it('should return null for an unknown reply key', async () => {
    const { repository } = repositoryWith(null);

    await expect(repository.findByReplyKey('missing')).resolves.toBeNull();
  });

  it('should leave the noteable empty when it was deleted', async () => {
    const { repository } = repositoryWith(issueNotification, false);

    const context = await repository.findByReplyKey('abc123');

    expect(context?.noteable).toBeNull();
    expect(context?.noteableId).toBe(42);
  });

  it('should reference commits by sha without a lookup', async () => {
    const { repository, queries } = repositoryWith({
      ...issueNotification,
      noteable_type: 'Commit',
      noteable_id: null,
      commit_id: 'abc123def'
    });

    const context = await repository.findByReplyKey('abc123');

    expect(context?.noteable).toEqual({ type: 'Commit', commitId: 'abc123def' });
    expect(queries.some(q => q.text.includes('commits'))).toBe(false);
  });

  it('should leave the noteable empty for an unknown type', async () => {
    const { repository } = repositoryWith({ ...issueNotification, noteable_type: 'Epic' });

    const context = await repository.findByReplyKey('abc123');

    expect(context?.noteable).toBeNull();
    expect(context?.noteableType).toBe('Epic');
  });
});
