/**
 * IssueCreateService
 * Validates and stores a new issue, numbering it within its project
 */

import { ConnectionPool, withTransaction } from './db/transaction-utils';
import { CreateIssueParams, CreationResult, Issue, IssueCreator } from '../types/incoming-email';

export const MAX_TITLE_LENGTH = 255;

type IssueRow = {
  id: number;
  iid: number;
  project_id: number;
  author_id: number;
  title: string;
  description: string;
};

export function validateIssue(params: CreateIssueParams): string[] {
  const errors: string[] = [];
  const title = params.title.trim();

  if (title === '') {
    errors.push("Title can't be blank");
  } else if (title.length > MAX_TITLE_LENGTH) {
    errors.push(`Title is too long (maximum is ${MAX_TITLE_LENGTH} characters)`);
  }

  return errors;
}

export class IssueCreateService implements IssueCreator {
  constructor(private pool: ConnectionPool) {}

  async create(params: CreateIssueParams): Promise<CreationResult<Issue>> {
    const errors = validateIssue(params);
    if (errors.length > 0) {
      return { persisted: false, errors, record: null };
    }

    const row = await withTransaction(this.pool, async (client) => {
      // Serialize iid assignment per project
      await client.query('SELECT id FROM projects WHERE id = $1 FOR UPDATE', [params.project.id]);

      const next = await client.query<{ next_iid: number }>(
        'SELECT COALESCE(MAX(iid), 0) + 1 AS next_iid FROM issues WHERE project_id = $1',
        [params.project.id]
      );

      const result = await client.query<IssueRow>(`
        INSERT INTO issues (project_id, iid, author_id, title, description, created_at, updated_at)
        VALUES ($1, $2, $3, $4, $5, NOW(), NOW())
        RETURNING id, iid, project_id, author_id, title, description
      `, [
        params.project.id,
        next.rows[0].next_iid,
        params.author.id,
        params.title.trim(),
        params.description
      ]);

      return result.rows[0];
    });

    return {
      persisted: true,
      errors: [],
      record: {
        id: row.id,
        iid: row.iid,
        projectId: row.project_id,
        authorId: row.author_id,
        title: row.title,
        description: row.description
      }
    };
  }
}
