/**
 * SentNotificationRepository
 * Records of notification emails sent with a reply key, and what they were about
 */

import { QueryExecutor } from '../db/transaction-utils';
import { ProjectRepository } from './project-repository';
import { UserRepository } from './user-repository';
import {
  ConversationContext,
  ConversationContextStore,
  NoteableReference,
  NoteableType,
  isNoteableType
} from '../../types/incoming-email';

export type SentNotificationRow = {
  reply_key: string;
  project_id: number | null;
  recipient_id: number | null;
  noteable_type: string;
  noteable_id: number | null;
  commit_id: string | null;
  line_code: string | null;
};

/**
 * Tables backing each noteable type that is referenced by id
 */
const NOTEABLE_TABLES: Record<Exclude<NoteableType, 'Commit'>, string> = {
  Issue: 'issues',
  MergeRequest: 'merge_requests',
  Snippet: 'snippets'
};

export class SentNotificationRepository implements ConversationContextStore {
  constructor(
    private db: QueryExecutor,
    private users: UserRepository,
    private projects: ProjectRepository
  ) {}

  async findByReplyKey(replyKey: string): Promise<ConversationContext | null> {
    const result = await this.db.query<SentNotificationRow>(`
      SELECT reply_key, project_id, recipient_id, noteable_type, noteable_id, commit_id, line_code
      FROM sent_notifications
      WHERE reply_key = $1
      LIMIT 1
    `, [replyKey]);

    const row = result.rows[0];
    if (!row) return null;

    const recipient = row.recipient_id !== null ? await this.users.findById(row.recipient_id) : null;
    const project = row.project_id !== null ? await this.projects.findById(row.project_id) : null;

    return {
      replyKey: row.reply_key,
      recipient,
      project,
      noteable: await this.findNoteable(row),
      noteableType: row.noteable_type,
      noteableId: row.noteable_id,
      commitId: row.commit_id,
      lineCode: row.line_code
    };
  }

  private async findNoteable(row: SentNotificationRow): Promise<NoteableReference | null> {
    const type = row.noteable_type;
    if (!isNoteableType(type)) return null;

    if (type === 'Commit') {
      return row.commit_id ? { type, commitId: row.commit_id } : null;
    }

    if (row.noteable_id === null) return null;

    const result = await this.db.query<{ id: number }>(
      `SELECT id FROM ${NOTEABLE_TABLES[type]} WHERE id = $1`,
      [row.noteable_id]
    );
    return result.rows[0] ? { type, id: result.rows[0].id } : null;
  }
}
