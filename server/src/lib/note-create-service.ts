/**
 * NoteCreateService
 * Validates and stores a comment on an issue, merge request, commit or snippet
 */

import { ConnectionPool, withTransaction } from './db/transaction-utils';
import { CreateNoteParams, CreationResult, Note, NoteCreator, isNoteableType } from '../types/incoming-email';

const LINE_CODE_PATTERN = /^[a-f0-9]+_\d+_\d+$/i;

// Noteables whose updated_at moves when they get a comment
const TOUCHED_TABLES: Record<string, string> = {
  Issue: 'issues',
  MergeRequest: 'merge_requests'
};

type NoteRow = {
  id: number;
  project_id: number;
  author_id: number;
  note: string;
  noteable_type: string;
  noteable_id: number | null;
  commit_id: string | null;
  line_code: string | null;
};

export function validateNote(params: CreateNoteParams): string[] {
  const errors: string[] = [];

  if (params.note.trim() === '') {
    errors.push("Note can't be blank");
  }
  if (!isNoteableType(params.noteableType)) {
    errors.push('Noteable type is not included in the list');
  } else if (params.noteableType === 'Commit' && !params.commitId) {
    errors.push("Commit can't be blank");
  } else if (params.noteableType !== 'Commit' && params.noteableId === null) {
    errors.push("Noteable can't be blank");
  }
  if (params.lineCode && !LINE_CODE_PATTERN.test(params.lineCode)) {
    errors.push('Line code is invalid');
  }

  return errors;
}

export class NoteCreateService implements NoteCreator {
  constructor(private pool: ConnectionPool) {}

  async create(params: CreateNoteParams): Promise<CreationResult<Note>> {
    const errors = validateNote(params);
    if (errors.length > 0) {
      return { persisted: false, errors, record: null };
    }

    const row = await withTransaction(this.pool, async (client) => {
      const result = await client.query<NoteRow>(`
        INSERT INTO notes (
          project_id, author_id, note, noteable_type, noteable_id,
          commit_id, line_code, created_at, updated_at
        )
        VALUES ($1, $2, $3, $4, $5, $6, $7, NOW(), NOW())
        RETURNING id, project_id, author_id, note, noteable_type, noteable_id, commit_id, line_code
      `, [
        params.project.id,
        params.author.id,
        params.note,
        params.noteableType,
        params.noteableId,
        params.commitId,
        params.lineCode
      ]);

      const touched = TOUCHED_TABLES[params.noteableType];
      if (touched) {
        await client.query(`UPDATE ${touched} SET updated_at = NOW() WHERE id = $1`, [params.noteableId]);
      }

      return result.rows[0];
    });

    return {
      persisted: true,
      errors: [],
      record: {
        id: row.id,
        projectId: row.project_id,
        authorId: row.author_id,
        note: row.note,
        noteableType: row.noteable_type,
        noteableId: row.noteable_id,
        commitId: row.commit_id,
        lineCode: row.line_code
      }
    };
  }
}
