import { NoteCreateService, validateNote } from '../note-create-service';
import { CreateNoteParams } from '../../types/incoming-email';
import { createFakePool, statements } from './test-utils';

const baseParams: CreateNoteParams = {
  project: { id: 7, fullPath: 'acme/widgets', visibility: 'private', archived: false },
  author: { id: 3, username: 'jane', email: 'jane@example.com', blocked: false, admin: false },
  note: 'Looks good to me',
  noteableType: 'Issue',
  noteableId: 42,
  commitId: null,
  lineCode: null
};

const insertedRow = {
  id: 100,
  project_id: 7,
  author_id: 3,
  note: 'Looks good to me',
  noteable_type: 'Issue',
  noteable_id: 42,
  commit_id: null,
  line_code: null
};

describe('validateNote', () => {
  it('should accept a comment on an issue', () => {
    expect(validateNote(baseParams)).toEqual([]);
  });

  it('should reject a blank body', () => {
    expect(validateNote({ ...baseParams, note: '  \n ' })).toEqual(["Note can't be blank"]);
  });

  it('should reject an unknown noteable type', () => {
    expect(validateNote({ ...baseParams, noteableType: 'Epic' })).toEqual(['Noteable type is not included in the list']);
  });

  it('should require a commit id on commit comments', () => {
    expect(validateNote({ ...baseParams, noteableType: 'Commit', noteableId: null })).toEqual(["Commit can't be blank"]);
    expect(validateNote({ ...baseParams, noteableType: 'Commit', noteableId: null, commitId: 'abc123' })).toEqual([]);
  });

  it('should require a noteable id on other comments', () => {
    expect(validateNote({ ...baseParams, noteableId: null })).toEqual(["Noteable can't be blank"]);
  });

  it('should check the line code format', () => {
    expect(validateNote({ ...baseParams, lineCode: 'abc123_10_12' })).toEqual([]);
    expect(validateNote({ ...baseParams, lineCode: 'line 10' })).toEqual(['Line code is invalid']);
  });

  it('should report every problem at once', () => {
    expect(validateNote({ ...baseParams, note: '', noteableId: null, lineCode: 'x' })).toEqual([
      "Note can't be blank",
      "Noteable can't be blank",
      'Line code is invalid'
    ]);
  });
});

describe('NoteCreateService', () => {
  it('should insert the note and touch the issue inside one transaction', async () => {
    const { pool, client, queries } = createFakePool((text) => (text.includes('INSERT INTO notes') ? [insertedRow] : []));
    const service = new NoteCreateService(pool);

    const result = await service.create(baseParams);

    expect(result).toEqual({
      persisted: true,
      errors: [],
      record: {
        id: 100,
        projectId: 7,
        authorId: 3,
        note: 'Looks good to me',
        noteableType: 'Issue',
        noteableId: 42,
        commitId: null,
        lineCode: null
      }
    });
    expect(queries[0].text).toBe('BEGIN');
    expect(queries[queries.length - 1].text).toBe('COMMIT');
    const work = statements(queries);
    expect(work).toHaveLength(2);
    expect(work[0].values).toEqual([7, 3, 'Looks good to me', 'Issue', 42, null, null]);
    expect(work[1]).toEqual({ text: 'UPDATE issues SET updated_at = NOW() WHERE id = $1', values: [42] });
    expect(client.release).toHaveBeenCalledTimes(1);
  });

  it('should not touch any table for commit comments', async () => {
    const commitRow = { ...insertedRow, noteable_type: 'Commit', noteable_id: null, commit_id: 'abc123' };
    const { pool, queries } = createFakePool((text) => (text.includes('INSERT INTO notes') ? [commitRow] : []));
    const service = new NoteCreateService(pool);

    const result = await service.create({ ...baseParams, noteableType: 'Commit', noteableId: null, commitId: 'abc123' });

    expect(result.persisted).toBe(true);
    expect(result.record?.commitId).toBe('abc123');
    expect(statements(queries)).toHaveLength(1);
  });

  it('should return validation errors without opening a transaction', async () => {
    const { pool, queries } = createFakePool();
    const service = new NoteCreateService(pool);

    const result = await service.create({ ...baseParams, note: '' });

    expect(result).toEqual({ persisted: false, errors: ["Note can't be blank"], record: null });
    expect(pool.connect).not.toHaveBeenCalled();
    expect(queries).toHaveLength(0);
  });
});
