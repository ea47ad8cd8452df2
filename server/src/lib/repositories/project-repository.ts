/**
 * ProjectRepository
 * Resolves projects by id or by their namespace path ("group/project")
 */

import { QueryExecutor } from '../db/transaction-utils';
import { Project, ProjectResolver, ProjectVisibility } from '../../types/incoming-email';

export type ProjectRow = {
  id: number;
  full_path: string;
  visibility: string;
  archived: boolean;
};

const VISIBILITIES: readonly ProjectVisibility[] = ['private', 'internal', 'public'];

function toVisibility(value: string): ProjectVisibility {
  return VISIBILITIES.find(visibility => visibility === value) ?? 'private';
}

export function toProject(row: ProjectRow): Project {
  return {
    id: row.id,
    fullPath: row.full_path,
    visibility: toVisibility(row.visibility),
    archived: row.archived
  };
}

export class ProjectRepository implements ProjectResolver {
  constructor(private db: QueryExecutor) {}

  async findById(id: number): Promise<Project | null> {
    const result = await this.db.query<ProjectRow>(
      'SELECT id, full_path, visibility, archived FROM projects WHERE id = $1',
      [id]
    );
    return result.rows[0] ? toProject(result.rows[0]) : null;
  }

  async findByFullPath(fullPath: string): Promise<Project | null> {
    const result = await this.db.query<ProjectRow>(
      'SELECT id, full_path, visibility, archived FROM projects WHERE lower(full_path) = lower($1)',
      [fullPath.trim()]
    );
    return result.rows[0] ? toProject(result.rows[0]) : null;
  }

  /**
   * A reply key that is not a notification key is read as a project path
   */
  async findByRoutingKey(routingKey: string): Promise<Project | null> {
    if (!routingKey.includes('/')) return null;
    return this.findByFullPath(routingKey);
  }
}
