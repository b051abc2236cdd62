import { AuditEntry } from '../../types';

/**
 * Append-only store of executed commands.
 */
export interface IAuditLogRepository {
  initialize(): Promise<void>;

  append(entry: AuditEntry): Promise<void>;

  /**
   * Entries of a project, oldest first.
   */
  findByProjectId(projectId: string): Promise<AuditEntry[]>;
}
