import * as fs from 'fs/promises';
import * as path from 'path';
import { AuditEntry } from '../../types';
import { IAuditLogRepository } from '../../domain/repositories/IAuditLogRepository';
import { ILogger } from '../../domain/common/ILogger';

/**
 * Audit trail stored as one JSON-lines file per project.
 */
export class FileSystemAuditLogRepository implements IAuditLogRepository {
  private auditDir: string;
  private initialized: boolean = false;

  constructor(dataDir: string, private logger: ILogger) {
    this.auditDir = path.join(dataDir, 'audit');
  }

  async initialize(): Promise<void> {
    if (this.initialized) return;
    await fs.mkdir(this.auditDir, { recursive: true });
    this.initialized = true;
  }

  private fileFor(projectId: string): string {
    return path.join(this.auditDir, `${projectId}.jsonl`);
  }

  async append(entry: AuditEntry): Promise<void> {
    await this.initialize();
    await fs.appendFile(this.fileFor(entry.projectId), `${JSON.stringify(entry)}\n`, 'utf-8');
  }

  async findByProjectId(projectId: string): Promise<AuditEntry[]> {
    await this.initialize();

    let data: string;
    try {
      data = await fs.readFile(this.fileFor(projectId), 'utf-8');
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code === 'ENOENT') {
        return [];
      }
      throw err;
    }

    const entries: AuditEntry[] = [];
    for (const line of data.split('\n')) {
      if (!line.trim()) continue;
      try {
        entries.push(JSON.parse(line) as AuditEntry);
      } catch (err) {
        this.logger.warn('Skipping malformed audit line', { projectId, error: err instanceof Error ? err.message : String(err) });
      }
    }
    return entries;
  }
}
