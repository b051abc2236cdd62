import * as fs from 'fs/promises';
import * as path from 'path';
import { Project } from '../../types';
import { IProjectRepository, CreateProjectInput } from '../../domain/repositories/IProjectRepository';
import { IIdGenerator } from '../../domain/common/IIdGenerator';
import { ILogger } from '../../domain/common/ILogger';
import { IClock } from '../../domain/common/IClock';
import { NotFoundError } from '../../domain/common/Errors';

/**
 * One JSON file per project under `{dataDir}/projects`, cached in memory
 * after the first load. Files are replaced through a temporary file and a
 * rename so a crash never leaves half an aggregate behind.
 */
export class FileSystemProjectRepository implements IProjectRepository {
  private readonly projectsDir: string;
  private readonly cache = new Map<string, Project>();
  private loading: Promise<void> | null = null;

  constructor(
    dataDir: string,
    private readonly idGenerator: IIdGenerator,
    private readonly clock: IClock,
    private readonly logger: ILogger
  ) {
    this.projectsDir = path.join(dataDir, 'projects');
  }

  /**
   * Load every stored project. Unreadable files are logged and skipped.
   */
  initialize(): Promise<void> {
    this.loading ??= this.load().catch((err: unknown) => {
      this.loading = null;
      throw err;
    });
    return this.loading;
  }

  private async load(): Promise<void> {
    await fs.mkdir(this.projectsDir, { recursive: true });

    const files = (await fs.readdir(this.projectsDir)).filter(f => f.endsWith('.json'));
    for (const file of files) {
      try {
        const project = JSON.parse(await fs.readFile(path.join(this.projectsDir, file), 'utf-8')) as Project;
        this.cache.set(project.id, project);
      } catch (err) {
        this.logger.warn(`Failed to load project file: ${file}`, {
          error: err instanceof Error ? err.message : String(err)
        });
      }
    }

    this.logger.info(`Loaded ${this.cache.size} projects`, { dir: this.projectsDir });
  }

  private async persist(project: Project): Promise<void> {
    const filePath = path.join(this.projectsDir, `${project.id}.json`);
    const tmpPath = `${filePath}.tmp`;
    await fs.writeFile(tmpPath, JSON.stringify(project, null, 2));
    await fs.rename(tmpPath, filePath);
    this.cache.set(project.id, structuredClone(project));
  }

  async create(input: CreateProjectInput): Promise<Project> {
    await this.initialize();

    const now = this.clock.now();
    const project: Project = { ...input, id: this.idGenerator.generate('proj'), createdAt: now, updatedAt: now };
    await this.persist(project);

    this.logger.debug(`Created project: ${project.id}`);
    return structuredClone(project);
  }

  async findById(id: string): Promise<Project | null> {
    await this.initialize();
    const project = this.cache.get(id);
    return project ? structuredClone(project) : null;
  }

  async findAll(): Promise<Project[]> {
    await this.initialize();
    return Array.from(this.cache.values(), p => structuredClone(p));
  }

  async save(project: Project): Promise<Project> {
    await this.initialize();

    const existing = this.cache.get(project.id);
    if (!existing) {
      throw new NotFoundError('Project', project.id);
    }

    const saved: Project = { ...project, createdAt: existing.createdAt, updatedAt: this.clock.now() };
    await this.persist(saved);

    this.logger.debug(`Saved project: ${saved.id}`);
    return structuredClone(saved);
  }

  async count(): Promise<number> {
    await this.initialize();
    return this.cache.size;
  }
}
