import { Project } from '../../types';

export type CreateProjectInput = Omit<Project, 'id' | 'createdAt' | 'updatedAt'>;

/**
 * Storage of the project aggregate. Members, tasks, messages and the
 * attachment catalog are loaded and saved together, and every read hands
 * out a copy: changes only count once passed to `save`.
 */
export interface IProjectRepository {
  initialize(): Promise<void>;

  /** Assigns the id and both timestamps. */
  create(project: CreateProjectInput): Promise<Project>;

  findById(id: string): Promise<Project | null>;
  findAll(): Promise<Project[]>;

  /**
   * Replace the stored aggregate. `createdAt` is kept, `updatedAt` is set.
   * @throws {NotFoundError} for an id that was never created
   */
  save(project: Project): Promise<Project>;

  count(): Promise<number>;
}
