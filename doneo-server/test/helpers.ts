import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import { AuditEntry, Message, Project, Subtask, Task, User } from '../src/types';
import { IProjectRepository, CreateProjectInput } from '../src/domain/repositories/IProjectRepository';
import { IAuditLogRepository } from '../src/domain/repositories/IAuditLogRepository';
import { IIdGenerator } from '../src/domain/common/IIdGenerator';
import { IClock } from '../src/domain/common/IClock';
import { ILogger } from '../src/domain/common/ILogger';
import { NotFoundError } from '../src/domain/common/Errors';
import { InMemoryEventBus } from '../src/infrastructure/events/InMemoryEventBus';
import { MembershipAuthorizer } from '../src/infrastructure/auth/MembershipAuthorizer';
import { ProjectService } from '../src/application/services/ProjectService';
import { ProjectChatService } from '../src/application/services/ProjectChatService';
import { createApp } from '../src/app';

/**
 * Test helper utilities
 */

export class TestDataDir {
  private testDir: string;

  constructor() {
    // Use a unique test directory for each test run
    this.testDir = path.join(os.tmpdir(), `doneo-test-${Date.now()}-${Math.random().toString(36).slice(2, 8)}`);
  }

  getPath(): string {
    return this.testDir;
  }

  async cleanup(): Promise<void> {
    await fs.rm(this.testDir, { recursive: true, force: true });
  }
}

/**
 * Wait for a condition to become true
 */
export async function waitFor(
  condition: () => boolean | Promise<boolean>,
  timeout: number = 5000,
  interval: number = 20
): Promise<void> {
  const startTime = Date.now();

  while (Date.now() - startTime < timeout) {
    if (await condition()) {
      return;
    }
    await new Promise(resolve => setTimeout(resolve, interval));
  }

  throw new Error(`Timeout waiting for condition after ${timeout}ms`);
}

/**
 * Clock that only moves when told to.
 */
export class ManualClock implements IClock {
  constructor(private current: number = Date.UTC(2026, 0, 15, 12, 0, 0)) {}

  now(): number {
    return this.current;
  }

  set(time: number): void {
    this.current = time;
  }

  advance(ms: number): void {
    this.current += ms;
  }
}

/**
 * Predictable ids: task_1, msg_2, ...
 */
export class SequentialIdGenerator implements IIdGenerator {
  private counter = 0;

  generate(prefix: string): string {
    this.counter++;
    return `${prefix}_${this.counter}`;
  }
}

export function createSilentLogger(): ILogger {
  return {
    error: jest.fn(),
    warn: jest.fn(),
    info: jest.fn(),
    debug: jest.fn(),
  };
}

/**
 * In-process stand-in for the file system repository. Hands out copies so
 * callers cannot mutate stored state without saving.
 */
export class InMemoryProjectRepository implements IProjectRepository {
  private projects = new Map<string, Project>();
  saves = 0;

  constructor(private idGenerator: IIdGenerator, private clock: IClock) {}

  async initialize(): Promise<void> {}

  async create(input: CreateProjectInput): Promise<Project> {
    const now = this.clock.now();
    const project: Project = { ...input, id: this.idGenerator.generate('proj'), createdAt: now, updatedAt: now };
    this.projects.set(project.id, structuredClone(project));
    return structuredClone(project);
  }

  async findById(id: string): Promise<Project | null> {
    const project = this.projects.get(id);
    return project ? structuredClone(project) : null;
  }

  async findAll(): Promise<Project[]> {
    return Array.from(this.projects.values(), p => structuredClone(p));
  }

  async save(project: Project): Promise<Project> {
    if (!this.projects.has(project.id)) {
      throw new NotFoundError('Project', project.id);
    }
    const saved = { ...structuredClone(project), updatedAt: this.clock.now() };
    this.projects.set(project.id, saved);
    this.saves++;
    return structuredClone(saved);
  }

  async count(): Promise<number> {
    return this.projects.size;
  }

  /** Direct seeding for read-model tests. */
  put(project: Project): void {
    this.projects.set(project.id, structuredClone(project));
  }
}

export class InMemoryAuditLogRepository implements IAuditLogRepository {
  entries: AuditEntry[] = [];

  async initialize(): Promise<void> {}

  async append(entry: AuditEntry): Promise<void> {
    this.entries.push(entry);
  }

  async findByProjectId(projectId: string): Promise<AuditEntry[]> {
    return this.entries.filter(e => e.projectId === projectId);
  }
}

/**
 * Services and express app wired over the in-memory repositories.
 */
export function createTestServices(maxImageBytes: number = 1024) {
  const ids = new SequentialIdGenerator();
  const clock = new ManualClock();
  const logger = createSilentLogger();
  const projectRepo = new InMemoryProjectRepository(ids, clock);
  const auditRepo = new InMemoryAuditLogRepository();
  const eventBus = new InMemoryEventBus(logger);
  const authorizer = new MembershipAuthorizer();

  const projectService = new ProjectService(projectRepo, auditRepo, eventBus, authorizer, clock);
  const chatService = new ProjectChatService(
    projectRepo,
    auditRepo,
    eventBus,
    ids,
    clock,
    authorizer,
    logger,
    { maxImageBytes }
  );
  const app = createApp({ projectService, chatService, logger });

  return { app, ids, clock, logger, projectRepo, auditRepo, eventBus, projectService, chatService };
}

// --- Fixtures ---

export const ana: User = { id: 'u_ana', name: 'Ana Lopez', phoneNumber: '+10000000001', avatarInitials: 'AL' };
export const ben: User = { id: 'u_ben', name: 'Ben Ortiz', phoneNumber: '+10000000002', avatarInitials: 'BO' };
export const cleo: User = { id: 'u_cleo', name: 'Cleo Ruiz', phoneNumber: '+10000000003', avatarInitials: 'CR' };

export function createTestSubtask(overrides: Partial<Subtask> = {}): Subtask {
  return {
    id: 'sub_1',
    title: 'Get quotes',
    isDone: false,
    assigneeIds: [],
    instructionAttachments: [],
    createdAt: 0,
    ...overrides
  };
}

export function createTestTask(overrides: Partial<Task> = {}): Task {
  return {
    id: 'task_1',
    title: 'Buy materials',
    status: 'pending',
    assigneeIds: [],
    subtasks: [],
    attachments: [],
    newForUserIds: [],
    createdAt: 0,
    ...overrides
  };
}

export function createTestMessage(overrides: Partial<Message> = {}): Message {
  return {
    id: 'msg_1',
    senderId: ana.id,
    content: 'hello',
    timestamp: 0,
    kind: { type: 'regular' },
    context: { type: 'none' },
    reactions: [],
    ...overrides
  };
}

export function createTestProject(overrides: Partial<Project> = {}): Project {
  return {
    id: 'proj_1',
    name: 'Kitchen Remodel',
    members: [ana, ben, cleo],
    tasks: [],
    messages: [],
    attachments: [],
    isMuted: false,
    createdAt: 0,
    updatedAt: 0,
    ...overrides
  };
}
