import { AttachmentType, AuditEntry, CreateProjectPayload, Message, Project, Subtask, Task, User } from '../../types';
import { IProjectRepository } from '../../domain/repositories/IProjectRepository';
import { IAuditLogRepository } from '../../domain/repositories/IAuditLogRepository';
import { IEventBus } from '../../domain/events/IEventBus';
import { IClock } from '../../domain/common/IClock';
import { IAuthorizer } from '../../domain/services/IAuthorizer';
import { ForbiddenError, NotFoundError, ValidationError } from '../../domain/common/Errors';
import { findMember, toUser } from '../../domain/model/members';
import {
  completedTasks,
  isDueToday,
  isTaskOverdue,
  newTasksFor,
  pendingTasks,
  sortSubtasksForDisplay,
  subtaskProgress
} from '../../domain/model/taskRules';
import { FeedItemLayout, layoutFeed, taskThread } from '../../domain/model/feedLayout';
import { ReactionGroup, groupReactions } from '../../domain/model/reactions';
import { MediaGroup, groupByLinkedTask, partitionByType } from '../../domain/model/mediaGroups';

export interface FeedEntry {
  message: Message;
  layout: FeedItemLayout;
  reactions: ReactionGroup[];
}

export interface TaskSummary {
  task: Task;
  isOverdue: boolean;
  isDueToday: boolean;
  progress: { completed: number; total: number };
}

/**
 * Everything a client needs to render a project chat for one user.
 */
export interface ChatState {
  project: Project;
  currentUser: User;
  feed: FeedEntry[];
  newTasks: TaskSummary[];
  newTasksCount: number;
  pendingCount: number;
  completedCount: number;
  editableTaskIds: string[];
  toggleableSubtaskIds: string[];
}

export interface TaskDetail extends TaskSummary {
  subtasks: Subtask[];
  messages: Message[];
  canEdit: boolean;
}

export type MediaLibrary = Record<AttachmentType, MediaGroup[]>;

/**
 * Application service for project creation and read models.
 * Mutations of an existing project go through ProjectChatService.
 */
export class ProjectService {
  constructor(
    private projectRepo: IProjectRepository,
    private auditRepo: IAuditLogRepository,
    private eventBus: IEventBus,
    private authorizer: IAuthorizer,
    private clock: IClock
  ) {}

  /**
   * Create a new project.
   */
  async createProject(input: CreateProjectPayload): Promise<Project> {
    const name = input.name.trim();
    if (!name) {
      throw new ValidationError('Project name is required');
    }

    const members = (input.members ?? []).map(toUser);
    const ids = new Set<string>();
    for (const member of members) {
      if (!member.name) {
        throw new ValidationError(`Member '${member.id}' needs a name`);
      }
      if (ids.has(member.id)) {
        throw new ValidationError(`Duplicate member id '${member.id}'`);
      }
      ids.add(member.id);
    }

    const project = await this.projectRepo.create({
      name,
      description: input.description?.trim() || undefined,
      members,
      tasks: [],
      messages: [],
      attachments: [],
      isMuted: false
    });

    await this.eventBus.emit('project:created', project);

    return project;
  }

  /**
   * Get a project by ID.
   */
  async getProject(id: string): Promise<Project> {
    const project = await this.projectRepo.findById(id);
    if (!project) {
      throw new NotFoundError('Project', id);
    }
    return project;
  }

  /**
   * List projects, optionally only those the user belongs to.
   */
  async listProjects(userId?: string): Promise<Project[]> {
    const projects = await this.projectRepo.findAll();
    if (!userId) return projects;
    return projects.filter(p => p.members.some(m => m.id === userId));
  }

  async getChatState(projectId: string, userId: string): Promise<ChatState> {
    const project = await this.getProject(projectId);
    const currentUser = this.requireMember(project, userId);
    const now = this.clock.now();

    const layout = layoutFeed(project.messages);
    const feed = project.messages.map((message, index) => ({
      message,
      layout: layout[index],
      reactions: groupReactions(message.reactions)
    }));

    const newTasks = newTasksFor(project, userId).map(task => this.summarize(task, now));

    const editableTaskIds: string[] = [];
    const toggleableSubtaskIds: string[] = [];
    for (const task of project.tasks) {
      if (this.authorizer.canPerform('editTask', currentUser, task)) {
        editableTaskIds.push(task.id);
      }
      for (const subtask of task.subtasks) {
        if (this.authorizer.canPerform('toggleSubtask', currentUser, task, subtask)) {
          toggleableSubtaskIds.push(subtask.id);
        }
      }
    }

    return {
      project,
      currentUser,
      feed,
      newTasks,
      newTasksCount: newTasks.length,
      pendingCount: pendingTasks(project).length,
      completedCount: completedTasks(project).length,
      editableTaskIds,
      toggleableSubtaskIds
    };
  }

  /**
   * Task detail with display-ordered subtasks and its whole discussion.
   */
  async getTaskDetail(projectId: string, userId: string, taskId: string): Promise<TaskDetail> {
    const project = await this.getProject(projectId);
    const user = this.requireMember(project, userId);
    const task = project.tasks.find(t => t.id === taskId);
    if (!task) {
      throw new NotFoundError('Task', taskId);
    }

    return {
      ...this.summarize(task, this.clock.now()),
      subtasks: sortSubtasksForDisplay(task.subtasks),
      messages: taskThread(project, task),
      canEdit: this.authorizer.canPerform('editTask', user, task)
    };
  }

  /**
   * Attachments split by type, each type grouped by linked task.
   */
  async getMediaLibrary(projectId: string, userId: string): Promise<MediaLibrary> {
    const project = await this.getProject(projectId);
    this.requireMember(project, userId);

    const titles = new Map(project.tasks.map(t => [t.id, t.title]));
    const titleOf = (taskId: string) => titles.get(taskId);
    const partitions = partitionByType(project.attachments);

    return {
      image: groupByLinkedTask(partitions.image, titleOf),
      document: groupByLinkedTask(partitions.document, titleOf),
      video: groupByLinkedTask(partitions.video, titleOf),
      contact: groupByLinkedTask(partitions.contact, titleOf)
    };
  }

  async getAuditLog(projectId: string, userId: string): Promise<AuditEntry[]> {
    const project = await this.getProject(projectId);
    this.requireMember(project, userId);
    return this.auditRepo.findByProjectId(projectId);
  }

  /**
   * Get project count.
   */
  async getProjectCount(): Promise<number> {
    return this.projectRepo.count();
  }

  private requireMember(project: Project, userId: string): User {
    const user = findMember(project, userId);
    if (!user) {
      throw new ForbiddenError(`User '${userId}' is not a member of project '${project.id}'`);
    }
    return user;
  }

  private summarize(task: Task, now: number): TaskSummary {
    return {
      task,
      isOverdue: isTaskOverdue(task, now),
      isDueToday: isDueToday(task, now),
      progress: subtaskProgress(task)
    };
  }
}
