import {
  Attachment,
  AttachmentInput,
  AuditEntry,
  ContextReference,
  ContextTarget,
  CreateTaskPayload,
  MemberInput,
  Message,
  MessageKind,
  Project,
  ProjectAttachment,
  QuotedMessage,
  Subtask,
  SubtaskInput,
  Task,
  UpdateProjectPayload,
  UpdateTaskPayload,
  User
} from '../../types';
import { IProjectRepository } from '../../domain/repositories/IProjectRepository';
import { IAuditLogRepository } from '../../domain/repositories/IAuditLogRepository';
import { IEventBus } from '../../domain/events/IEventBus';
import { IIdGenerator } from '../../domain/common/IIdGenerator';
import { IClock } from '../../domain/common/IClock';
import { ILogger } from '../../domain/common/ILogger';
import { IAuthorizer } from '../../domain/services/IAuthorizer';
import {
  AttachmentLoadError,
  BusinessRuleError,
  ForbiddenError,
  NotFoundError,
  ValidationError
} from '../../domain/common/Errors';
import { findMember, isMember, toUser } from '../../domain/model/members';
import { findSubtask, isNewFor } from '../../domain/model/taskRules';
import { toggleReaction } from '../../domain/model/reactions';
import { KeyedLock } from '../../infrastructure/common/KeyedLock';
import { CommandResult, ProjectCommand, describeCommand } from '../commands/ProjectCommands';

const BASE64_PATTERN = /^[A-Za-z0-9+/]*={0,2}$/;

type Publish = (bus: IEventBus) => Promise<void>;

/**
 * State handed to a command while it holds the project lock.
 */
interface CommandContext {
  project: Project;
  actor: User;
  /** Never earlier than the newest message of the feed. */
  now: number;
  publish(fn: Publish): void;
}

export interface ProjectChatServiceOptions {
  maxImageBytes: number;
}

/**
 * Single mutation boundary of a project.
 *
 * Every change arrives as a ProjectCommand, runs under the project's lock
 * against a fresh copy of the aggregate, is saved, recorded in the audit
 * trail and then published on the event bus.
 */
export class ProjectChatService {
  private lock = new KeyedLock();

  constructor(
    private projectRepo: IProjectRepository,
    private auditRepo: IAuditLogRepository,
    private eventBus: IEventBus,
    private idGenerator: IIdGenerator,
    private clock: IClock,
    private authorizer: IAuthorizer,
    private logger: ILogger,
    private options: ProjectChatServiceOptions = { maxImageBytes: 10 * 1024 * 1024 }
  ) {}

  /**
   * Execute any command on behalf of a project member.
   */
  async execute(projectId: string, actorId: string, command: ProjectCommand): Promise<CommandResult> {
    switch (command.type) {
      case 'updateProject':
        return this.updateProject(projectId, actorId, command.changes);
      case 'addMember':
        return this.addMember(projectId, actorId, command.member);
      case 'setMuted':
        return this.setMuted(projectId, actorId, command.isMuted);
      case 'createTask':
        return this.createTask(projectId, actorId, command.payload);
      case 'updateTask':
        return this.updateTask(projectId, actorId, command.taskId, command.changes);
      case 'addSubtask':
        return this.addSubtask(projectId, actorId, command.taskId, command.subtask);
      case 'toggleTaskStatus':
        return this.toggleTaskStatus(projectId, actorId, command.taskId);
      case 'toggleSubtaskStatus':
        return this.toggleSubtaskStatus(projectId, actorId, command.taskId, command.subtaskId);
      case 'acceptTask':
        return this.acceptTask(projectId, actorId, command.taskId, command.message);
      case 'sendMessage':
        return this.sendMessage(projectId, actorId, command.content, command.context, command.quotedMessageId);
      case 'sendSystemMessage':
        return this.sendSystemMessage(projectId, actorId, command.content);
      case 'sendImageMessage':
        return this.sendImageMessage(projectId, actorId, command.imageData, command.fileName, command.caption);
      case 'addReaction':
        return this.addReaction(projectId, actorId, command.messageId, command.emoji);
      case 'addAttachments':
        return this.addAttachments(projectId, actorId, command.items, command.linkedTaskId, command.linkedSubtaskId, command.caption);
    }
  }

  // --- Project ---

  updateProject(projectId: string, actorId: string, changes: UpdateProjectPayload): Promise<Project> {
    return this.run(projectId, actorId, { type: 'updateProject', changes }, (ctx) => {
      if (changes.name !== undefined) {
        const name = changes.name.trim();
        if (!name) {
          throw new ValidationError('Project name cannot be empty');
        }
        ctx.project.name = name;
      }
      if (changes.description !== undefined) {
        ctx.project.description = changes.description.trim() || undefined;
      }
      const project = ctx.project;
      ctx.publish(bus => bus.emit('project:updated', project));
      return project;
    });
  }

  addMember(projectId: string, actorId: string, member: MemberInput): Promise<User> {
    return this.run(projectId, actorId, { type: 'addMember', member }, (ctx) => {
      if (!member.name.trim()) {
        throw new ValidationError('Member name is required');
      }
      if (isMember(ctx.project, member.id)) {
        throw new BusinessRuleError(`User '${member.id}' is already a member of this project`);
      }
      const user = toUser(member);
      ctx.project.members.push(user);
      ctx.publish(bus => bus.emit('member:added', { projectId, user }));
      return user;
    });
  }

  setMuted(projectId: string, actorId: string, isMuted: boolean): Promise<Project> {
    return this.run(projectId, actorId, { type: 'setMuted', isMuted }, (ctx) => {
      ctx.project.isMuted = isMuted;
      const project = ctx.project;
      ctx.publish(bus => bus.emit('project:updated', project));
      return project;
    });
  }

  // --- Tasks ---

  createTask(projectId: string, actorId: string, payload: CreateTaskPayload): Promise<Task> {
    return this.run(projectId, actorId, { type: 'createTask', payload }, (ctx) => {
      const title = this.requireTitle(payload.title, 'Task title');
      const assigneeIds = this.resolveAssignees(ctx.project, payload.assigneeIds ?? []);

      const taskId = this.idGenerator.generate('task');
      const task: Task = {
        id: taskId,
        title,
        status: 'pending',
        assigneeIds,
        dueDate: payload.dueDate,
        notes: payload.notes?.trim() || undefined,
        subtasks: [],
        attachments: (payload.attachments ?? []).map(item =>
          this.buildAttachment(item, ctx, { linkedTaskId: taskId })
        ),
        createdBy: ctx.actor.id,
        newForUserIds: [...assigneeIds],
        createdAt: ctx.now
      };
      task.subtasks = (payload.subtasks ?? []).map(input => this.buildSubtask(input, task, ctx));

      ctx.project.tasks.push(task);
      ctx.publish(bus => bus.emit('task:created', { projectId, task }));
      this.catalog(ctx, [...task.attachments, ...task.subtasks.flatMap(s => s.instructionAttachments)]);
      return task;
    });
  }

  updateTask(projectId: string, actorId: string, taskId: string, changes: UpdateTaskPayload): Promise<Task> {
    return this.run(projectId, actorId, { type: 'updateTask', taskId, changes }, (ctx) => {
      const task = this.requireTask(ctx.project, taskId);
      this.authorizeEdit(ctx.actor, task);

      if (changes.title !== undefined) {
        task.title = this.requireTitle(changes.title, 'Task title');
      }
      if (changes.notes !== undefined) {
        task.notes = changes.notes?.trim() || undefined;
      }
      if (changes.dueDate !== undefined) {
        task.dueDate = changes.dueDate ?? undefined;
      }
      if (changes.assigneeIds !== undefined) {
        const assigneeIds = this.resolveAssignees(ctx.project, changes.assigneeIds);
        const added = assigneeIds.filter(id => !task.assigneeIds.includes(id));
        task.newForUserIds = [
          ...task.newForUserIds.filter(id => assigneeIds.includes(id)),
          ...added.filter(id => !task.newForUserIds.includes(id))
        ];
        task.assigneeIds = assigneeIds;
      }

      ctx.publish(bus => bus.emit('task:updated', { projectId, task }));
      return task;
    });
  }

  addSubtask(projectId: string, actorId: string, taskId: string, input: SubtaskInput): Promise<Task> {
    return this.run(projectId, actorId, { type: 'addSubtask', taskId, subtask: input }, (ctx) => {
      const task = this.requireTask(ctx.project, taskId);
      this.authorizeEdit(ctx.actor, task);

      const subtask = this.buildSubtask(input, task, ctx);
      task.subtasks.push(subtask);

      ctx.publish(bus => bus.emit('task:updated', { projectId, task }));
      this.catalog(ctx, subtask.instructionAttachments);
      return task;
    });
  }

  /**
   * Flip a task between pending and done and post the matching status
   * message in the feed.
   */
  toggleTaskStatus(projectId: string, actorId: string, taskId: string): Promise<Message> {
    return this.run(projectId, actorId, { type: 'toggleTaskStatus', taskId }, (ctx) => {
      const task = this.requireTask(ctx.project, taskId);
      this.authorizeEdit(ctx.actor, task);

      const ref = { taskId: task.id, title: task.title };
      let kind: MessageKind;
      if (task.status === 'pending') {
        task.status = 'done';
        task.completedAt = ctx.now;
        kind = { type: 'taskCompleted', task: ref };
      } else {
        task.status = 'pending';
        task.completedAt = undefined;
        kind = { type: 'taskReopened', task: ref };
      }

      const message = this.appendMessage(ctx, {
        content: task.title,
        kind,
        context: { type: 'task', ...ref }
      });

      ctx.publish(bus => bus.emit('task:updated', { projectId, task }));
      return message;
    });
  }

  /**
   * Flip a subtask's completion and post a subtaskCompleted or
   * subtaskReopened message authored by the actor.
   */
  toggleSubtaskStatus(projectId: string, actorId: string, taskId: string, subtaskId: string): Promise<Message> {
    return this.run(projectId, actorId, { type: 'toggleSubtaskStatus', taskId, subtaskId }, (ctx) => {
      const task = this.requireTask(ctx.project, taskId);
      const subtask = task.subtasks.find(s => s.id === subtaskId);
      if (!subtask) {
        throw new NotFoundError('Subtask', subtaskId);
      }
      if (!this.authorizer.canPerform('toggleSubtask', ctx.actor, task, subtask)) {
        throw new ForbiddenError(`User '${ctx.actor.id}' cannot toggle subtask '${subtask.id}'`);
      }

      subtask.isDone = !subtask.isDone;

      const ref = { taskId: task.id, subtaskId: subtask.id, title: subtask.title };
      const message = this.appendMessage(ctx, {
        content: subtask.title,
        kind: subtask.isDone
          ? { type: 'subtaskCompleted', subtask: ref }
          : { type: 'subtaskReopened', subtask: ref },
        context: { type: 'subtask', ...ref }
      });

      ctx.publish(bus => bus.emit('task:updated', { projectId, task }));
      return message;
    });
  }

  /**
   * Acknowledge a new assignment. A non-blank message is posted to the feed
   * with a reference to the task.
   */
  acceptTask(projectId: string, actorId: string, taskId: string, message?: string): Promise<Task> {
    return this.run(projectId, actorId, { type: 'acceptTask', taskId, message }, (ctx) => {
      const task = this.requireTask(ctx.project, taskId);
      if (!isNewFor(task, ctx.actor.id)) {
        throw new BusinessRuleError(`Task '${task.id}' is not pending acceptance for user '${ctx.actor.id}'`);
      }

      task.newForUserIds = task.newForUserIds.filter(id => id !== ctx.actor.id);

      const content = message?.trim();
      if (content) {
        this.appendMessage(ctx, {
          content,
          kind: { type: 'regular' },
          context: { type: 'task', taskId: task.id, title: task.title }
        });
      }

      const userId = ctx.actor.id;
      ctx.publish(bus => bus.emit('task:accepted', { projectId, taskId: task.id, userId }));
      ctx.publish(bus => bus.emit('task:updated', { projectId, task }));
      return task;
    });
  }

  // --- Messages ---

  sendMessage(
    projectId: string,
    actorId: string,
    content: string,
    context: ContextTarget = { type: 'none' },
    quotedMessageId?: string
  ): Promise<Message> {
    return this.run(projectId, actorId, { type: 'sendMessage', content, context, quotedMessageId }, (ctx) => {
      const text = content.trim();
      if (!text) {
        throw new ValidationError('Message content cannot be empty');
      }

      return this.appendMessage(ctx, {
        content: text,
        kind: { type: 'regular' },
        context: this.resolveContext(ctx.project, context),
        quoted: quotedMessageId ? this.quote(ctx.project, quotedMessageId) : undefined
      });
    });
  }

  /**
   * Notices such as "shared a document" or "sent a voice message".
   */
  sendSystemMessage(projectId: string, actorId: string, content: string): Promise<Message> {
    return this.run(projectId, actorId, { type: 'sendSystemMessage', content }, (ctx) => {
      const text = content.trim();
      if (!text) {
        throw new ValidationError('Message content cannot be empty');
      }
      return this.appendMessage(ctx, { content: text, kind: { type: 'system' }, context: { type: 'none' } });
    });
  }

  /**
   * Post an image. The image also lands in the project's media catalog.
   */
  sendImageMessage(
    projectId: string,
    actorId: string,
    imageData: string,
    fileName?: string,
    caption?: string
  ): Promise<Message> {
    return this.run(projectId, actorId, { type: 'sendImageMessage', imageData, fileName, caption }, (ctx) => {
      const name = fileName?.trim() || `Photo_${ctx.now}.jpg`;
      const text = caption?.trim() || undefined;
      const attachment = this.buildAttachment(
        { type: 'image', fileName: name, fileSize: 0, imageData },
        ctx,
        { caption: text }
      );
      const message = this.appendMessage(ctx, {
        content: text ?? '',
        kind: { type: 'regular' },
        context: { type: 'none' },
        attachment
      });

      this.catalog(ctx, [attachment]);
      return message;
    });
  }

  /**
   * Toggle the actor's reaction: the same emoji twice removes it.
   */
  addReaction(projectId: string, actorId: string, messageId: string, emoji: string): Promise<Message> {
    return this.run(projectId, actorId, { type: 'addReaction', messageId, emoji }, (ctx) => {
      const symbol = emoji.trim();
      if (!symbol) {
        throw new ValidationError('Emoji is required');
      }
      const message = ctx.project.messages.find(m => m.id === messageId);
      if (!message) {
        throw new NotFoundError('Message', messageId);
      }

      message.reactions = toggleReaction(message.reactions, symbol, ctx.actor.id);

      ctx.publish(bus => bus.emit('message:updated', { projectId, message }));
      return message;
    });
  }

  // --- Attachments ---

  /**
   * Register one catalog entry per item, all sharing the same link and
   * caption. A subtask link alone is resolved to its parent task.
   */
  addAttachments(
    projectId: string,
    actorId: string,
    items: AttachmentInput[],
    linkedTaskId?: string,
    linkedSubtaskId?: string,
    caption?: string
  ): Promise<ProjectAttachment[]> {
    const command: ProjectCommand = { type: 'addAttachments', items, linkedTaskId, linkedSubtaskId, caption };
    return this.run(projectId, actorId, command, (ctx) => {
      if (items.length === 0) {
        throw new ValidationError('At least one attachment is required');
      }

      let taskId = linkedTaskId;
      if (linkedSubtaskId) {
        const found = findSubtask(ctx.project, linkedSubtaskId);
        if (!found) {
          throw new NotFoundError('Subtask', linkedSubtaskId);
        }
        if (taskId && taskId !== found.task.id) {
          throw new ValidationError(`Subtask '${linkedSubtaskId}' does not belong to task '${taskId}'`);
        }
        taskId = found.task.id;
      } else if (taskId) {
        this.requireTask(ctx.project, taskId);
      }

      const text = caption?.trim() || undefined;
      const attachments = items.map(item =>
        this.buildAttachment(item, ctx, { linkedTaskId: taskId, linkedSubtaskId, caption: text })
      );
      this.catalog(ctx, attachments);
      return attachments;
    });
  }

  // --- Internals ---

  private async run<R>(
    projectId: string,
    actorId: string,
    command: ProjectCommand,
    apply: (ctx: CommandContext) => R
  ): Promise<R> {
    return this.lock.run(projectId, async () => {
      const project = await this.projectRepo.findById(projectId);
      if (!project) {
        throw new NotFoundError('Project', projectId);
      }
      const actor = findMember(project, actorId);
      if (!actor) {
        throw new ForbiddenError(`User '${actorId}' is not a member of project '${projectId}'`);
      }

      const pending: Publish[] = [];
      const lastMessage = project.messages[project.messages.length - 1];
      const ctx: CommandContext = {
        project,
        actor,
        now: Math.max(this.clock.now(), lastMessage?.timestamp ?? 0),
        publish: (fn) => {
          pending.push(fn);
        }
      };

      const result = apply(ctx);
      const saved = await this.projectRepo.save(project);
      project.updatedAt = saved.updatedAt;

      const entry: AuditEntry = {
        id: this.idGenerator.generate('audit'),
        projectId,
        actorId,
        command: command.type,
        summary: describeCommand(command),
        at: ctx.now
      };
      // The change is already saved; a lost audit line must not fail it.
      try {
        await this.auditRepo.append(entry);
      } catch (err) {
        this.logger.error(
          `Failed to record audit entry for ${command.type}`,
          err instanceof Error ? err : new Error(String(err)),
          { projectId, actorId, entryId: entry.id }
        );
      }

      this.logger.info(`Command ${command.type} executed`, { projectId, actorId });

      for (const publish of pending) {
        await publish(this.eventBus);
      }
      await this.eventBus.emit('command:executed', entry);

      return result;
    });
  }

  private appendMessage(
    ctx: CommandContext,
    fields: Pick<Message, 'content' | 'kind' | 'context'> & Partial<Pick<Message, 'quoted' | 'attachment'>>
  ): Message {
    const message: Message = {
      id: this.idGenerator.generate('msg'),
      senderId: ctx.actor.id,
      timestamp: ctx.now,
      reactions: [],
      ...fields
    };
    ctx.project.messages.push(message);

    const projectId = ctx.project.id;
    ctx.publish(bus => bus.emit('message:created', { projectId, message }));
    return message;
  }

  /**
   * Register uploads in the project's media catalog.
   */
  private catalog(ctx: CommandContext, attachments: ProjectAttachment[]): void {
    if (attachments.length === 0) {
      return;
    }
    ctx.project.attachments.push(...attachments);

    const projectId = ctx.project.id;
    ctx.publish(bus => bus.emit('attachment:added', { projectId, attachments }));
  }

  private requireTitle(value: string, label: string): string {
    const title = value.trim();
    if (!title) {
      throw new ValidationError(`${label} is required`);
    }
    return title;
  }

  private requireTask(project: Project, taskId: string): Task {
    const task = project.tasks.find(t => t.id === taskId);
    if (!task) {
      throw new NotFoundError('Task', taskId);
    }
    return task;
  }

  private authorizeEdit(actor: User, task: Task): void {
    if (!this.authorizer.canPerform('editTask', actor, task)) {
      throw new ForbiddenError(`User '${actor.id}' cannot edit task '${task.id}'`);
    }
  }

  /**
   * Deduplicate and check that every assignee is a member.
   */
  private resolveAssignees(project: Project, ids: readonly string[]): string[] {
    const unique = Array.from(new Set(ids));
    const unknown = unique.filter(id => !isMember(project, id));
    if (unknown.length > 0) {
      throw new ValidationError('Assignees must be project members', { unknown });
    }
    return unique;
  }

  private buildSubtask(input: SubtaskInput, task: Task, ctx: CommandContext): Subtask {
    const subtaskId = this.idGenerator.generate('sub');
    return {
      id: subtaskId,
      title: this.requireTitle(input.title, 'Subtask title'),
      description: input.description?.trim() || undefined,
      isDone: false,
      assigneeIds: this.resolveAssignees(ctx.project, input.assigneeIds ?? []),
      dueDate: input.dueDate,
      instructionAttachments: (input.instructionAttachments ?? []).map(item =>
        this.buildAttachment(item, ctx, { linkedTaskId: task.id, linkedSubtaskId: subtaskId })
      ),
      createdAt: ctx.now
    };
  }

  private buildAttachment(
    item: AttachmentInput,
    ctx: CommandContext,
    link: { linkedTaskId?: string; linkedSubtaskId?: string; caption?: string }
  ): Attachment {
    const fileName = item.fileName.trim();
    if (!fileName) {
      throw new ValidationError('Attachment file name is required');
    }
    if (!Number.isInteger(item.fileSize) || item.fileSize < 0) {
      throw new ValidationError(`Attachment '${fileName}' has an invalid file size`);
    }

    let fileSize = item.fileSize;
    if (item.imageData !== undefined) {
      if (item.type !== 'image') {
        throw new ValidationError(`Attachment '${fileName}' carries image data but is a ${item.type}`);
      }
      fileSize = this.decodedImageSize(fileName, item.imageData);
    }

    return {
      id: this.idGenerator.generate('att'),
      type: item.type,
      fileName,
      fileSize,
      uploadedBy: ctx.actor.id,
      uploadedAt: ctx.now,
      linkedTaskId: link.linkedTaskId,
      linkedSubtaskId: link.linkedSubtaskId,
      caption: link.caption,
      imageData: item.imageData
    };
  }

  /**
   * Byte length of base64 image data.
   * @throws {AttachmentLoadError} when empty, malformed or too large
   */
  private decodedImageSize(fileName: string, imageData: string): number {
    if (imageData.length === 0) {
      throw new AttachmentLoadError(fileName, 'image data is empty');
    }
    if (imageData.length % 4 !== 0 || !BASE64_PATTERN.test(imageData)) {
      throw new AttachmentLoadError(fileName, 'image data is not valid base64');
    }
    const size = Buffer.from(imageData, 'base64').byteLength;
    if (size > this.options.maxImageBytes) {
      throw new AttachmentLoadError(fileName, `image exceeds ${this.options.maxImageBytes} bytes`);
    }
    return size;
  }

  private resolveContext(project: Project, target: ContextTarget): ContextReference {
    switch (target.type) {
      case 'none':
        return { type: 'none' };
      case 'task': {
        const task = this.requireTask(project, target.taskId);
        return { type: 'task', taskId: task.id, title: task.title };
      }
      case 'subtask': {
        const found = findSubtask(project, target.subtaskId);
        if (!found) {
          throw new NotFoundError('Subtask', target.subtaskId);
        }
        return { type: 'subtask', taskId: found.task.id, subtaskId: found.subtask.id, title: found.subtask.title };
      }
    }
  }

  private quote(project: Project, messageId: string): QuotedMessage {
    const quoted = project.messages.find(m => m.id === messageId);
    if (!quoted) {
      throw new NotFoundError('Message', messageId);
    }
    return {
      messageId: quoted.id,
      senderId: quoted.senderId,
      senderName: findMember(project, quoted.senderId)?.name ?? '',
      content: quoted.content
    };
  }
}
