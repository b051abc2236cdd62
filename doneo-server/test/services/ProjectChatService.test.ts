import { ProjectChatService } from '../../src/application/services/ProjectChatService';
import { InMemoryEventBus } from '../../src/infrastructure/events/InMemoryEventBus';
import { MembershipAuthorizer } from '../../src/infrastructure/auth/MembershipAuthorizer';
import {
  AttachmentLoadError,
  BusinessRuleError,
  ForbiddenError,
  NotFoundError,
  ValidationError
} from '../../src/domain/common/Errors';
import { isNewFor } from '../../src/domain/model/taskRules';
import { User } from '../../src/types';
import {
  InMemoryAuditLogRepository,
  InMemoryProjectRepository,
  ManualClock,
  SequentialIdGenerator,
  ana,
  ben,
  cleo,
  createSilentLogger,
  createTestMessage,
  createTestProject,
  createTestSubtask,
  createTestTask
} from '../helpers';

const dina: User = { id: 'u_dina', name: 'Dina Park', phoneNumber: '', avatarInitials: 'DP' };

// "hello"
const HELLO_BASE64 = 'aGVsbG8=';

describe('ProjectChatService', () => {
  let repo: InMemoryProjectRepository;
  let audit: InMemoryAuditLogRepository;
  let bus: InMemoryEventBus;
  let ids: SequentialIdGenerator;
  let clock: ManualClock;
  let service: ProjectChatService;

  beforeEach(() => {
    ids = new SequentialIdGenerator();
    clock = new ManualClock();
    repo = new InMemoryProjectRepository(ids, clock);
    audit = new InMemoryAuditLogRepository();
    bus = new InMemoryEventBus(createSilentLogger());
    service = new ProjectChatService(
      repo,
      audit,
      bus,
      ids,
      clock,
      new MembershipAuthorizer(),
      createSilentLogger(),
      { maxImageBytes: 16 }
    );
    repo.put(createTestProject({ members: [ana, ben, cleo, dina] }));
  });

  async function stored() {
    const project = await repo.findById('proj_1');
    if (!project) throw new Error('project missing');
    return project;
  }

  describe('createTask', () => {
    it('should create a task with deduplicated assignees and mark it new for each of them', async () => {
      const task = await service.createTask('proj_1', ana.id, {
        title: '  Paint walls ',
        assigneeIds: [ben.id, ana.id, ben.id],
        subtasks: [{ title: 'Buy paint', assigneeIds: [cleo.id] }]
      });

      expect(task.id).toBe('task_1');
      expect(task.title).toBe('Paint walls');
      expect(task.assigneeIds).toEqual([ben.id, ana.id]);
      expect(task.newForUserIds).toEqual([ben.id, ana.id]);
      expect(task.createdBy).toBe(ana.id);
      expect(task.createdAt).toBe(clock.now());
      expect(task.subtasks).toHaveLength(1);
      expect(task.subtasks[0]).toMatchObject({ id: 'sub_2', title: 'Buy paint', isDone: false, assigneeIds: [cleo.id] });

      expect((await stored()).tasks).toEqual([task]);
    });

    it('should reject assignees who are not members', async () => {
      await expect(
        service.createTask('proj_1', ana.id, { title: 'Paint walls', assigneeIds: ['u_stranger'] })
      ).rejects.toThrow(ValidationError);

      expect(repo.saves).toBe(0);
      expect(audit.entries).toHaveLength(0);
    });

    it('should reject a blank title', async () => {
      await expect(service.createTask('proj_1', ana.id, { title: '   ' })).rejects.toThrow('Task title is required');
    });

    it('should link task attachments to the new task', async () => {
      const task = await service.createTask('proj_1', ana.id, {
        title: 'Paint walls',
        attachments: [{ type: 'document', fileName: 'plan.pdf', fileSize: 2048 }]
      });

      expect(task.attachments[0]).toMatchObject({
        fileName: 'plan.pdf',
        fileSize: 2048,
        uploadedBy: ana.id,
        linkedTaskId: task.id
      });
    });

    it('should register task and instruction attachments in the media catalog', async () => {
      const added = jest.fn();
      bus.on('attachment:added', added);

      const task = await service.createTask('proj_1', ana.id, {
        title: 'Paint walls',
        attachments: [{ type: 'document', fileName: 'plan.pdf', fileSize: 2048 }],
        subtasks: [{ title: 'Buy paint', instructionAttachments: [{ type: 'image', fileName: 'swatch.jpg', fileSize: 300 }] }]
      });

      const catalog = (await stored()).attachments;
      expect(catalog.map(a => [a.id, a.fileName, a.linkedTaskId, a.linkedSubtaskId])).toEqual([
        ['att_2', 'plan.pdf', 'task_1', undefined],
        ['att_4', 'swatch.jpg', 'task_1', 'sub_3']
      ]);
      expect(catalog).toEqual([task.attachments[0], task.subtasks[0].instructionAttachments[0]]);
      expect(added).toHaveBeenCalledTimes(1);
      expect(added).toHaveBeenCalledWith({ projectId: 'proj_1', attachments: catalog });
    });

    it('should flag the creator when they assign themselves', async () => {
      const task = await service.createTask('proj_1', ana.id, { title: 'Paint walls', assigneeIds: [ana.id, ben.id] });

      expect(isNewFor(task, ana.id)).toBe(true);
      expect(isNewFor(task, ben.id)).toBe(true);

      const accepted = await service.acceptTask('proj_1', ana.id, task.id);

      expect(isNewFor(accepted, ana.id)).toBe(false);
      expect(isNewFor(accepted, ben.id)).toBe(true);
    });
  });

  describe('membership', () => {
    it('should reject commands from non-members', async () => {
      await expect(service.sendMessage('proj_1', 'u_stranger', 'hi')).rejects.toThrow(ForbiddenError);
    });

    it('should reject commands for unknown projects', async () => {
      await expect(service.sendMessage('proj_missing', ana.id, 'hi')).rejects.toThrow(NotFoundError);
    });
  });

  describe('toggleTaskStatus', () => {
    beforeEach(() => {
      repo.put(createTestProject({
        members: [ana, ben, cleo, dina],
        tasks: [createTestTask({ id: 'task_a', title: 'Fix sink', createdBy: ana.id, assigneeIds: [ben.id] })]
      }));
    });

    it('should alternate status and post one status message per toggle', async () => {
      await service.toggleTaskStatus('proj_1', ben.id, 'task_a');
      await service.toggleTaskStatus('proj_1', ben.id, 'task_a');
      await service.toggleTaskStatus('proj_1', ana.id, 'task_a');

      const project = await stored();
      expect(project.tasks[0].status).toBe('done');
      expect(project.tasks[0].completedAt).toBe(clock.now());
      expect(project.messages.map(m => m.kind.type)).toEqual(['taskCompleted', 'taskReopened', 'taskCompleted']);
      expect(project.messages.map(m => m.senderId)).toEqual([ben.id, ben.id, ana.id]);
      expect(project.messages[0].context).toEqual({ type: 'task', taskId: 'task_a', title: 'Fix sink' });
      expect(project.messages[0].content).toBe('Fix sink');
    });

    it('should clear the completion time when reopened', async () => {
      await service.toggleTaskStatus('proj_1', ben.id, 'task_a');
      await service.toggleTaskStatus('proj_1', ben.id, 'task_a');

      const task = (await stored()).tasks[0];
      expect(task.status).toBe('pending');
      expect(task.completedAt).toBeUndefined();
    });

    it('should refuse members who cannot edit the task and leave state untouched', async () => {
      await expect(service.toggleTaskStatus('proj_1', cleo.id, 'task_a')).rejects.toThrow(ForbiddenError);

      const project = await stored();
      expect(project.tasks[0].status).toBe('pending');
      expect(project.messages).toHaveLength(0);
      expect(audit.entries).toHaveLength(0);
    });

    it('should fail for an unknown task', async () => {
      await expect(service.toggleTaskStatus('proj_1', ana.id, 'task_missing')).rejects.toThrow(NotFoundError);
    });
  });

  describe('toggleSubtaskStatus', () => {
    beforeEach(() => {
      repo.put(createTestProject({
        members: [ana, ben, cleo, dina],
        tasks: [
          createTestTask({
            id: 'task_a',
            createdBy: ana.id,
            assigneeIds: [ben.id],
            subtasks: [createTestSubtask({ id: 'sub_a', title: 'Call plumber', assigneeIds: [cleo.id] })]
          })
        ]
      }));
    });

    it('should let a subtask assignee complete it', async () => {
      const message = await service.toggleSubtaskStatus('proj_1', cleo.id, 'task_a', 'sub_a');

      const ref = { taskId: 'task_a', subtaskId: 'sub_a', title: 'Call plumber' };
      expect(message.kind).toEqual({ type: 'subtaskCompleted', subtask: ref });
      expect(message.context).toEqual({ type: 'subtask', ...ref });
      expect(message.senderId).toBe(cleo.id);
      expect((await stored()).tasks[0].subtasks[0].isDone).toBe(true);
    });

    it('should let a task editor reopen it', async () => {
      await service.toggleSubtaskStatus('proj_1', cleo.id, 'task_a', 'sub_a');
      const message = await service.toggleSubtaskStatus('proj_1', ben.id, 'task_a', 'sub_a');

      expect(message.kind.type).toBe('subtaskReopened');
      expect((await stored()).tasks[0].subtasks[0].isDone).toBe(false);
    });

    it('should refuse an unrelated member', async () => {
      await expect(service.toggleSubtaskStatus('proj_1', dina.id, 'task_a', 'sub_a')).rejects.toThrow(ForbiddenError);

      const project = await stored();
      expect(project.tasks[0].subtasks[0].isDone).toBe(false);
      expect(project.messages).toHaveLength(0);
    });

    it('should fail for an unknown subtask', async () => {
      await expect(service.toggleSubtaskStatus('proj_1', ana.id, 'task_a', 'sub_missing')).rejects.toThrow(NotFoundError);
    });
  });

  describe('acceptTask', () => {
    beforeEach(() => {
      repo.put(createTestProject({
        members: [ana, ben, cleo, dina],
        tasks: [
          createTestTask({
            id: 'task_a',
            title: 'Fix sink',
            createdBy: ana.id,
            assigneeIds: [ben.id, cleo.id],
            newForUserIds: [ben.id, cleo.id]
          })
        ]
      }));
    });

    it('should clear the new flag and post the trimmed message', async () => {
      const task = await service.acceptTask('proj_1', ben.id, 'task_a', '  On it ');

      expect(task.newForUserIds).toEqual([cleo.id]);
      const project = await stored();
      expect(project.messages).toHaveLength(1);
      expect(project.messages[0]).toMatchObject({
        senderId: ben.id,
        content: 'On it',
        kind: { type: 'regular' },
        context: { type: 'task', taskId: 'task_a', title: 'Fix sink' }
      });
    });

    it('should not post anything for a blank message', async () => {
      await service.acceptTask('proj_1', cleo.id, 'task_a', '   ');

      expect((await stored()).messages).toHaveLength(0);
    });

    it('should refuse a task that is not new for the user', async () => {
      await service.acceptTask('proj_1', ben.id, 'task_a');

      await expect(service.acceptTask('proj_1', ben.id, 'task_a')).rejects.toThrow(BusinessRuleError);
      await expect(service.acceptTask('proj_1', dina.id, 'task_a')).rejects.toThrow(BusinessRuleError);
    });

    it('should emit task:accepted', async () => {
      const handler = jest.fn();
      bus.on('task:accepted', handler);

      await service.acceptTask('proj_1', ben.id, 'task_a');

      expect(handler).toHaveBeenCalledWith({ projectId: 'proj_1', taskId: 'task_a', userId: ben.id });
    });
  });

  describe('updateTask', () => {
    beforeEach(() => {
      repo.put(createTestProject({
        members: [ana, ben, cleo, dina],
        tasks: [
          createTestTask({
            id: 'task_a',
            createdBy: ana.id,
            assigneeIds: [ben.id],
            newForUserIds: [ben.id],
            dueDate: 1000,
            notes: 'old'
          })
        ]
      }));
    });

    it('should move the new flag to added assignees, the actor included', async () => {
      const task = await service.updateTask('proj_1', ana.id, 'task_a', { assigneeIds: [cleo.id, ana.id] });

      expect(task.assigneeIds).toEqual([cleo.id, ana.id]);
      expect(task.newForUserIds).toEqual([cleo.id, ana.id]);
    });

    it('should keep the flag of a retained assignee', async () => {
      const task = await service.updateTask('proj_1', ana.id, 'task_a', { assigneeIds: [ben.id, dina.id] });

      expect(task.newForUserIds).toEqual([ben.id, dina.id]);
    });

    it('should clear nullable fields', async () => {
      const task = await service.updateTask('proj_1', ben.id, 'task_a', { dueDate: null, notes: null, title: 'Fix tap' });

      expect(task.dueDate).toBeUndefined();
      expect(task.notes).toBeUndefined();
      expect(task.title).toBe('Fix tap');
    });

    it('should refuse members who cannot edit', async () => {
      await expect(service.updateTask('proj_1', cleo.id, 'task_a', { title: 'x' })).rejects.toThrow(ForbiddenError);
    });
  });

  describe('addSubtask', () => {
    it('should catalog the instruction attachments of a new subtask', async () => {
      repo.put(createTestProject({ tasks: [createTestTask({ id: 'task_a' })] }));

      const task = await service.addSubtask('proj_1', ana.id, 'task_a', {
        title: 'Measure',
        instructionAttachments: [{ type: 'document', fileName: 'sizes.pdf', fileSize: 40 }]
      });

      expect((await stored()).attachments).toEqual(task.subtasks[0].instructionAttachments);
      expect(task.subtasks[0].instructionAttachments[0]).toMatchObject({ linkedTaskId: 'task_a', linkedSubtaskId: 'sub_1' });
    });

    it('should append a subtask to an editable task', async () => {
      repo.put(createTestProject({ tasks: [createTestTask({ id: 'task_a' })] }));

      const task = await service.addSubtask('proj_1', cleo.id, 'task_a', { title: ' Measure ', dueDate: 500 });

      expect(task.subtasks).toHaveLength(1);
      expect(task.subtasks[0]).toMatchObject({ title: 'Measure', dueDate: 500, isDone: false, assigneeIds: [] });
    });
  });

  describe('sendMessage', () => {
    it('should trim and store a regular message', async () => {
      const message = await service.sendMessage('proj_1', ana.id, '  hi all  ');

      expect(message).toEqual({
        id: 'msg_1',
        senderId: ana.id,
        content: 'hi all',
        timestamp: clock.now(),
        kind: { type: 'regular' },
        context: { type: 'none' },
        reactions: []
      });
    });

    it('should reject empty content', async () => {
      await expect(service.sendMessage('proj_1', ana.id, '   ')).rejects.toThrow(ValidationError);
    });

    it('should snapshot the referenced subtask with its parent task', async () => {
      repo.put(createTestProject({
        tasks: [createTestTask({ id: 'task_a', subtasks: [createTestSubtask({ id: 'sub_a', title: 'Call plumber' })] })]
      }));

      const message = await service.sendMessage('proj_1', ben.id, 'done soon', { type: 'subtask', subtaskId: 'sub_a' });

      expect(message.context).toEqual({ type: 'subtask', taskId: 'task_a', subtaskId: 'sub_a', title: 'Call plumber' });
    });

    it('should quote an earlier message', async () => {
      repo.put(createTestProject({
        messages: [createTestMessage({ id: 'msg_old', senderId: ben.id, content: 'Where are the keys?' })]
      }));

      const message = await service.sendMessage('proj_1', ana.id, 'Under the mat', { type: 'none' }, 'msg_old');

      expect(message.quoted).toEqual({
        messageId: 'msg_old',
        senderId: ben.id,
        senderName: 'Ben Ortiz',
        content: 'Where are the keys?'
      });
    });

    it('should fail when the quoted message does not exist', async () => {
      await expect(
        service.sendMessage('proj_1', ana.id, 'hi', { type: 'none' }, 'msg_missing')
      ).rejects.toThrow(NotFoundError);
    });

    it('should never go back in time', async () => {
      const future = clock.now() + 5000;
      repo.put(createTestProject({ messages: [createTestMessage({ timestamp: future })] }));

      const first = await service.sendMessage('proj_1', ana.id, 'one');
      clock.advance(10000);
      const second = await service.sendMessage('proj_1', ana.id, 'two');

      expect(first.timestamp).toBe(future);
      expect(second.timestamp).toBe(clock.now());
    });

    it('should serialize concurrent sends', async () => {
      await Promise.all(['a', 'b', 'c', 'd'].map(text => service.sendMessage('proj_1', ana.id, text)));

      expect((await stored()).messages.map(m => m.content)).toEqual(['a', 'b', 'c', 'd']);
    });
  });

  describe('sendSystemMessage', () => {
    it('should store a system message without context', async () => {
      const message = await service.sendSystemMessage('proj_1', ben.id, 'shared a document');

      expect(message.kind).toEqual({ type: 'system' });
      expect(message.context).toEqual({ type: 'none' });
      expect(message.content).toBe('shared a document');
    });
  });

  describe('sendImageMessage', () => {
    it('should post the image and add it to the media catalog', async () => {
      const message = await service.sendImageMessage('proj_1', ana.id, HELLO_BASE64, undefined, ' Before ');

      expect(message.content).toBe('Before');
      expect(message.attachment).toMatchObject({
        type: 'image',
        fileName: `Photo_${clock.now()}.jpg`,
        fileSize: 5,
        caption: 'Before',
        imageData: HELLO_BASE64
      });
      expect((await stored()).attachments).toEqual([message.attachment]);
    });

    it('should keep a supplied file name', async () => {
      const message = await service.sendImageMessage('proj_1', ana.id, HELLO_BASE64, 'sink.png');

      expect(message.attachment?.fileName).toBe('sink.png');
      expect(message.content).toBe('');
    });

    it.each([
      ['empty', '', 'image data is empty'],
      ['malformed', 'not base64!', 'image data is not valid base64'],
      ['oversized', Buffer.alloc(17).toString('base64'), 'image exceeds 16 bytes']
    ])('should reject %s image data', async (_label, data, reason) => {
      const attempt = service.sendImageMessage('proj_1', ana.id, data, 'x.jpg');

      await expect(attempt).rejects.toThrow(AttachmentLoadError);
      await expect(attempt).rejects.toThrow(`Failed to load attachment 'x.jpg': ${reason}`);
      expect((await stored()).messages).toHaveLength(0);
    });
  });

  describe('addReaction', () => {
    it('should toggle the reaction of the actor', async () => {
      const message = await service.sendMessage('proj_1', ana.id, 'done!');

      const liked = await service.addReaction('proj_1', ben.id, message.id, '👍');
      expect(liked.reactions).toEqual([{ emoji: '👍', userId: ben.id }]);

      const unliked = await service.addReaction('proj_1', ben.id, message.id, '👍');
      expect(unliked.reactions).toEqual([]);
    });

    it('should fail for an unknown message', async () => {
      await expect(service.addReaction('proj_1', ben.id, 'msg_missing', '👍')).rejects.toThrow(NotFoundError);
    });
  });

  describe('addAttachments', () => {
    beforeEach(() => {
      repo.put(createTestProject({
        tasks: [
          createTestTask({ id: 'task_a', subtasks: [createTestSubtask({ id: 'sub_a' })] }),
          createTestTask({ id: 'task_b' })
        ]
      }));
    });

    it('should resolve a subtask link to its parent task', async () => {
      const [attachment] = await service.addAttachments(
        'proj_1',
        ana.id,
        [{ type: 'document', fileName: 'quote.pdf', fileSize: 10 }],
        undefined,
        'sub_a',
        'Quote'
      );

      expect(attachment).toMatchObject({ linkedTaskId: 'task_a', linkedSubtaskId: 'sub_a', caption: 'Quote' });
    });

    it('should share link and caption across items', async () => {
      const attachments = await service.addAttachments(
        'proj_1',
        ana.id,
        [
          { type: 'image', fileName: 'a.jpg', fileSize: 1 },
          { type: 'video', fileName: 'b.mp4', fileSize: 2 }
        ],
        'task_b'
      );

      expect(attachments.map(a => a.linkedTaskId)).toEqual(['task_b', 'task_b']);
      expect((await stored()).attachments).toHaveLength(2);
    });

    it('should reject a subtask of another task', async () => {
      await expect(
        service.addAttachments('proj_1', ana.id, [{ type: 'document', fileName: 'a.pdf', fileSize: 1 }], 'task_b', 'sub_a')
      ).rejects.toThrow(ValidationError);
    });

    it('should reject unknown links and empty batches', async () => {
      const item = { type: 'document' as const, fileName: 'a.pdf', fileSize: 1 };

      await expect(service.addAttachments('proj_1', ana.id, [item], undefined, 'sub_missing')).rejects.toThrow(NotFoundError);
      await expect(service.addAttachments('proj_1', ana.id, [item], 'task_missing')).rejects.toThrow(NotFoundError);
      await expect(service.addAttachments('proj_1', ana.id, [])).rejects.toThrow(ValidationError);
    });
  });

  describe('project commands', () => {
    it('should rename and mute through execute', async () => {
      await service.execute('proj_1', ana.id, { type: 'updateProject', changes: { name: ' Bathroom ' } });
      const muted = await service.execute('proj_1', ben.id, { type: 'setMuted', isMuted: true });

      expect(muted).toMatchObject({ name: 'Bathroom', isMuted: true });
    });

    it('should add a member once', async () => {
      const user = await service.addMember('proj_1', ana.id, { id: 'u_eli', name: 'Eli Moss' });

      expect(user).toEqual({ id: 'u_eli', name: 'Eli Moss', phoneNumber: '', avatarInitials: 'EM' });
      await expect(service.addMember('proj_1', ana.id, { id: 'u_eli', name: 'Eli Moss' })).rejects.toThrow(BusinessRuleError);
    });
  });

  describe('audit and events', () => {
    it('should record one audit entry per successful command', async () => {
      await service.sendMessage('proj_1', ana.id, 'hi');
      await service.setMuted('proj_1', ben.id, true);
      await expect(service.sendMessage('proj_1', ana.id, '')).rejects.toThrow(ValidationError);

      expect(audit.entries.map(e => [e.actorId, e.command, e.summary])).toEqual([
        [ana.id, 'sendMessage', 'sent a message'],
        [ben.id, 'setMuted', 'muted project']
      ]);
    });

    it('should keep a saved change when the audit log rejects', async () => {
      const logger = createSilentLogger();
      const failingAudit = new InMemoryAuditLogRepository();
      jest.spyOn(failingAudit, 'append').mockRejectedValue(new Error('disk full'));
      const failing = new ProjectChatService(repo, failingAudit, bus, ids, clock, new MembershipAuthorizer(), logger);
      const created = jest.fn();
      bus.on('message:created', created);

      const message = await failing.sendMessage('proj_1', ana.id, 'hi');

      expect((await stored()).messages).toEqual([message]);
      expect(created).toHaveBeenCalledWith({ projectId: 'proj_1', message });
      expect(logger.error).toHaveBeenCalledWith(
        'Failed to record audit entry for sendMessage',
        expect.objectContaining({ message: 'disk full' }),
        { projectId: 'proj_1', actorId: ana.id, entryId: 'audit_2' }
      );
    });

    it('should publish after saving', async () => {
      const created = jest.fn();
      const executed = jest.fn();
      bus.on('message:created', created);
      bus.on('command:executed', executed);

      const message = await service.sendMessage('proj_1', ana.id, 'hi');

      expect(created).toHaveBeenCalledWith({ projectId: 'proj_1', message });
      expect(executed).toHaveBeenCalledWith(audit.entries[0]);
    });
  });
});
