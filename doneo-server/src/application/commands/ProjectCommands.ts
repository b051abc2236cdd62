import {
  AttachmentInput,
  ContextTarget,
  CreateTaskPayload,
  MemberInput,
  Message,
  Project,
  ProjectAttachment,
  SubtaskInput,
  Task,
  UpdateProjectPayload,
  UpdateTaskPayload,
  User
} from '../../types';

/**
 * Every state change of a project is one of these commands.
 */
export type ProjectCommand =
  | { type: 'updateProject'; changes: UpdateProjectPayload }
  | { type: 'addMember'; member: MemberInput }
  | { type: 'setMuted'; isMuted: boolean }
  | { type: 'createTask'; payload: CreateTaskPayload }
  | { type: 'updateTask'; taskId: string; changes: UpdateTaskPayload }
  | { type: 'addSubtask'; taskId: string; subtask: SubtaskInput }
  | { type: 'toggleTaskStatus'; taskId: string }
  | { type: 'toggleSubtaskStatus'; taskId: string; subtaskId: string }
  | { type: 'acceptTask'; taskId: string; message?: string }
  | { type: 'sendMessage'; content: string; context?: ContextTarget; quotedMessageId?: string }
  | { type: 'sendSystemMessage'; content: string }
  | { type: 'sendImageMessage'; imageData: string; fileName?: string; caption?: string }
  | { type: 'addReaction'; messageId: string; emoji: string }
  | {
      type: 'addAttachments';
      items: AttachmentInput[];
      linkedTaskId?: string;
      linkedSubtaskId?: string;
      caption?: string;
    };

export type CommandResult = Project | User | Task | Message | ProjectAttachment[];

/**
 * One-line human summary used by the audit trail.
 */
export function describeCommand(command: ProjectCommand): string {
  switch (command.type) {
    case 'updateProject':
      return `updated project details (${Object.keys(command.changes).join(', ') || 'no fields'})`;
    case 'addMember':
      return `added member ${command.member.id}`;
    case 'setMuted':
      return command.isMuted ? 'muted project' : 'unmuted project';
    case 'createTask':
      return `created task "${command.payload.title.trim()}"`;
    case 'updateTask':
      return `updated task ${command.taskId}`;
    case 'addSubtask':
      return `added subtask "${command.subtask.title.trim()}" to task ${command.taskId}`;
    case 'toggleTaskStatus':
      return `toggled task ${command.taskId}`;
    case 'toggleSubtaskStatus':
      return `toggled subtask ${command.subtaskId} of task ${command.taskId}`;
    case 'acceptTask':
      return `accepted task ${command.taskId}`;
    case 'sendMessage':
      return 'sent a message';
    case 'sendSystemMessage':
      return 'sent a system message';
    case 'sendImageMessage':
      return 'sent an image';
    case 'addReaction':
      return `reacted ${command.emoji} to message ${command.messageId}`;
    case 'addAttachments':
      return `added ${command.items.length} attachment(s)`;
  }
}
