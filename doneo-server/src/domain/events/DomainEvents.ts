import { AuditEntry, Message, Project, ProjectAttachment, Task, User } from '../../types';

/**
 * Type-safe event map for the event bus.
 * Maps event name strings to their payload types.
 */
export interface TypedEventMap {
  'project:created': Project;
  'project:updated': Project;
  'member:added': { projectId: string; user: User };
  'task:created': { projectId: string; task: Task };
  'task:updated': { projectId: string; task: Task };
  'task:accepted': { projectId: string; taskId: string; userId: string };
  'message:created': { projectId: string; message: Message };
  'message:updated': { projectId: string; message: Message };
  'attachment:added': { projectId: string; attachments: ProjectAttachment[] };
  'command:executed': AuditEntry;
}

/**
 * All valid event names.
 */
export type EventName = keyof TypedEventMap;

export const ALL_EVENT_NAMES: readonly EventName[] = [
  'project:created',
  'project:updated',
  'member:added',
  'task:created',
  'task:updated',
  'task:accepted',
  'message:created',
  'message:updated',
  'attachment:added',
  'command:executed'
];
