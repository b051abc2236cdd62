// Base types

export interface User {
  id: string;
  name: string;
  phoneNumber: string;
  avatarInitials: string;
}

export type TaskStatus = 'pending' | 'done';
export type AttachmentType = 'image' | 'document' | 'video' | 'contact';

export interface Attachment {
  id: string;
  type: AttachmentType;
  fileName: string;
  fileSize: number;
  uploadedBy: string;
  uploadedAt: number;
  linkedTaskId?: string;
  linkedSubtaskId?: string;
  caption?: string;
  imageData?: string;  // base64, images only
}

/**
 * Catalog entry of the project's media browser. Same shape as a task
 * attachment; kept as its own name because the catalog is project-wide.
 */
export type ProjectAttachment = Attachment;

export interface Subtask {
  id: string;
  title: string;
  description?: string;
  isDone: boolean;
  assigneeIds: string[];
  dueDate?: number;
  instructionAttachments: Attachment[];
  createdAt: number;
}

export interface Task {
  id: string;
  title: string;
  status: TaskStatus;
  assigneeIds: string[];
  dueDate?: number;
  notes?: string;
  subtasks: Subtask[];
  attachments: Attachment[];
  createdBy?: string;
  // Assignees who have not acknowledged the task yet
  newForUserIds: string[];
  createdAt: number;
  completedAt?: number;
}

// Message references: title snapshots taken when the message was sent

export interface TaskReference {
  taskId: string;
  title: string;
}

export interface SubtaskReference {
  taskId: string;
  subtaskId: string;
  title: string;
}

export type ContextReference =
  | { type: 'none' }
  | ({ type: 'task' } & TaskReference)
  | ({ type: 'subtask' } & SubtaskReference);

export type MessageKind =
  | { type: 'regular' }
  | { type: 'system' }
  | { type: 'subtaskCompleted'; subtask: SubtaskReference }
  | { type: 'subtaskReopened'; subtask: SubtaskReference }
  | { type: 'taskCompleted'; task: TaskReference }
  | { type: 'taskReopened'; task: TaskReference };

export interface QuotedMessage {
  messageId: string;
  senderId: string;
  senderName: string;
  content: string;
}

export interface Reaction {
  emoji: string;
  userId: string;
}

export interface Message {
  id: string;
  senderId: string;
  content: string;
  timestamp: number;
  kind: MessageKind;
  context: ContextReference;
  quoted?: QuotedMessage;
  attachment?: Attachment;
  reactions: Reaction[];
}

export interface Project {
  id: string;
  name: string;
  description?: string;
  members: User[];
  tasks: Task[];
  messages: Message[];
  attachments: ProjectAttachment[];
  isMuted: boolean;
  createdAt: number;
  updatedAt: number;
}

export interface AuditEntry {
  id: string;
  projectId: string;
  actorId: string;
  command: string;
  summary: string;
  at: number;
}

// Payloads

export interface MemberInput {
  id: string;
  name: string;
  phoneNumber?: string;
  avatarInitials?: string;
}

export interface CreateProjectPayload {
  name: string;
  description?: string;
  members?: MemberInput[];
}

export interface UpdateProjectPayload {
  name?: string;
  description?: string;
}

export interface AttachmentInput {
  type: AttachmentType;
  fileName: string;
  fileSize: number;
  imageData?: string;
}

export interface SubtaskInput {
  title: string;
  description?: string;
  assigneeIds?: string[];
  dueDate?: number;
  instructionAttachments?: AttachmentInput[];
}

export interface CreateTaskPayload {
  title: string;
  assigneeIds?: string[];
  dueDate?: number;
  notes?: string;
  subtasks?: SubtaskInput[];
  attachments?: AttachmentInput[];
}

export interface UpdateTaskPayload {
  title?: string;
  assigneeIds?: string[];
  dueDate?: number | null;
  notes?: string | null;
}

/**
 * Message context as supplied by a client: ids only, titles are
 * snapshotted by the service.
 */
export type ContextTarget =
  | { type: 'none' }
  | { type: 'task'; taskId: string }
  | { type: 'subtask'; subtaskId: string };
