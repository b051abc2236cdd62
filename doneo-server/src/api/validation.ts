import { z } from 'zod';
import { ValidationError } from '../domain/common/Errors';

// --- Reusable patterns ---

// Safe ID: alphanumeric, hyphens, underscores
const safeId = z.string().regex(/^[a-zA-Z0-9_-]+$/, 'ID must be alphanumeric with hyphens/underscores only');

// String with reasonable length limits
const shortString = z.string().min(1).max(500);
const longString = z.string().min(1).max(10000);

const epochMs = z.number().int().nonnegative();

// --- Enums ---

const attachmentTypeSchema = z.enum(['image', 'document', 'video', 'contact']);

// --- Param schemas ---

export const idParamSchema = z.object({
  id: safeId,
});

export const taskParamSchema = z.object({
  id: safeId,
  taskId: safeId,
});

export const subtaskParamSchema = z.object({
  id: safeId,
  taskId: safeId,
  subtaskId: safeId,
});

export const messageParamSchema = z.object({
  id: safeId,
  messageId: safeId,
});

export const actorHeaderSchema = safeId;

// --- Project schemas ---

const memberSchema = z.object({
  id: safeId,
  name: shortString,
  phoneNumber: z.string().max(50).optional(),
  avatarInitials: z.string().min(1).max(3).optional(),
}).strict();

export const createProjectSchema = z.object({
  name: shortString,
  description: longString.optional(),
  members: z.array(memberSchema).optional(),
}).strict();

export const updateProjectSchema = z.object({
  name: shortString.optional(),
  description: z.string().max(10000).optional(),
}).strict();

export const addMemberSchema = memberSchema;

export const muteSchema = z.object({
  isMuted: z.boolean(),
}).strict();

// --- Task schemas ---

const attachmentInputSchema = z.object({
  type: attachmentTypeSchema,
  fileName: shortString,
  fileSize: z.number().int().min(0),
  imageData: z.string().optional(),
}).strict();

export const subtaskInputSchema = z.object({
  title: shortString,
  description: longString.optional(),
  assigneeIds: z.array(safeId).optional(),
  dueDate: epochMs.optional(),
  instructionAttachments: z.array(attachmentInputSchema).optional(),
}).strict();

export const createTaskSchema = z.object({
  title: shortString,
  assigneeIds: z.array(safeId).optional(),
  dueDate: epochMs.optional(),
  notes: longString.optional(),
  subtasks: z.array(subtaskInputSchema).optional(),
  attachments: z.array(attachmentInputSchema).optional(),
}).strict();

export const updateTaskSchema = z.object({
  title: shortString.optional(),
  assigneeIds: z.array(safeId).optional(),
  dueDate: epochMs.nullable().optional(),
  notes: z.string().max(10000).nullable().optional(),
}).strict();

export const acceptTaskSchema = z.object({
  message: z.string().max(10000).optional(),
}).strict();

// --- Message schemas ---

const contextTargetSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('none') }).strict(),
  z.object({ type: z.literal('task'), taskId: safeId }).strict(),
  z.object({ type: z.literal('subtask'), subtaskId: safeId }).strict(),
]);

export const sendMessageSchema = z.object({
  content: longString,
  context: contextTargetSchema.optional(),
  quotedMessageId: safeId.optional(),
}).strict();

export const systemMessageSchema = z.object({
  content: longString,
}).strict();

export const imageMessageSchema = z.object({
  imageData: z.string().min(1),
  fileName: shortString.optional(),
  caption: longString.optional(),
}).strict();

export const reactionSchema = z.object({
  emoji: z.string().min(1).max(32),
}).strict();

// --- Attachment schemas ---

export const addAttachmentsSchema = z.object({
  items: z.array(attachmentInputSchema).min(1),
  linkedTaskId: safeId.optional(),
  linkedSubtaskId: safeId.optional(),
  caption: longString.optional(),
}).strict();

// --- Generic command schema ---

export const commandSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('updateProject'), changes: updateProjectSchema }).strict(),
  z.object({ type: z.literal('addMember'), member: memberSchema }).strict(),
  z.object({ type: z.literal('setMuted'), isMuted: z.boolean() }).strict(),
  z.object({ type: z.literal('createTask'), payload: createTaskSchema }).strict(),
  z.object({ type: z.literal('updateTask'), taskId: safeId, changes: updateTaskSchema }).strict(),
  z.object({ type: z.literal('addSubtask'), taskId: safeId, subtask: subtaskInputSchema }).strict(),
  z.object({ type: z.literal('toggleTaskStatus'), taskId: safeId }).strict(),
  z.object({ type: z.literal('toggleSubtaskStatus'), taskId: safeId, subtaskId: safeId }).strict(),
  z.object({ type: z.literal('acceptTask'), taskId: safeId, message: z.string().max(10000).optional() }).strict(),
  sendMessageSchema.extend({ type: z.literal('sendMessage') }),
  systemMessageSchema.extend({ type: z.literal('sendSystemMessage') }),
  imageMessageSchema.extend({ type: z.literal('sendImageMessage') }),
  z.object({ type: z.literal('addReaction'), messageId: safeId, emoji: z.string().min(1).max(32) }).strict(),
  addAttachmentsSchema.extend({ type: z.literal('addAttachments') }),
]);

/**
 * Parse a request part against a schema.
 * @throws {ValidationError} listing every issue with its path
 */
export function parseInput<S extends z.ZodTypeAny>(schema: S, value: unknown, message: string): z.infer<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new ValidationError(
      message,
      result.error.issues.map(i => ({
        path: i.path.join('.'),
        message: i.message,
      }))
    );
  }
  return result.data;
}
