import { AttachmentType, ProjectAttachment } from '../../types';

export const GENERAL_GROUP_LABEL = 'General';

export interface MediaGroup {
  taskId: string | null;
  label: string;
  attachments: ProjectAttachment[];
}

export function partitionByType(attachments: readonly ProjectAttachment[]): Record<AttachmentType, ProjectAttachment[]> {
  const partitions: Record<AttachmentType, ProjectAttachment[]> = {
    image: [],
    document: [],
    video: [],
    contact: []
  };
  for (const attachment of attachments) {
    partitions[attachment.type].push(attachment);
  }
  return partitions;
}

/**
 * Group attachments by linked task, in order of first appearance.
 * Unlinked attachments form the "General" group.
 *
 * @param titleOf - resolves a task id to its current title
 */
export function groupByLinkedTask(
  attachments: readonly ProjectAttachment[],
  titleOf: (taskId: string) => string | undefined
): MediaGroup[] {
  const groups = new Map<string | null, ProjectAttachment[]>();
  for (const attachment of attachments) {
    const key = attachment.linkedTaskId ?? null;
    const bucket = groups.get(key);
    if (bucket) {
      bucket.push(attachment);
    } else {
      groups.set(key, [attachment]);
    }
  }

  return Array.from(groups, ([taskId, items]) => ({
    taskId,
    label: taskId === null ? GENERAL_GROUP_LABEL : titleOf(taskId) ?? GENERAL_GROUP_LABEL,
    attachments: items
  }));
}
