import { ContextReference, Message, Project, Task } from '../../types';

export interface FeedItemLayout {
  messageId: string;
  isFirstInGroup: boolean;
  isLastInGroup: boolean;
  showTaskContext: boolean;
}

/**
 * Task id for task references, subtask id for subtask references.
 */
export function effectiveReferenceId(context: ContextReference): string | null {
  switch (context.type) {
    case 'task':
      return context.taskId;
    case 'subtask':
      return context.subtaskId;
    case 'none':
      return null;
  }
}

function continuesGroup(message: Message, neighbour: Message | undefined): boolean {
  return neighbour !== undefined &&
    neighbour.senderId === message.senderId &&
    neighbour.kind.type === 'regular' &&
    message.kind.type === 'regular';
}

/**
 * Compute bubble grouping and context-header visibility for a feed.
 *
 * A message opens a sender group when there is no previous message, the
 * sender changes, or either message is not a regular one. The task context
 * header shows when the effective reference differs from the previous
 * message's, or when the message opens a group.
 */
export function layoutFeed(messages: readonly Message[]): FeedItemLayout[] {
  return messages.map((message, index) => {
    const previous = index > 0 ? messages[index - 1] : undefined;
    const next = index < messages.length - 1 ? messages[index + 1] : undefined;

    const isFirstInGroup = !continuesGroup(message, previous);
    const isLastInGroup = !continuesGroup(message, next);

    const previousRef = previous ? effectiveReferenceId(previous.context) : null;
    const currentRef = effectiveReferenceId(message.context);

    return {
      messageId: message.id,
      isFirstInGroup,
      isLastInGroup,
      showTaskContext: currentRef !== previousRef || isFirstInGroup
    };
  });
}

/**
 * Every message about a task: those referencing the task itself and those
 * referencing one of its subtasks, oldest first.
 */
export function taskThread(project: Project, task: Task): Message[] {
  const subtaskIds = new Set(task.subtasks.map(s => s.id));
  return project.messages
    .filter(m =>
      (m.context.type === 'task' && m.context.taskId === task.id) ||
      (m.context.type === 'subtask' && subtaskIds.has(m.context.subtaskId))
    )
    .sort((a, b) => a.timestamp - b.timestamp);
}
