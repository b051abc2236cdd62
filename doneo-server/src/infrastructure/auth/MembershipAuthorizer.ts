import { IAuthorizer, AuthorizedAction } from '../../domain/services/IAuthorizer';
import { Subtask, Task, User } from '../../types';

/**
 * Default policy based on task ownership and assignment.
 *
 * - editTask: the creator or an assignee; a task with neither is open to
 *   every member.
 * - toggleSubtask: the subtask's assignees; a subtask without assignees
 *   falls back to the editTask rule.
 *
 * Membership itself is checked by the service before the policy runs.
 */
export class MembershipAuthorizer implements IAuthorizer {
  canPerform(action: AuthorizedAction, user: User, task: Task, subtask?: Subtask): boolean {
    switch (action) {
      case 'editTask':
        return this.canEditTask(user, task);
      case 'toggleSubtask':
        if (!subtask) return false;
        if (subtask.assigneeIds.length > 0) {
          return subtask.assigneeIds.includes(user.id) || this.canEditTask(user, task);
        }
        return this.canEditTask(user, task);
    }
  }

  private canEditTask(user: User, task: Task): boolean {
    if (task.createdBy === undefined && task.assigneeIds.length === 0) {
      return true;
    }
    return task.createdBy === user.id || task.assigneeIds.includes(user.id);
  }
}
