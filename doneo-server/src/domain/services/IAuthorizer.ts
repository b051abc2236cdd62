import { Subtask, Task, User } from '../../types';

export type AuthorizedAction = 'editTask' | 'toggleSubtask';

/**
 * Policy deciding whether a user may perform an action on a task.
 * Supplied by the surrounding system; `MembershipAuthorizer` is the default.
 */
export interface IAuthorizer {
  /**
   * @param subtask - required for subtask-level actions
   */
  canPerform(action: AuthorizedAction, user: User, task: Task, subtask?: Subtask): boolean;
}
