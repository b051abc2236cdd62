/**
 * Source of entity ids. Ids carry a short type prefix so they can be told
 * apart in logs and URLs: `task_…`, `sub_…`, `msg_…`, `att_…`, `audit_…`.
 */
export interface IIdGenerator {
  generate(prefix: string): string;
}
