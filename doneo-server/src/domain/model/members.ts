import { MemberInput, Project, User } from '../../types';

/**
 * Up to two initials taken from the first letters of the first two words.
 */
export function initialsOf(name: string): string {
  return name
    .trim()
    .split(/\s+/)
    .filter(Boolean)
    .slice(0, 2)
    .map(word => word.charAt(0).toUpperCase())
    .join('');
}

export function toUser(input: MemberInput): User {
  return {
    id: input.id,
    name: input.name.trim(),
    phoneNumber: input.phoneNumber ?? '',
    avatarInitials: input.avatarInitials ?? initialsOf(input.name)
  };
}

export function findMember(project: Project, userId: string): User | undefined {
  return project.members.find(m => m.id === userId);
}

export function isMember(project: Project, userId: string): boolean {
  return project.members.some(m => m.id === userId);
}
