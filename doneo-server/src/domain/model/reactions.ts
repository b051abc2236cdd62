import { Reaction } from '../../types';

export interface ReactionGroup {
  emoji: string;
  userIds: string[];
  count: number;
}

/**
 * Group reactions by emoji. Groups are sorted by emoji code point; users keep
 * their reaction order.
 */
export function groupReactions(reactions: readonly Reaction[]): ReactionGroup[] {
  const groups = new Map<string, string[]>();
  for (const reaction of reactions) {
    const users = groups.get(reaction.emoji);
    if (users) {
      users.push(reaction.userId);
    } else {
      groups.set(reaction.emoji, [reaction.userId]);
    }
  }
  return Array.from(groups, ([emoji, userIds]) => ({ emoji, userIds, count: userIds.length }))
    .sort((a, b) => (a.emoji < b.emoji ? -1 : a.emoji > b.emoji ? 1 : 0));
}

/**
 * Add the user's reaction, or remove it when the same emoji is already there.
 */
export function toggleReaction(reactions: readonly Reaction[], emoji: string, userId: string): Reaction[] {
  const exists = reactions.some(r => r.emoji === emoji && r.userId === userId);
  if (exists) {
    return reactions.filter(r => !(r.emoji === emoji && r.userId === userId));
  }
  return [...reactions, { emoji, userId }];
}
