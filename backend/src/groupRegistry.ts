/**
 * Group Registry
 * Group identity, creator-only membership changes and the per-group log
 */

import { v4 as uuidv4 } from 'uuid';
import { Group, GroupMessage } from './types';
import { GroupNotFound, PermissionDenied } from './errors';

export interface MembershipChange {
  added: string[];
  removed: string[];
}

export class GroupRegistry {
  private groups: Map<string, Group> = new Map();

  constructor(
    private readonly maxLogPerGroup = 1000,
    private readonly now: () => number = Date.now
  ) {}

  static newGroupId(): string {
    return `grp-${uuidv4().slice(0, 8)}`;
  }

  /**
   * Create a group. The creator is always a member. Returns the existing
   * group unchanged if this id is already known for the same creator.
   */
  create(groupId: string, name: string, creatorId: string, memberIds: Iterable<string> = []): Group {
    const existing = this.groups.get(groupId);
    if (existing) {
      if (existing.creatorId !== creatorId) {
        throw new PermissionDenied(`Group ${groupId} already belongs to ${existing.creatorId}`);
      }
      return existing;
    }

    const group: Group = {
      id: groupId,
      name,
      creatorId,
      createdAt: this.now(),
      memberIds: new Set([creatorId, ...memberIds]),
      log: [],
    };
    this.groups.set(groupId, group);

    console.log(`[GroupRegistry] Created: ${name} (${groupId}) by ${creatorId}, ${group.memberIds.size} members`);
    return group;
  }

  get(groupId: string): Group | undefined {
    return this.groups.get(groupId);
  }

  require(groupId: string): Group {
    const group = this.groups.get(groupId);
    if (!group) throw new GroupNotFound(groupId);
    return group;
  }

  list(): Group[] {
    return Array.from(this.groups.values());
  }

  listForUser(userId: string): Group[] {
    return this.list().filter(g => g.memberIds.has(userId));
  }

  isMember(groupId: string, userId: string): boolean {
    return this.groups.get(groupId)?.memberIds.has(userId) ?? false;
  }

  /**
   * Apply membership changes requested by `actorId`. Only the creator may
   * change membership, and the creator cannot be removed.
   */
  updateMembers(groupId: string, actorId: string, add: string[], remove: string[]): MembershipChange {
    const group = this.require(groupId);
    if (group.creatorId !== actorId) {
      throw new PermissionDenied(`Only ${group.creatorId} may change members of ${groupId}`);
    }

    const change: MembershipChange = { added: [], removed: [] };
    for (const userId of add) {
      if (!group.memberIds.has(userId)) {
        group.memberIds.add(userId);
        change.added.push(userId);
      }
    }
    for (const userId of remove) {
      if (userId === group.creatorId) continue;
      if (group.memberIds.delete(userId)) {
        change.removed.push(userId);
      }
    }

    console.log(
      `[GroupRegistry] ${group.name}: +${change.added.length} -${change.removed.length} by ${actorId}`
    );
    return change;
  }

  /**
   * Append to the group log. The sender must be a member.
   */
  append(groupId: string, message: GroupMessage): GroupMessage {
    const group = this.require(groupId);
    if (!group.memberIds.has(message.from)) {
      throw new PermissionDenied(`${message.from} is not a member of ${groupId}`);
    }

    group.log.push(message);
    if (group.log.length > this.maxLogPerGroup) {
      group.log.shift();
    }
    return message;
  }

  messages(groupId: string, limit = 100): GroupMessage[] {
    return this.require(groupId).log.slice(-limit);
  }
}
