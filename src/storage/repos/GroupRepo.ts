import { and, eq } from "drizzle-orm";
import type { Executor } from "../db.js";
import { groups, groupMembers } from "../schema.js";
import type { Group } from "../../types/index.js";

export class GroupRepo {
  constructor(private readonly db: Executor) {}

  create(group: Omit<Group, "createdAt">): Group {
    const now = new Date();

    this.db
      .insert(groups)
      .values({
        id: group.id,
        name: group.name,
        createdBy: group.createdBy,
        createdAt: now,
      })
      .run();

    const members = Array.from(new Set(group.members));
    if (members.length > 0) {
      this.db
        .insert(groupMembers)
        .values(
          members.map((participantId) => ({
            groupId: group.id,
            participantId,
            joinedAt: now,
          }))
        )
        .run();
    }

    return {
      ...group,
      members,
      createdAt: now,
    };
  }

  findById(id: string): Group | null {
    const group = this.db.select().from(groups).where(eq(groups.id, id)).get();

    if (!group) return null;

    const members = this.db
      .select({ participantId: groupMembers.participantId })
      .from(groupMembers)
      .where(eq(groupMembers.groupId, id))
      .all();

    return {
      id: group.id,
      name: group.name,
      members: members.map((m) => m.participantId),
      createdAt: group.createdAt,
      createdBy: group.createdBy,
    };
  }

  addMember(groupId: string, participantId: string): void {
    this.db
      .insert(groupMembers)
      .values({ groupId, participantId, joinedAt: new Date() })
      .onConflictDoNothing()
      .run();
  }

  removeMember(groupId: string, participantId: string): void {
    this.db
      .delete(groupMembers)
      .where(and(eq(groupMembers.groupId, groupId), eq(groupMembers.participantId, participantId)))
      .run();
  }

  update(id: string, data: Partial<Pick<Group, "name">>): Group | null {
    this.db.update(groups).set(data).where(eq(groups.id, id)).run();
    return this.findById(id);
  }

  delete(id: string): void {
    this.db.delete(groups).where(eq(groups.id, id)).run();
  }
}
