import type { GroupRepo, ParticipantRepo } from "../storage/index.js";
import { NotFoundError } from "../engine/index.js";
import type { Group } from "../types/index.js";
import { createId } from "./ids.js";

export class GroupService {
  private groupRepo: GroupRepo;
  private participantRepo: ParticipantRepo;

  constructor(groupRepo: GroupRepo, participantRepo: ParticipantRepo) {
    this.groupRepo = groupRepo;
    this.participantRepo = participantRepo;
  }

  async createGroup(params: {
    id?: string;
    name: string;
    creatorId: string;
    creatorName?: string;
    members?: string[];
  }): Promise<Group> {
    this.ensureParticipant(params.creatorId, params.creatorName);

    const members = [params.creatorId, ...(params.members ?? [])];
    for (const memberId of members) {
      if (!this.participantRepo.findById(memberId)) {
        throw new NotFoundError("Participant", memberId);
      }
    }

    return this.groupRepo.create({
      id: params.id ?? createId("grp"),
      name: params.name.trim(),
      members,
      createdBy: params.creatorId,
    });
  }

  async getGroup(groupId: string): Promise<Group | null> {
    return this.groupRepo.findById(groupId);
  }

  async addMember(groupId: string, participantId: string, participantName?: string): Promise<Group> {
    if (!this.groupRepo.findById(groupId)) {
      throw new NotFoundError("Group", groupId);
    }

    this.ensureParticipant(participantId, participantName);
    this.groupRepo.addMember(groupId, participantId);

    return this.requireGroup(groupId);
  }

  async removeMember(groupId: string, participantId: string): Promise<void> {
    this.groupRepo.removeMember(groupId, participantId);
  }

  async updateGroupName(groupId: string, name: string): Promise<Group | null> {
    return this.groupRepo.update(groupId, { name });
  }

  private requireGroup(groupId: string): Group {
    const group = this.groupRepo.findById(groupId);
    if (!group) {
      throw new NotFoundError("Group", groupId);
    }
    return group;
  }

  // Unknown ids are registered when a name is supplied
  private ensureParticipant(id: string, name?: string): void {
    if (this.participantRepo.findById(id)) return;

    if (!name) {
      throw new NotFoundError("Participant", id);
    }
    this.participantRepo.create({ id, name });
  }
}
