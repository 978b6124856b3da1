import type { ParticipantRepo } from "../storage/index.js";
import type { Participant } from "../types/index.js";
import { createId } from "./ids.js";

export class ParticipantService {
  private participantRepo: ParticipantRepo;

  constructor(participantRepo: ParticipantRepo) {
    this.participantRepo = participantRepo;
  }

  async createParticipant(params: { id?: string; name: string; phone?: string }): Promise<Participant> {
    return this.participantRepo.create({
      id: params.id ?? createId("ppl"),
      name: params.name.trim(),
      phone: params.phone,
    });
  }

  /** Look up a participant, registering them under `name` on first sight. */
  async ensureParticipant(id: string, name: string): Promise<Participant> {
    return this.participantRepo.findById(id) ?? this.participantRepo.create({ id, name });
  }

  async getParticipant(id: string): Promise<Participant | null> {
    return this.participantRepo.findById(id);
  }

  async getParticipants(): Promise<Participant[]> {
    return this.participantRepo.findAll();
  }

  /** id → display name, for rendering balances and exports. */
  async getNames(ids: readonly string[]): Promise<Map<string, string>> {
    return new Map(this.participantRepo.findByIds(ids).map((p) => [p.id, p.name]));
  }
}
