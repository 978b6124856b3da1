import { asc, eq, inArray } from "drizzle-orm";
import type { Executor } from "../db.js";
import { participants } from "../schema.js";
import type { Participant } from "../../types/index.js";

type ParticipantRow = typeof participants.$inferSelect;

function toParticipant(row: ParticipantRow): Participant {
  return {
    id: row.id,
    name: row.name,
    phone: row.phone ?? undefined,
  };
}

export class ParticipantRepo {
  constructor(private readonly db: Executor) {}

  create(participant: Participant): Participant {
    this.db
      .insert(participants)
      .values({
        id: participant.id,
        name: participant.name,
        phone: participant.phone,
        createdAt: new Date(),
      })
      .run();

    return participant;
  }

  findById(id: string): Participant | null {
    const row = this.db.select().from(participants).where(eq(participants.id, id)).get();
    return row ? toParticipant(row) : null;
  }

  findByIds(ids: readonly string[]): Participant[] {
    if (ids.length === 0) return [];

    return this.db
      .select()
      .from(participants)
      .where(inArray(participants.id, [...ids]))
      .all()
      .map(toParticipant);
  }

  findAll(): Participant[] {
    return this.db.select().from(participants).orderBy(asc(participants.name)).all().map(toParticipant);
  }

  update(id: string, data: Partial<Omit<Participant, "id">>): Participant | null {
    this.db.update(participants).set(data).where(eq(participants.id, id)).run();
    return this.findById(id);
  }

  delete(id: string): void {
    this.db.delete(participants).where(eq(participants.id, id)).run();
  }
}
