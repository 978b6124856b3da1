export { createDatabase } from "./db.js";
export type { AppDatabase, Executor } from "./db.js";
export { initializeSchema } from "./migrate.js";
export * from "./schema.js";
export { ParticipantRepo } from "./repos/ParticipantRepo.js";
export { GroupRepo } from "./repos/GroupRepo.js";
export { TransactionRepo } from "./repos/TransactionRepo.js";
export { SettlementRepo } from "./repos/SettlementRepo.js";
export { SubscriptionRepo } from "./repos/SubscriptionRepo.js";
export { createRepositories } from "./repositories.js";
export type { Repositories } from "./repositories.js";
