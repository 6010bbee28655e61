/**
 * PostgreSQL adapters: barrel export.
 */

export { createPgUserRepository } from "./pg-user.repository.js";
export { createPgPostRepository } from "./pg-post.repository.js";
export { createPgExecutor, createPgHealthCheck, type PgExecutor } from "./executor.js";
export { pgMigrateUp, pgMigrateDown } from "./migrations.js";
