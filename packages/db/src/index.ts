export * from "./schema/index.js";
export {
  createDatabase,
  createDbClient,
  type Database,
  type DbClient,
  type DbClientOptions,
} from "./client.js";
export { ensureSchema, getInteractionsDdl } from "./migrations.js";
