// ── Entities ────────────────────────────────────────────────
export { User } from './entities/user.entity';

// ── Options ─────────────────────────────────────────────────
export {
  buildDataSourceOptions,
  ENTITIES,
  MIGRATIONS,
  type DatabaseSettings,
} from './database.options';

// ── Module ──────────────────────────────────────────────────
export { DatabaseModule } from './database.module';
