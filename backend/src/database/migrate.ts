import { readFile } from 'fs/promises';
import { Logger } from '../utils/logger.js';
import { PgDriver, PgForumStore } from './postgres.js';
import { loadPersonaSeeds, seedPersonas } from './seed.js';

export interface MigrateOptions {
  schemaPath: string;
  personasPath: string;
  now?: Date;
}

/**
 * Applies the schema (idempotent DDL) and inserts any missing seed personas.
 */
export async function migrate(driver: PgDriver, options: MigrateOptions): Promise<void> {
  const schema = await readFile(options.schemaPath, 'utf-8');
  await driver.query(schema);
  Logger.info(`[Migrate] Applied schema from ${options.schemaPath}`);

  const seeds = await loadPersonaSeeds(options.personasPath);
  await seedPersonas(new PgForumStore(driver), seeds, options.now ?? new Date());
  Logger.info(`[Migrate] Seeded ${seeds.length} personas from ${options.personasPath}`);
}
