import { readFile } from 'fs/promises';
import { z } from 'zod';
import { PersonaSchema } from '@chromedome/shared';
import { Logger } from '../utils/logger.js';
import { ForumRepository } from './types.js';

const PersonaSeedSchema = PersonaSchema.pick({ id: true, name: true, systemPrompt: true }).extend({
  isActive: z.boolean().default(true)
});

export type PersonaSeed = z.infer<typeof PersonaSeedSchema>;

export async function loadPersonaSeeds(path: string): Promise<PersonaSeed[]> {
  const raw = await readFile(path, 'utf-8');
  return z.array(PersonaSeedSchema).parse(JSON.parse(raw));
}

/** Inserts personas that are not stored yet. Existing rows are left as edited. */
export async function seedPersonas(repo: ForumRepository, seeds: PersonaSeed[], now: Date): Promise<void> {
  for (const seed of seeds) {
    await repo.savePersona({ ...seed, createdAt: now, updatedAt: now });
  }
  Logger.debug(`[Seed] Ensured ${seeds.length} personas`);
}
