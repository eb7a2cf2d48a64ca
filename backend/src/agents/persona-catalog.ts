import type { Persona } from '@chromedome/shared';
import { ForumRepository } from '../database/types.js';
import { RandomSource } from '../utils/clock.js';

export type PersonaLookup =
  | { status: 'ok'; persona: Persona }
  | { status: 'not_found' };

/**
 * Read-only view of the personas. Selection and activity rules live with the
 * callers; the catalog only filters on isActive.
 */
export class PersonaCatalog {
  constructor(private readonly repo: ForumRepository) {}

  listActive(): Promise<Persona[]> {
    return this.repo.listActivePersonas();
  }

  async get(id: string): Promise<PersonaLookup> {
    const persona = await this.repo.getPersona(id);
    return persona ? { status: 'ok', persona } : { status: 'not_found' };
  }

  async pickRandomActive(random: RandomSource): Promise<Persona | null> {
    const personas = await this.listActive();
    if (personas.length === 0) return null;
    return personas[Math.min(Math.floor(random() * personas.length), personas.length - 1)] ?? null;
  }
}

/** Draws `count` distinct items with a partial Fisher-Yates shuffle. */
export function sampleWithoutReplacement<T>(items: readonly T[], count: number, random: RandomSource): T[] {
  const pool = [...items];
  const take = Math.min(count, pool.length);
  for (let i = 0; i < take; i++) {
    const j = i + Math.floor(random() * (pool.length - i));
    const picked = pool[j];
    pool[j] = pool[i];
    pool[i] = picked;
  }
  return pool.slice(0, take);
}
