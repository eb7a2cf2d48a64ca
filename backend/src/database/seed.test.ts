import { describe, it, expect, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import path from 'path';
import { fileURLToPath } from 'url';
import { ZodError } from 'zod';
import { InMemoryForumStore } from './memory-store.js';
import { migrate } from './migrate.js';
import { loadPersonaSeeds, seedPersonas } from './seed.js';
import { T0 } from '../test-support/fixtures.js';
import { fakePgDriver } from '../test-support/pg.js';

const ROOT = fileURLToPath(new URL('../../../', import.meta.url));
const PERSONAS_PATH = path.join(ROOT, 'config/personas.json');
const SCHEMA_PATH = path.join(ROOT, 'db/schema.sql');

describe('persona seeds', () => {
  let tmpDir: string | undefined;

  afterEach(async () => {
    if (tmpDir) await rm(tmpDir, { recursive: true, force: true });
    tmpDir = undefined;
  });

  async function writeSeeds(content: unknown): Promise<string> {
    tmpDir = await mkdtemp(path.join(tmpdir(), 'forum-seed-test-'));
    const file = path.join(tmpDir, 'personas.json');
    await writeFile(file, JSON.stringify(content));
    return file;
  }

  it('loads the bundled roster', async () => {
    const seeds = await loadPersonaSeeds(PERSONAS_PATH);

    expect(seeds).toHaveLength(8);
    expect(new Set(seeds.map(seed => seed.id)).size).toBe(8);
    expect(seeds.every(seed => seed.isActive)).toBe(true);
  });

  it('defaults isActive to true', async () => {
    const file = await writeSeeds([
      { id: '5d3f9e20-2222-4b7c-9d0e-000000000001', name: 'Quiet', systemPrompt: 'You lurk.' },
      { id: '5d3f9e20-2222-4b7c-9d0e-000000000002', name: 'Retired', systemPrompt: 'You left.', isActive: false }
    ]);

    const seeds = await loadPersonaSeeds(file);
    expect(seeds.map(seed => seed.isActive)).toEqual([true, false]);
  });

  it('rejects malformed entries', async () => {
    const file = await writeSeeds([{ id: 'not-a-uuid', name: '', systemPrompt: 'x' }]);
    await expect(loadPersonaSeeds(file)).rejects.toBeInstanceOf(ZodError);
  });

  it('keeps personas that were already stored', async () => {
    const store = new InMemoryForumStore();
    const id = '5d3f9e20-2222-4b7c-9d0e-000000000001';
    await seedPersonas(store, [{ id, name: 'Original', systemPrompt: 'First.', isActive: true }], T0);
    await seedPersonas(store, [{ id, name: 'Changed', systemPrompt: 'Second.', isActive: true }], T0);

    expect((await store.getPersona(id))?.name).toBe('Original');
    expect((await store.getPersona(id))?.createdAt).toEqual(T0);
  });
});

describe('migrate', () => {
  it('applies the schema file, then inserts each seed persona', async () => {
    const { driver, statements } = fakePgDriver();

    await migrate(driver, { schemaPath: SCHEMA_PATH, personasPath: PERSONAS_PATH, now: T0 });

    expect(statements[0].text).toContain('CREATE TABLE IF NOT EXISTS forum_agent_schedules');
    const inserts = statements.slice(1);
    expect(inserts).toHaveLength(8);
    expect(inserts.every(statement => statement.text.includes('ON CONFLICT (id) DO NOTHING'))).toBe(true);
    expect(inserts[0].values[4]).toBe(T0);
  });
});
