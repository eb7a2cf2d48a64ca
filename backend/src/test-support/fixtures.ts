import { vi } from 'vitest';
import type { ForumUser, Persona } from '@chromedome/shared';
import { InMemoryForumStore } from '../database/memory-store.js';
import { EnqueueOptions, JobHandle, JobName, JobPayloads, JobQueue } from '../jobs/types.js';
import { TextGenerator } from '../services/text-generator.js';
import { Clock } from '../utils/clock.js';

export const T0 = new Date('2025-03-01T12:00:00.000Z');

export const ALICE: ForumUser = {
  id: '0b7e5a1c-1111-4a6b-8c9d-000000000001',
  name: 'Alice',
  avatarUrl: null,
  isAdmin: false
};

export const BOB: ForumUser = {
  id: '0b7e5a1c-1111-4a6b-8c9d-000000000002',
  name: 'Bob',
  avatarUrl: 'https://example.test/bob.png',
  isAdmin: false
};

export const ADMIN: ForumUser = {
  id: '0b7e5a1c-1111-4a6b-8c9d-000000000003',
  name: 'Moderator',
  avatarUrl: null,
  isAdmin: true
};

export function makePersona(index: number, overrides: Partial<Persona> = {}): Persona {
  return {
    id: `5d3f9e20-2222-4b7c-9d0e-${String(index).padStart(12, '0')}`,
    name: `Persona ${index}`,
    systemPrompt: `You are persona ${index}.`,
    isActive: true,
    createdAt: T0,
    updatedAt: T0,
    ...overrides
  };
}

/** A clock tests move by hand. */
export class ManualClock implements Clock {
  constructor(private current: Date = T0) {}

  now(): Date {
    return new Date(this.current.getTime());
  }

  set(date: Date): void {
    this.current = date;
  }

  advanceMinutes(minutes: number): void {
    this.current = new Date(this.current.getTime() + minutes * 60_000);
  }

  advanceSeconds(seconds: number): void {
    this.current = new Date(this.current.getTime() + seconds * 1000);
  }
}

/** Returns the given values in order, then repeats the last one. */
export function sequenceRandom(...values: number[]): () => number {
  let index = 0;
  return () => {
    const value = values[Math.min(index, values.length - 1)] ?? 0;
    index++;
    return value;
  };
}

export interface RecordedJob<K extends JobName = JobName> {
  name: K;
  payload: JobPayloads[K];
  options?: EnqueueOptions;
}

/** JobQueue that only records what was enqueued. */
export class RecordingQueue implements JobQueue {
  jobs: RecordedJob[] = [];
  failWith: Error | null = null;

  async enqueue<K extends JobName>(name: K, payload: JobPayloads[K], options?: EnqueueOptions): Promise<JobHandle> {
    if (this.failWith) throw this.failWith;
    const job: RecordedJob = { name, payload, options };
    this.jobs.push(job);
    return {
      id: `job-${this.jobs.length}`,
      name,
      runAt: new Date(T0.getTime() + (options?.delayMs ?? 0))
    };
  }
}

export function stubGenerator(reply: string | Error = 'A thoughtful reply.') {
  const generate = vi.fn<TextGenerator['generate']>(async () => {
    if (reply instanceof Error) throw reply;
    return reply;
  });
  const generator: TextGenerator = { generate };
  return { generator, generate };
}

export async function seededStore(personaCount = 4): Promise<{ store: InMemoryForumStore; personas: Persona[] }> {
  const store = new InMemoryForumStore();
  await store.saveUser(ALICE);
  await store.saveUser(BOB);
  await store.saveUser(ADMIN);
  const personas = Array.from({ length: personaCount }, (_, i) => makePersona(i + 1));
  for (const persona of personas) {
    await store.savePersona(persona);
  }
  return { store, personas };
}

export async function createThread(store: InMemoryForumStore, createdAt: Date = T0) {
  return store.createThread({
    userId: ALICE.id,
    title: 'Noticed my temples receding',
    content: 'Is it time to shave it all off?',
    createdAt
  });
}
