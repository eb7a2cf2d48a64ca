import express from 'express';
import supertest from 'supertest';
import type { ForumUser, Persona } from '@chromedome/shared';
import { createApp } from '../app.js';
import { InMemoryForumStore } from '../database/memory-store.js';
import { generateToken } from '../middleware/auth.js';
import {
  ADMIN,
  ALICE,
  BOB,
  ManualClock,
  RecordingQueue,
  seededStore,
  sequenceRandom
} from '../test-support/fixtures.js';

export const TEST_JWT_SECRET = 'test-secret';

export interface TestContext {
  app: express.Express;
  store: InMemoryForumStore;
  queue: RecordingQueue;
  clock: ManualClock;
  personas: Persona[];
  request: supertest.Agent;
}

/**
 * Create a test Express app over an in-memory store. Jobs are recorded on
 * the queue, never run, so each test decides which agent work happens.
 */
export async function createTestApp(): Promise<TestContext> {
  const { store, personas } = await seededStore(3);
  const queue = new RecordingQueue();
  const clock = new ManualClock();

  const app = createApp({
    store,
    queue,
    clock,
    // delay of every direct reply: 60s + 0.5 * 30s
    random: sequenceRandom(0.5),
    jwtSecret: TEST_JWT_SECRET,
    frontendUrl: 'http://localhost:5173'
  });

  return { app, store, queue, clock, personas, request: supertest(app) };
}

export function authHeader(user: ForumUser = ALICE): string {
  return `Bearer ${generateToken(user.id, TEST_JWT_SECRET)}`;
}

export { ADMIN, ALICE, BOB };
