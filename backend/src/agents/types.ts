import { ForumStore } from '../database/types.js';
import { JobQueue } from '../jobs/types.js';
import { TextGenerator } from '../services/text-generator.js';
import { Clock, RandomSource } from '../utils/clock.js';

export interface AgentDeps {
  store: ForumStore;
  clock: Clock;
  random: RandomSource;
}

export interface QueueingAgentDeps extends AgentDeps {
  queue: JobQueue;
}

export interface GeneratingAgentDeps extends AgentDeps {
  generator: TextGenerator;
}
