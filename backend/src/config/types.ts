/**
 * Runtime configuration for the forum backend
 */

export interface LlmConfig {
  apiKey: string | undefined;
  model: string;
  maxTokens: number;
  // Replace the LLM with canned text
  demoMode: boolean;
}

export interface SchedulerConfig {
  dispatchIntervalSeconds: number;
  stallTimeoutMinutes: number;
}

export interface JobConfig {
  concurrency: number;
  pollIntervalMs: number;
  // Run the dispatcher and job worker inside the HTTP process
  runWorker: boolean;
}

export interface PathConfig {
  personas: string;
  schema: string;
}

export interface AppConfig {
  port: number;
  host: string;
  frontendUrl: string;
  // Absent means in-memory store and in-process queue
  databaseUrl: string | undefined;
  jwtSecret: string;
  usingDefaultJwtSecret: boolean;
  llm: LlmConfig;
  scheduler: SchedulerConfig;
  jobs: JobConfig;
  paths: PathConfig;
}
