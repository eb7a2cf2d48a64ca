/**
 * Centralized error and warning messages for the forum backend
 *
 * Single source of truth for user-facing strings and operator warnings.
 *
 * Categories:
 * - API_KEY: Missing LLM credentials
 * - CONFIG: Startup configuration problems
 * - HTTP_ERRORS: Bodies returned by the forum API
 * - AGENT_ERRORS: Failure results reported by agent jobs
 */

// =============================================================================
// API KEY ERRORS
// =============================================================================

export const API_KEY_ERRORS = {
  ANTHROPIC_MISSING:
    '⚠️ API KEY ERROR: No Anthropic API key provided. Set ANTHROPIC_API_KEY or run with DEMO_MODE=true. Persona replies will fail.',
};

// =============================================================================
// CONFIG ERRORS
// =============================================================================

export const CONFIG_ERRORS = {
  INVALID_ENV: (issues: string[]) =>
    ['Invalid environment configuration:', ...issues.map(issue => `  - ${issue}`)].join('\n'),

  DEFAULT_JWT_SECRET:
    '⚠️ CONFIG WARNING: JWT_SECRET is not set. Using an insecure development secret.',

  NO_DATABASE:
    '⚠️ CONFIG WARNING: DATABASE_URL is not set. Using the in-memory store; forum data is lost on restart.',

  STARTUP_FAILED: 'Failed to start server:',
};

// =============================================================================
// HTTP ERRORS (response bodies)
// =============================================================================

export const HTTP_ERRORS = {
  INVALID_INPUT: 'Invalid input',
  NO_TOKEN: 'Access token required',
  INVALID_TOKEN: 'Invalid or expired token',
  USER_NOT_FOUND: 'User not found',
  THREAD_NOT_FOUND: 'Thread not found',
  REPLY_NOT_FOUND: 'Reply not found',
  NOT_THREAD_OWNER: 'Only the thread author or an admin can delete this thread',
  NOT_REPLY_OWNER: 'Only the reply author or an admin can delete this reply',
  INTERNAL: 'Internal server error',
};

// =============================================================================
// AGENT ERRORS (job results)
// =============================================================================

export const AGENT_ERRORS = {
  THREAD_NOT_FOUND: 'Thread not found',
  PARENT_REPLY_NOT_FOUND: 'Parent reply not found',
  PERSONA_NOT_FOUND: 'Persona not found',
  NO_ACTIVE_PERSONAS: 'No active personas',
  SCHEDULE_NOT_FOUND: 'Schedule not found',
  SCHEDULE_INACTIVE: 'Schedule inactive',
  STALE_CLAIM: 'Schedule claim superseded',
  PERSONA_INACTIVE: 'Persona inactive',
  DUPLICATE_SCHEDULE: 'Schedules already exist for this thread and persona',

  // Stored as the content of a reply whose generation failed
  GENERATION_FALLBACK: 'Error generating response',
};
