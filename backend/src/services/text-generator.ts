/**
 * Produces one reply from a system prompt and a single user message.
 * Implementations throw on failure; callers decide how to record it.
 */
export interface TextGenerator {
  generate(systemPrompt: string, userMessage: string): Promise<string>;
}
