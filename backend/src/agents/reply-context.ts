import type { Persona, Reply, Thread } from '@chromedome/shared';
import { ForumRepository } from '../database/types.js';

export const CONTEXT_WINDOW_SIZE = 10;

export const ANONYMOUS_AUTHOR = 'Anonymous';

export const SCHEDULED_REPLY_MESSAGE = 'Write your reply now.';

export interface ContextEntry {
  authorName: string;
  content: string;
}

/**
 * The last completed replies of a thread, oldest first, with author names
 * resolved. `excludeReplyId` keeps the caller's own placeholder out.
 */
export async function loadRecentContext(
  repo: ForumRepository,
  threadId: string,
  excludeReplyId: string
): Promise<ContextEntry[]> {
  const replies = await repo.listRecentCompletedReplies(threadId, {
    limit: CONTEXT_WINDOW_SIZE,
    excludeReplyId
  });

  const userIds = replies.flatMap(reply => (reply.author.kind === 'user' ? [reply.author.userId] : []));
  const personaIds = replies.flatMap(reply => (reply.author.kind === 'persona' ? [reply.author.personaId] : []));
  const [users, personas] = await Promise.all([
    repo.getUsersByIds(userIds),
    repo.getPersonasByIds(personaIds)
  ]);
  const userNames = new Map(users.map(user => [user.id, user.name]));
  const personaNames = new Map(personas.map(persona => [persona.id, persona.name]));

  return replies.map(reply => ({
    authorName: authorName(reply, userNames, personaNames),
    content: reply.content ?? ''
  }));
}

function authorName(
  reply: Reply,
  userNames: Map<string, string | null>,
  personaNames: Map<string, string>
): string {
  switch (reply.author.kind) {
    case 'persona':
      return personaNames.get(reply.author.personaId) ?? ANONYMOUS_AUTHOR;
    case 'user':
      return userNames.get(reply.author.userId) ?? ANONYMOUS_AUTHOR;
    case 'orphaned':
      return ANONYMOUS_AUTHOR;
  }
}

export function buildPersonaPrompt(
  persona: Pick<Persona, 'systemPrompt'>,
  thread: Pick<Thread, 'title' | 'content'>,
  recent: ContextEntry[]
): string {
  let context = `THREAD TITLE: ${thread.title}\n\nORIGINAL POST:\n${thread.content}\n\n`;
  if (recent.length > 0) {
    context += 'RECENT DISCUSSION:\n';
    for (const entry of recent.slice(-CONTEXT_WINDOW_SIZE)) {
      context += `\n${entry.authorName}: ${entry.content}\n`;
    }
  }

  return `${persona.systemPrompt}

---

${context}

Write a reply to this discussion. Be yourself and add to the conversation naturally. Don't repeat what others have said. Keep it concise.`;
}

export function buildDirectReplyMessage(userReplyContent: string): string {
  return `A user just replied with this message:\n\n"${userReplyContent}"\n\nWrite a direct response to their message, engaging with what they said.`;
}
