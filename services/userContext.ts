export const DEFAULT_USER_ROLE = 'researcher';

/** Who is asking. Only the role reaches the model; nothing here is persisted. */
export interface UserContext {
  role: string;
  userId?: string;
  sessionId?: string;
}

/**
 * Prefix the question with the asker's role. The result is both the
 * retrieval query and the prompt's question, so the role is embedded too.
 */
export function applyUserContext(question: string, userContext?: UserContext): string {
  if (!userContext) return question;
  const role = userContext.role.trim() || DEFAULT_USER_ROLE;
  return `[User: ${role}] ${question}`;
}
