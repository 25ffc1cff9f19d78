// src/middleware/session.ts
import type { FastifyRequest, FastifyReply } from 'fastify';
import type { SessionRegistry } from '../lib/sessionRegistry.js';
import type { AssistantSession } from '../lib/assistantSession.js';

export const SESSION_COOKIE = 'session_id';

declare module 'fastify' {
  interface FastifyRequest {
    sessionId?: string;
    assistantSession?: AssistantSession;
  }
}

/**
 * Read the signed session_id cookie and return its value if the signature holds
 */
export function readSignedCookie(request: FastifyRequest, name: string): string | null {
  const signed = request.cookies[name];
  if (!signed) {
    return null;
  }
  const result = request.unsignCookie(signed);
  return result.valid && result.value ? result.value : null;
}

/**
 * Session middleware - attaches the caller's assistant session, if any.
 * Runs on every request; an unknown or expired session is simply absent.
 */
export function createSessionMiddleware(registry: SessionRegistry<AssistantSession>) {
  return async function sessionMiddleware(
    request: FastifyRequest,
    _reply: FastifyReply
  ): Promise<void> {
    const sessionId = readSignedCookie(request, SESSION_COOKIE);
    if (!sessionId) {
      return;
    }

    const session = registry.get(sessionId);
    if (session) {
      request.sessionId = sessionId;
      request.assistantSession = session;
    }
  };
}

export const NOT_AUTHENTICATED = 'Not authenticated. Please log in.';

/**
 * Authentication guard
 * Sends 401 and returns null if the request has no live session
 */
export function requireSession(
  request: FastifyRequest,
  reply: FastifyReply
): AssistantSession | null {
  if (request.assistantSession) {
    return request.assistantSession;
  }
  reply.code(401).send({ success: false, error: NOT_AUTHENTICATED });
  return null;
}
