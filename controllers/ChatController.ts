import { Controller, POST } from 'fastify-decorators';
import type { FastifyReply, FastifyRequest } from 'fastify';
import { z } from 'zod';
import { DEFAULT_USER_ROLE, type UserContext } from '../services/userContext.js';

const optionalField = z.string().optional().catch(undefined);

const ChatRequestSchema = z.object({
  message: z.string(),
  role: optionalField,
  user_id: optionalField,
  session_id: optionalField,
});

export const UNAVAILABLE_RESPONSE =
  'I apologize, but the research assistant system is currently unavailable. Please try again later.';

@Controller('/chat')
export default class ChatController {
  @POST('/')
  async handleChat(req: FastifyRequest<{ Body: unknown }>, reply: FastifyReply) {
    const pipeline = req.server.answerPipeline;
    if (!pipeline) {
      return reply.code(503).send({ error: 'RAG system is not available', response: UNAVAILABLE_RESPONSE });
    }

    const parsed = ChatRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      return reply.code(400).send({ error: 'Message is required' });
    }
    const message = parsed.data.message.trim();
    if (!message) {
      return reply.code(400).send({ error: 'Message cannot be empty' });
    }

    const userContext: UserContext = {
      role: parsed.data.role ?? DEFAULT_USER_ROLE,
      userId: parsed.data.user_id ?? 'unknown',
      sessionId: parsed.data.session_id ?? 'unknown',
    };
    req.log.info({ sessionId: userContext.sessionId }, `Received message from ${userContext.userId}: ${message}`);

    const response = await pipeline.answer(message, userContext);
    return reply.send({
      question: message,
      response,
      timestamp: new Date().toISOString(),
      source: 'cisnr-rag-system',
    });
  }
}
