import type { FastifyReply } from 'fastify';
import type { CallContext } from '../scm/types.js';

/**
 * Call context whose signal aborts when the client disconnects before the
 * response has been written.
 */
export function requestContext(reply: FastifyReply): CallContext {
  const controller = new AbortController();

  reply.raw.once('close', () => {
    if (!reply.raw.writableFinished) {
      controller.abort();
    }
  });

  return { signal: controller.signal };
}
