import { FastifyInstance } from 'fastify';

declare module 'fastify' {
  interface FastifyRequest {
    /** Unparsed JSON body, kept for webhook signature verification */
    rawBody?: string;
  }
}

/** Parse JSON bodies while keeping the exact bytes the sender signed */
export function registerRawJsonParser(app: FastifyInstance): void {
  app.addContentTypeParser('application/json', { parseAs: 'string' }, (req, body, done) => {
    const raw = typeof body === 'string' ? body : body.toString('utf-8');
    req.rawBody = raw;
    if (raw.trim() === '') {
      done(null, {});
      return;
    }
    try {
      const json: unknown = JSON.parse(raw);
      done(null, json);
    } catch (err) {
      done(err instanceof Error ? err : new Error('Invalid JSON body'), undefined);
    }
  });
}
