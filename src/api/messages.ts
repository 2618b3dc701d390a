import type {NextFunction, Request, Response} from 'express';
import {Router} from 'express';
import {z} from 'zod';
import {
  DeadlineExceededError,
  ProcessedMessageIntegrityError,
} from '../events/errors.js';
import type {EmailMessage} from '../events/ports.js';
import type {ApiDeps} from './deps.js';

export const processMessageSchema = z.object({
  id: z.string().min(1),
  threadId: z.string().min(1),
  subject: z.string().default(''),
  bodyText: z.string(),
  headers: z.record(z.string()).default({}),
  receivedAt: z
    .string()
    .datetime({offset: true})
    .transform(value => new Date(value)),
});

/** Validates a request body into an EmailMessage. */
export function parseMessagePayload(
  body: unknown,
): {ok: true; message: EmailMessage} | {ok: false; issues: string[]} {
  const parsed = processMessageSchema.safeParse(body);
  if (!parsed.success) {
    return {
      ok: false,
      issues: parsed.error.issues.map(
        issue => `${issue.path.join('.') || '(body)'}: ${issue.message}`,
      ),
    };
  }
  return {ok: true, message: parsed.data};
}

export function createMessagesRouter({processor}: ApiDeps): Router {
  const router = Router();

  /**
   * POST /api/messages/process
   * Runs one message through the pipeline and returns its ProcessingResult.
   */
  router.post('/process', async (req: Request, res: Response, next: NextFunction) => {
    const payload = parseMessagePayload(req.body);
    if (!payload.ok) {
      res.status(400).json({ok: false, error: 'Invalid message payload', issues: payload.issues});
      return;
    }

    try {
      const result = await processor.processMessage(payload.message);
      res.json({ok: true, result});
    } catch (error) {
      if (error instanceof DeadlineExceededError) {
        res.status(503).json({ok: false, errorType: error.kind, error: error.message});
        return;
      }
      if (error instanceof ProcessedMessageIntegrityError) {
        res.status(500).json({ok: false, errorType: error.kind, error: error.message});
        return;
      }
      next(error);
    }
  });

  return router;
}
