import { Request, Response, Router } from 'express';
import { logger } from '../config/logger';
import { AnalyticsAnswerService, formatReply } from '../services/AnalyticsAnswerService';

/** Accepts `{ "text": "..." }` JSON or a raw text/plain body; anything else is an empty question. */
export function questionFromBody(body: unknown): string {
  if (typeof body === 'string') {
    return body;
  }
  if (typeof body === 'object' && body !== null && 'text' in body && typeof body.text === 'string') {
    return body.text;
  }
  return '';
}

export const answerHandler =
  (service: Pick<AnalyticsAnswerService, 'answer'>) =>
  async (req: Pick<Request, 'body'>, res: Pick<Response, 'type' | 'send'>): Promise<void> => {
    let value = 0;
    try {
      value = await service.answer(questionFromBody(req.body));
    } catch (error) {
      logger.error('❌ Answer service failed:', error);
    }
    res.type('text/plain').send(formatReply(value));
  };

/**
 * @route POST /api/answer
 * @desc Answer one analytics question with a single integer (text/plain)
 */
export function createAnswerRoutes(service: AnalyticsAnswerService): Router {
  const router = Router();
  router.post('/', answerHandler(service));
  return router;
}
