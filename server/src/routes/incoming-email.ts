/**
 * Incoming Email Routes
 *
 * POST /api/incoming-email - Accept a raw RFC 5322 message from the mail transport
 */

import { timingSafeEqual } from 'crypto';
import express, { Request, Response, Router } from 'express';
import { IncomingEmailSettings } from '../lib/config';
import { isBlank } from '../lib/incoming-email/email-receiver';

export const TOKEN_HEADER = 'x-incoming-email-token';

export type EnqueueIncomingEmail = (raw: Buffer) => Promise<string | undefined>;

function tokensMatch(expected: string, provided: string | undefined): boolean {
  if (!provided) return false;
  const a = Buffer.from(expected);
  const b = Buffer.from(provided);
  return a.length === b.length && timingSafeEqual(a, b);
}

export function createIncomingEmailRouter(settings: IncomingEmailSettings, enqueue: EnqueueIncomingEmail): Router {
  const router = Router();

  router.post(
    '/',
    // Kept as bytes: mailparser decodes each part with its own charset
    express.raw({ type: ['message/rfc822', 'text/plain'], limit: '25mb' }),
    async (req: Request, res: Response): Promise<void> => {
      if (!settings.enabled) {
        res.status(404).json({ error: 'Incoming email is disabled' });
        return;
      }

      if (!tokensMatch(settings.token, req.get(TOKEN_HEADER))) {
        res.status(401).json({ error: 'Invalid incoming email token' });
        return;
      }

      const raw: unknown = req.body;
      if (!Buffer.isBuffer(raw) || isBlank(raw)) {
        res.status(400).json({ error: 'Request body must be a raw email message' });
        return;
      }

      try {
        const jobId = await enqueue(raw);
        console.log(`[IncomingEmailRoute] Queued incoming email as job ${jobId ?? 'unknown'}`);
        res.status(202).json({ queued: true, jobId });
      } catch (error: unknown) {
        console.error('[IncomingEmailRoute] Failed to queue incoming email:', error);
        res.status(503).json({ error: 'Could not queue the email, try again later' });
      }
    }
  );

  return router;
}
