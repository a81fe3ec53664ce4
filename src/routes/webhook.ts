import express from 'express';
import { z } from 'zod';
import { ApprovalEngine } from '../services/approvalEngine';
import { errorMessage } from '../errors';

const WebhookSchema = z.object({
  From: z.string().trim().min(1),
  Body: z.string().trim().min(1),
});

/**
 * Twilio posts inbound WhatsApp messages here as a form.
 * From is the manager identity ("whatsapp:+15551234567").
 */
export const createWebhookRouter = (engine: Pick<ApprovalEngine, 'handleInbound'>) => {
  const router = express.Router();

  router.post('/', async (req, res) => {
    try {
      const { From, Body } = WebhookSchema.parse(req.body || {});
      console.log(`[webhook] ${From}: ${Body.slice(0, 80)}`);
      const result = await engine.handleInbound(From, Body);
      res.json({ status: 'success', message: 'Message processed', state: result.state });
    } catch (err: unknown) {
      if (err instanceof z.ZodError) {
        return res.status(400).json({ status: 'error', error: 'Missing From or Body', details: err.errors });
      }
      console.error('[webhook] Failed to process message', err);
      res.status(500).json({ status: 'error', error: 'Failed to process message', message: errorMessage(err) });
    }
  });

  return router;
};
