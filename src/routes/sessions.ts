import express from 'express';
import { z } from 'zod';
import { IngestionFailure, errorMessage } from '../errors';
import { ApprovalEngine } from '../services/approvalEngine';

type SessionsEngine = Pick<ApprovalEngine, 'describe' | 'ingestBatch' | 'requestFetch'>;

const ParamsSchema = z.object({ managerId: z.string().trim().min(1) });

export const createSessionsRouter = (engine: SessionsEngine) => {
  const router = express.Router();

  router.get('/sessions/:managerId/summary', async (req, res) => {
    try {
      const { managerId } = ParamsSchema.parse(req.params);
      const overview = await engine.describe(managerId);
      res.json({ success: true, ...overview });
    } catch (err: unknown) {
      if (err instanceof z.ZodError) {
        return res.status(400).json({ success: false, error: 'Invalid manager id', details: err.errors });
      }
      console.error('Failed to load session summary', err);
      res.status(500).json({ success: false, error: 'Failed to load session summary', message: errorMessage(err) });
    }
  });

  // Push an already analyzed batch, bypassing the fetch pipeline.
  router.post('/ingestions/:managerId', async (req, res) => {
    try {
      const { managerId } = ParamsSchema.parse(req.params);
      const result = await engine.ingestBatch(managerId, req.body);
      res.status(201).json({
        success: true,
        episodeId: result.session.episodeId,
        totalReviews: result.totalReviews,
        excludedCount: result.excludedCount,
        pendingCount: result.pendingCount,
        invalidCount: result.invalidCount,
      });
    } catch (err: unknown) {
      if (err instanceof z.ZodError) {
        return res.status(400).json({ success: false, error: 'Invalid manager id', details: err.errors });
      }
      if (err instanceof IngestionFailure) {
        return res
          .status(422)
          .json({ success: false, error: 'Ingestion failed', message: err.message, details: err.details ?? [] });
      }
      console.error('Failed to ingest batch', err);
      res.status(500).json({ success: false, error: 'Failed to ingest batch', message: errorMessage(err) });
    }
  });

  router.post('/fetches/:managerId', async (req, res) => {
    try {
      const { managerId } = ParamsSchema.parse(req.params);
      const actions = await engine.requestFetch(managerId);
      const notice = actions.map((a) => (a.kind === 'text' ? a.text : a.fallbackText)).join('\n');
      res.status(202).json({ success: true, notice });
    } catch (err: unknown) {
      if (err instanceof z.ZodError) {
        return res.status(400).json({ success: false, error: 'Invalid manager id', details: err.errors });
      }
      console.error('Failed to queue fetch', err);
      res.status(500).json({ success: false, error: 'Failed to queue fetch', message: errorMessage(err) });
    }
  });

  return router;
};
