import type { Router } from 'express';
import express from 'express';
import type pino from 'pino';
import type { Orchestrator } from '../core/orchestrator.js';
import { ChatInput, ChatOutput } from '../schemas/chat.js';

export const router = (orchestrator: Orchestrator, log: pino.Logger): Router => {
  const r = express.Router();

  r.post('/chat', async (req, res) => {
    const parsed = ChatInput.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({ error: parsed.error.flatten() });
    }
    try {
      const out = await orchestrator.handleMessage(parsed.data.message, parsed.data.sessionId);
      return res.json(ChatOutput.parse({ reply: out.replyText, sessionId: out.sessionId }));
    } catch (err: unknown) {
      log.error({ err }, 'chat failed');
      return res.status(500).json({ error: 'internal_error' });
    }
  });

  r.delete('/sessions/:id', (req, res) => {
    const cleared = orchestrator.endSession(req.params.id);
    if (!cleared) return res.status(404).json({ error: 'session_not_found' });
    return res.status(204).end();
  });

  return r;
};
