// src/api/routes/dead-letters.ts
import { Router } from 'express';
import { CrossChainCoordinator } from '../../coordinator/cross-chain-coordinator';

export function deadLetterRoutes(coordinator: CrossChainCoordinator): Router {
  const router = Router();

  router.get('/', (req, res) => {
    res.json({ deadLetters: coordinator.listDeadLetters() });
  });

  router.post('/:id/redispatch', async (req, res, next) => {
    try {
      const leg = await coordinator.redispatch(req.params.id);
      if (!leg) {
        res.status(404).json({ error: 'Not Found', message: `Dead letter ${req.params.id} not found` });
        return;
      }
      res.json({ leg });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
