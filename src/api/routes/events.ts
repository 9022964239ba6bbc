// src/api/routes/events.ts
import { Router } from 'express';
import { CallerAuthorizer, requireAuthorized } from '../../coordinator/caller-authorizer';
import { PushEventSource } from '../../sources/push-event-source';
import { ChainId } from '../../types';
import { ValidationError } from '../../types/errors';

/**
 * Relay webhook. The relay names itself in the x-caller-identity header; the body is one wire
 * event. Accepted events are processed asynchronously by the chain's worker.
 */
export function eventRoutes(sources: Map<ChainId, PushEventSource>, authorizer: CallerAuthorizer): Router {
  const router = Router();

  router.post('/:chainId', (req, res, next) => {
    try {
      const chainId = Number(req.params.chainId);
      const source = sources.get(chainId);
      if (!source) {
        res.status(404).json({ error: 'Not Found', message: `No event source for chain ${req.params.chainId}` });
        return;
      }

      const callerIdentity = req.header('x-caller-identity');
      if (!callerIdentity) {
        throw new ValidationError('x-caller-identity header is required');
      }
      requireAuthorized(authorizer, callerIdentity, 'push events');

      const envelope = source.push(callerIdentity, req.body);
      res.status(202).json({
        accepted: true,
        chainId: envelope.chainId,
        type: envelope.event.type,
        launchId: envelope.event.launchId,
        receivedAt: envelope.receivedAt
      });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
