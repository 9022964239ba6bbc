// src/api/routes/launches.ts
import { Router } from 'express';
import { CrossChainCoordinator } from '../../coordinator/cross-chain-coordinator';
import { marketCap, progressBps } from '../../curve/price-engine';
import { AddressValidator } from '../../utils/address-validator';

export function launchRoutes(coordinator: CrossChainCoordinator): Router {
  const router = Router();

  router.get('/:launchId', async (req, res, next) => {
    try {
      const launchId = AddressValidator.requireLaunchId(req.params.launchId.toLowerCase());
      const view = await coordinator.describeLaunch(launchId);

      res.json({
        ...view,
        curves: view.curves.map(curve => ({
          ...curve,
          progressBps: progressBps(curve.state),
          marketCap: marketCap(curve.state)
        }))
      });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
