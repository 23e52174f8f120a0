import { Router } from 'express';
import { toErrorMessage } from '../errors.js';
import { createLogger } from '../logger.js';
import type { StationRepository } from '../stations/repository.js';

const log = createLogger('stations');

export function createStationsRouter(repository: StationRepository): Router {
  const router = Router();

  // Catalogue size and fingerprint of the loaded snapshot
  router.get('/stats', async (_req, res) => {
    try {
      const [stations, fingerprint, loadedAt] = await Promise.all([
        repository.getStations(),
        repository.getStationsHash(),
        repository.getLoadedAt(),
      ]);
      res.json({ total: stations.length, fingerprint, loaded_at: loadedAt.toISOString() });
    } catch (error) {
      log.error({ err: error }, 'Error fetching station stats');
      res.status(503).json({ error: 'Failed to load stations', detail: toErrorMessage(error) });
    }
  });

  return router;
}
