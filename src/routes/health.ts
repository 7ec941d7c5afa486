import { Router, Request, Response } from 'express';

import { getDatabaseStatus } from '../config/database';
import { getLedgerStore } from '../store';

const router = Router();

const storeStatus = () => {
  const store = getLedgerStore();
  return {
    driver: store.driver,
    ready: store.isReady(),
  };
};

router.get('/', (_req: Request, res: Response) => {
  const store = storeStatus();
  const dbStatus = getDatabaseStatus();

  res.status(store.ready ? 200 : 503).json({
    status: store.ready ? 'healthy' : 'unhealthy',
    timestamp: new Date().toISOString(),
    services: {
      ledgerStore: store,
      database: {
        connected: dbStatus.connected,
        readyState: dbStatus.readyState,
      },
    },
  });
});

router.get('/live', (_req: Request, res: Response) => {
  res.status(200).json({
    status: 'alive',
    timestamp: new Date().toISOString(),
  });
});

router.get('/ready', (_req: Request, res: Response) => {
  const { ready } = storeStatus();

  res.status(ready ? 200 : 503).json({
    status: ready ? 'ready' : 'not ready',
    timestamp: new Date().toISOString(),
  });
});

export default router;
