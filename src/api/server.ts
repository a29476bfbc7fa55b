import express, { NextFunction, Request, Response } from 'express';
import { MarketDataService } from '../service/MarketDataService';
import { ReadinessSource } from '../service/Readiness';
import { RPC_ERRORS, RpcDispatcher } from './rpc';

export const NOT_CAUGHT_UP = 525;

export interface AppDeps {
  service: MarketDataService;
  readiness: ReadinessSource;
}

export function createApp({ service, readiness }: AppDeps): express.Express {
  const app = express();
  const dispatcher = new RpcDispatcher(service, readiness);

  app.use((req: Request, res: Response, next: NextFunction) => {
    res.header('Access-Control-Allow-Origin', '*');
    res.header('Access-Control-Allow-Methods', 'POST, GET, OPTIONS');
    res.header('Access-Control-Allow-Headers', 'Origin, X-Requested-With, Content-Type, Accept');
    if (req.method === 'OPTIONS') {
      res.sendStatus(204);
      return;
    }
    next();
  });

  app.get('/health', (req, res) => res.json(readiness.current()));

  app.post(
    '/api',
    (req: Request, res: Response, next: NextFunction) => {
      // don't do anything until the ledger has caught up
      if (!readiness.current().caught_up) {
        res.status(NOT_CAUGHT_UP).json({ error: 'Server is not caught up. Please try again later.' });
        return;
      }
      next();
    },
    express.json({ limit: '1mb' }),
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        res.json(await dispatcher.handle(req.body));
      } catch (e) {
        next(e);
      }
    }
  );

  // body-parser rejects malformed JSON before the dispatcher sees it
  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    const isParseError = typeof err === 'object' && err !== null && 'type' in err && err.type === 'entity.parse.failed';
    if (!isParseError) {
      console.error('[Api] Unhandled error:', err);
    }
    res.status(isParseError ? 400 : 500).json({
      jsonrpc: '2.0',
      id: null,
      error: isParseError
        ? { code: RPC_ERRORS.PARSE, message: 'Parse error' }
        : { code: RPC_ERRORS.INTERNAL, message: 'Internal error' },
    });
  });

  return app;
}
