import express, { Express, NextFunction, Request, Response } from 'express';
import cors from 'cors';
import compression from 'compression';
import helmet from 'helmet';
import rateLimit from 'express-rate-limit';
import crypto from 'node:crypto';

interface CreateAppOptions {
  isProduction: boolean;
  corsAllowlist: string[];
  rateLimitWindowMs: number;
  rateLimitMaxRequests: number;
  /** Tighter cap for `/api/forecast`, where every hit costs two upstream calls. */
  forecastRateLimitMaxRequests: number;
}

export const createApp = ({
  isProduction,
  corsAllowlist,
  rateLimitWindowMs,
  rateLimitMaxRequests,
  forecastRateLimitMaxRequests,
}: CreateAppOptions): Express => {
  const app = express();

  const corsOptions: cors.CorsOptions = {
    methods: ['GET', 'POST'],
    origin(origin, callback) {
      if (!origin) {
        callback(null, true);
        return;
      }
      if (corsAllowlist.length === 0) {
        callback(null, !isProduction);
        return;
      }
      callback(null, corsAllowlist.includes(origin));
    },
  };

  app.disable('x-powered-by');
  app.set('trust proxy', 1);
  app.use(cors(corsOptions));
  app.use(compression());
  app.use(helmet());
  app.use(express.json({ limit: '1mb' }));

  app.use((req: Request, res: Response, next: NextFunction) => {
    const requestId = crypto.randomUUID();
    const startedAt = Date.now();
    res.locals.requestId = requestId;
    res.setHeader('X-Request-Id', requestId);
    res.on('finish', () => {
      if (!isProduction || res.statusCode >= 500) {
        const elapsed = Date.now() - startedAt;
        console.log(`[${requestId}] ${req.method} ${req.originalUrl} -> ${res.statusCode} (${elapsed}ms)`);
      }
    });
    next();
  });

  const limiter = (max: number) =>
    rateLimit({
      windowMs: rateLimitWindowMs,
      max,
      standardHeaders: true,
      legacyHeaders: false,
      skip: (req) => req.method === 'OPTIONS',
      message: { error: 'Too many requests. Please retry later.' },
    });

  app.use('/api/forecast', limiter(forecastRateLimitMaxRequests));
  app.use('/api', limiter(rateLimitMaxRequests));

  return app;
};

interface HttpError extends Error {
  status?: number;
  statusCode?: number;
  type?: string;
}

const isHttpError = (error: unknown): error is HttpError => error instanceof Error;

// Registered last, after every route.
export const registerFallbackHandlers = (app: Express, { isProduction }: { isProduction: boolean }) => {
  app.use((req: Request, res: Response) => {
    res.status(404).json({ error: 'Endpoint not found', message: `${req.method} ${req.originalUrl} does not exist` });
  });

  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const status = isHttpError(error) ? error.status || error.statusCode || 500 : 500;
    if (status >= 500) {
      console.error('[app] unhandled error:', error);
    }
    if (res.headersSent) {
      return;
    }
    if (isHttpError(error) && error.type === 'entity.parse.failed') {
      res.status(400).json({ error: 'Invalid JSON body.' });
      return;
    }
    const message = isHttpError(error) ? error.message : String(error);
    res.status(status).json({
      error: status >= 500 ? 'Internal server error' : 'Bad request',
      details: status >= 500 && isProduction ? 'Unexpected backend error.' : message,
    });
  });
};
