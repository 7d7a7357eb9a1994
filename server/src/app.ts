/**
 * app.ts — Express application factory.
 *
 * Middleware pipeline:
 *   helmet → cors → json → requestId → rateLimit → routes → errorHandler
 *
 * Kept apart from server.ts so the HTTP surface can be built around an
 * in-memory container without opening sockets or reading config.
 */
import express from 'express';
import type { Express } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import type { ConsultationService } from './services/consultationService';
import { requestIdMiddleware } from './middleware/requestId';
import { errorHandler } from './middleware/errorHandler';
import { generalLimiter } from './middleware/rateLimit';
import { consultationRoutes } from './routes/consultations';

export interface AppDeps {
  consultations: ConsultationService;
  jwtSecret: string;
  corsOrigins: string[];
}

export function createApp({ consultations, jwtSecret, corsOrigins }: AppDeps): Express {
  const app = express();

  // Security headers (XSS protection, content-type sniffing prevention, etc.)
  app.use(helmet());
  app.use(cors({ origin: corsOrigins, credentials: true }));

  // Request bodies here are tiny; anything larger is abuse
  app.use(express.json({ limit: '16kb' }));

  // Request ID for log correlation (X-Request-Id header)
  app.use(requestIdMiddleware);

  // Global rate limiting (applies to all routes)
  app.use(generalLimiter);

  // Health check endpoint — used by load balancers and Kubernetes liveness probes
  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', uptime: process.uptime() });
  });

  app.use('/api/consultations', consultationRoutes({ consultations, jwtSecret }));

  // Global error handler — must be registered LAST (Express convention)
  app.use(errorHandler);

  return app;
}
