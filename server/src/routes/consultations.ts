/**
 * routes/consultations.ts — REST API for the consultation lifecycle.
 *
 * Mounted at /api/consultations in app.ts. Every route requires a Bearer
 * JWT; ownership and role checks happen in the AccessGate, not here.
 *
 *   GET  /                         — The caller's consultations
 *   GET  /:appointmentId/status    — Poll target for the waiting screen
 *   POST /:appointmentId/start     — Doctor starts the call (SCHEDULED → ACTIVE)
 *   POST /:appointmentId/join      — Pre-flight: would join-room admit me now?
 *   POST /:appointmentId/end       — Doctor ends the call (ACTIVE → ENDED)
 *   POST /:appointmentId/cancel    — Doctor cancels (SCHEDULED → CANCELLED)
 *
 * Response bodies use snake_case keys; the room_id returned here is what
 * the client passes to the `join-room` socket event.
 *
 * All errors are forwarded to the global error handler via next(err).
 */
import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import { LIMITS } from '../shared';
import type { MeetingSession } from '../shared';
import type { ConsultationService } from '../services/consultationService';
import { authMiddleware } from '../middleware/auth';
import { statusPollLimiter } from '../middleware/rateLimit';

export interface ConsultationRouteDeps {
  consultations: ConsultationService;
  jwtSecret: string;
}

/** Wire shape of a session record */
export function toSessionBody(session: MeetingSession) {
  return {
    room_id: session.roomId,
    appointment_id: session.appointmentId,
    state: session.state,
    created_at: session.createdAt,
    started_at: session.startedAt,
    ended_at: session.endedAt,
    cancelled_at: session.cancelledAt,
    end_reason: session.endReason,
  };
}

export function consultationRoutes({ consultations, jwtSecret }: ConsultationRouteDeps): Router {
  const router = Router();
  router.use(authMiddleware(jwtSecret));

  // GET /api/consultations — Sessions where the caller is the doctor or the patient
  router.get('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const sessions = await consultations.listMine(req.user);
      res.json({ consultations: sessions.map(toSessionBody) });
    } catch (err) {
      next(err);
    }
  });

  // GET /api/consultations/:appointmentId/status — Cheap, read-only, polled every few seconds
  router.get(
    '/:appointmentId/status',
    statusPollLimiter,
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const status = await consultations.status(req.user, req.params.appointmentId);
        res.json({
          room_id: status.roomId,
          state: status.state,
          can_join: status.canJoin,
          message: status.message,
          poll_interval_ms: LIMITS.STATUS_POLL_INTERVAL_MS,
        });
      } catch (err) {
        next(err);
      }
    },
  );

  // POST /api/consultations/:appointmentId/start — Only one of concurrent starts wins
  router.post('/:appointmentId/start', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const session = await consultations.start(req.user, req.params.appointmentId);
      res.json({ state: session.state, room_id: session.roomId, started_at: session.startedAt });
    } catch (err) {
      next(err);
    }
  });

  // POST /api/consultations/:appointmentId/join — Binding happens on the socket, not here
  router.post('/:appointmentId/join', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const session = await consultations.checkJoin(req.user, req.params.appointmentId);
      res.json({ room_id: session.roomId, state: session.state });
    } catch (err) {
      next(err);
    }
  });

  // POST /api/consultations/:appointmentId/end — Repeating it returns the ended session
  router.post('/:appointmentId/end', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const session = await consultations.end(req.user, req.params.appointmentId);
      res.json({ state: session.state, room_id: session.roomId, ended_at: session.endedAt, end_reason: session.endReason });
    } catch (err) {
      next(err);
    }
  });

  // POST /api/consultations/:appointmentId/cancel — Only before the call started
  router.post('/:appointmentId/cancel', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const session = await consultations.cancel(req.user, req.params.appointmentId);
      res.json({ state: session.state, room_id: session.roomId, cancelled_at: session.cancelledAt });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
