/**
 * Health Check Route
 * Layer: Interfaces (HTTP)
 *
 *   GET /api/v1/health  →  { status: 'ok', uptime: 123.4, timestamp: '...' }
 *
 * Used by load balancers and container liveness checks. It only confirms the
 * process is serving HTTP; it does not touch the data directory.
 */
import { Router } from 'express';

const router = Router();

router.get('/health', (_req, res) => {
  res.status(200).json({
    status: 'ok',
    uptime: process.uptime(),
    timestamp: new Date().toISOString(),
  });
});

export { router as healthRoutes };
