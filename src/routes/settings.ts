import { Router, type RequestHandler } from 'express';
import type { ConfigStore } from '../services/configStore';
import { successResponse } from '../utils/response';

/**
 * A / AAAA 开关、清理未知记录与默认 TTL
 */
export function createSettingsRoutes(store: ConfigStore, writeLimiter: RequestHandler): Router {
  const router = Router();

  router.get('/', (req, res) => {
    return successResponse(res, { settings: store.getSettings() }, 'Settings retrieved successfully');
  });

  router.put('/', writeLimiter, async (req, res, next) => {
    try {
      const settings = await store.updateSettings(req.body);
      return successResponse(res, { settings }, 'Settings updated successfully');
    } catch (error) {
      return next(error);
    }
  });

  return router;
}
