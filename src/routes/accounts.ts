import { Router, type RequestHandler } from 'express';
import type { ConfigStore } from '../services/configStore';
import { successResponse } from '../utils/response';

/**
 * 账户与 Zone 路由，所有读写都经过 ConfigStore
 */
export function createAccountRoutes(store: ConfigStore, writeLimiter: RequestHandler): Router {
  const router = Router();

  /**
   * GET /accounts
   */
  router.get('/', (req, res, next) => {
    try {
      return successResponse(res, { accounts: store.listAccounts() }, 'Accounts retrieved successfully');
    } catch (error) {
      return next(error);
    }
  });

  /**
   * POST /accounts
   * api_token 与 api_key 可任选其一或同时提供
   */
  router.post('/', writeLimiter, async (req, res, next) => {
    try {
      const account = await store.createAccount(req.body);
      return successResponse(res, { account }, 'Account added successfully');
    } catch (error) {
      return next(error);
    }
  });

  /**
   * GET /accounts/:accountId
   */
  router.get('/:accountId', (req, res, next) => {
    try {
      const account = store.getAccount(req.params.accountId);
      return successResponse(res, { account }, 'Account retrieved successfully');
    } catch (error) {
      return next(error);
    }
  });

  /**
   * PUT /accounts/:accountId
   */
  router.put('/:accountId', writeLimiter, async (req, res, next) => {
    try {
      const account = await store.updateAccount(req.params.accountId, req.body);
      return successResponse(res, { account }, 'Account updated successfully');
    } catch (error) {
      return next(error);
    }
  });

  /**
   * DELETE /accounts/:accountId
   */
  router.delete('/:accountId', writeLimiter, async (req, res, next) => {
    try {
      await store.deleteAccount(req.params.accountId);
      return successResponse(res, null, 'Account deleted successfully');
    } catch (error) {
      return next(error);
    }
  });

  /**
   * PUT /accounts/:accountId/auth
   * 只替换认证信息
   */
  router.put('/:accountId/auth', writeLimiter, async (req, res, next) => {
    try {
      const auth = await store.updateAuthentication(req.params.accountId, req.body);
      return successResponse(res, { auth }, 'Authentication updated successfully');
    } catch (error) {
      return next(error);
    }
  });

  /**
   * GET /accounts/:accountId/zones
   */
  router.get('/:accountId/zones', (req, res, next) => {
    try {
      const zones = store.listZones(req.params.accountId);
      return successResponse(res, { zones }, 'Zones retrieved successfully');
    } catch (error) {
      return next(error);
    }
  });

  /**
   * POST /accounts/:accountId/zones
   * 子域名 id 由服务端生成
   */
  router.post('/:accountId/zones', writeLimiter, async (req, res, next) => {
    try {
      const zone = await store.createZone(req.params.accountId, req.body);
      return successResponse(res, { zone }, 'Zone created successfully');
    } catch (error) {
      return next(error);
    }
  });

  /**
   * GET /accounts/:accountId/zones/:zoneId
   */
  router.get('/:accountId/zones/:zoneId', (req, res, next) => {
    try {
      const zone = store.getZone(req.params.accountId, req.params.zoneId);
      return successResponse(res, { zone }, 'Zone retrieved successfully');
    } catch (error) {
      return next(error);
    }
  });

  /**
   * PUT /accounts/:accountId/zones/:zoneId
   */
  router.put('/:accountId/zones/:zoneId', writeLimiter, async (req, res, next) => {
    try {
      const zone = await store.updateZone(req.params.accountId, req.params.zoneId, req.body);
      return successResponse(res, { zone }, 'Zone updated successfully');
    } catch (error) {
      return next(error);
    }
  });

  /**
   * DELETE /accounts/:accountId/zones/:zoneId
   */
  router.delete('/:accountId/zones/:zoneId', writeLimiter, async (req, res, next) => {
    try {
      await store.deleteZone(req.params.accountId, req.params.zoneId);
      return successResponse(res, null, 'Zone deleted successfully');
    } catch (error) {
      return next(error);
    }
  });

  return router;
}
