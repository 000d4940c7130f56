import express from 'express';
import cors from 'cors';
import { config as defaultConfig, type AppConfig } from './config';
import { requestLogger } from './middleware/logger';
import { errorHandler, notFoundHandler } from './middleware/errorHandler';
import { createWriteLimiter } from './middleware/rateLimit';
import { createAccountRoutes } from './routes/accounts';
import { createSettingsRoutes } from './routes/settings';
import type { ConfigStore } from './services/configStore';

export function createApp(store: ConfigStore, appConfig: AppConfig = defaultConfig) {
  const app = express();
  const writeLimiter = createWriteLimiter(appConfig.rateLimit.write);

  // 中间件
  app.use(cors({ origin: appConfig.corsOrigin }));
  app.use(express.json());
  app.use(requestLogger);

  // 健康检查
  app.get('/health', (req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  // API 路由
  app.use('/accounts', createAccountRoutes(store, writeLimiter));
  app.use('/settings', createSettingsRoutes(store, writeLimiter));

  // 错误处理
  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
