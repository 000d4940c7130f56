import type { Request, Response, NextFunction } from 'express';
import { errorResponse } from '../utils/response';
import { AppError, errorMessage } from '../utils/errors';

function isBodyParseError(err: unknown): boolean {
  return err instanceof Error && 'type' in err && err.type === 'entity.parse.failed';
}

/**
 * 全局错误处理中间件
 */
export function errorHandler(
  err: unknown,
  req: Request,
  res: Response,
  // Express 依靠参数个数识别错误处理中间件
  _next: NextFunction
) {
  if (err instanceof AppError) {
    if (err.statusCode >= 500) {
      console.error(`${req.method} ${req.originalUrl} 失败:`, err);
    }
    return errorResponse(res, err.message, err.statusCode);
  }

  // express.json() 解析失败
  if (isBodyParseError(err)) {
    return errorResponse(res, `Invalid JSON body: ${errorMessage(err)}`, 422);
  }

  console.error('错误:', err);
  return errorResponse(res, 'Internal Server Error', 500, errorMessage(err));
}

/**
 * 404 错误处理
 */
export function notFoundHandler(req: Request, res: Response) {
  return errorResponse(res, `Route ${req.method} ${req.path} not found`, 404);
}
