import type { Response } from 'express';
import type { ApiEnvelope, ErrorDetail } from '../types';

/**
 * 成功响应
 */
export function successResponse<T>(
  res: Response,
  data: T | null = null,
  message: string = 'Success',
  statusCode: number = 200
) {
  const body: ApiEnvelope<T> = {
    error: false,
    data,
    message,
  };

  return res.status(statusCode).json(body);
}

/**
 * 错误响应，data.detail 携带原始错误信息
 */
export function errorResponse(
  res: Response,
  message: string = 'Error',
  statusCode: number = 400,
  detail: string = message
) {
  const body: ApiEnvelope<ErrorDetail> = {
    error: true,
    data: { detail },
    message,
  };

  return res.status(statusCode).json(body);
}
