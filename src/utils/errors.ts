/**
 * 业务错误基类，statusCode 由 errorHandler 直接映射为 HTTP 状态码
 */
export class AppError extends Error {
  readonly statusCode: number;

  constructor(message: string, statusCode: number) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
  }
}

/**
 * 请求体格式、取值范围不合法
 */
export class ValidationError extends AppError {
  constructor(message: string) {
    super(message, 422);
  }
}

/**
 * 重复的凭证、Zone ID 或子域名
 */
export class ConflictError extends AppError {
  constructor(message: string) {
    super(message, 400);
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super(message, 404);
  }
}

/**
 * 持久化失败或其它意外错误
 */
export class InternalError extends AppError {
  constructor(message: string) {
    super(message, 500);
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
