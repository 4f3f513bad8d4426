/**
 * Common response patterns for all services
 */
export interface ApiResponse<T = unknown> {
  success: boolean;
  data?: T;
  error?: {
    code: string;
    message: string;
    details?: Record<string, string>;
  };
  traceId?: string;
}

/**
 * Common error codes
 */
export enum ErrorCodes {
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  BAD_REQUEST = 'BAD_REQUEST',
  NOT_FOUND = 'NOT_FOUND',
  CONFLICT = 'CONFLICT',
  UNAUTHORIZED = 'UNAUTHORIZED',
  FORBIDDEN = 'FORBIDDEN',
  INTERNAL_ERROR = 'INTERNAL_ERROR',
  UPSTREAM_ERROR = 'UPSTREAM_ERROR',
  SERVICE_UNAVAILABLE = 'SERVICE_UNAVAILABLE'
}

/**
 * Health check response
 */
export interface HealthCheck {
  status: 'healthy' | 'unhealthy';
  timestamp: string;
  service: string;
  version: string;
  checks: {
    database?: 'healthy' | 'unhealthy' | 'in-memory';
    cache?: 'healthy' | 'unhealthy' | 'in-memory';
    llm?: 'configured' | 'template-only';
  };
}

export function generateTraceId(): string {
  return Math.random().toString(36).substring(2, 15) + Date.now().toString(36);
}
