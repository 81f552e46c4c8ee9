/**
 * HTTP API envelope types
 */

export interface ApiSuccess<T> {
  success: true;
  data: T;
}

export interface ApiFailure {
  success: false;
  error: string;
  code?: string;
}

export type ApiResponse<T> = ApiSuccess<T> | ApiFailure;

export interface HealthData {
  ok: true;
  timestamp: string;
}

export type HealthResponse = ApiSuccess<HealthData>;
