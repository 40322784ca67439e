import type { FailureReason, ServiceResult } from "../types/result.js";

export function success<T>(data: T): ServiceResult<T> {
  return { success: true, data };
}

export function failure(reason: FailureReason, message: string): ServiceResult<never> {
  return { success: false, error: { reason, message } };
}
