/** Failure reasons surfaced to callers of the engine. */
export type FailureReason =
  | "NOT_FOUND"
  | "CONFLICT"
  | "BAD_REQUEST"
  | "UNAUTHORIZED"
  | "FATAL";

export interface ServiceFailure {
  reason: FailureReason;
  message: string;
}

/** Expected domain outcomes are returned, never thrown. */
export type ServiceResult<T> =
  | { success: true; data: T }
  | { success: false; error: ServiceFailure };
