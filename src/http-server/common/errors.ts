/**
 * @file HTTP error helpers
 */
import {
  CorruptDataError,
  DimensionMismatchError,
  EmbeddingProviderError,
  EmptyStoreError,
  IndexNotBuiltError,
  NotFoundError,
  UnknownMetricError,
} from "../../errors";
import { hasOwn } from "../../util/guards";

/**
 *
 */
export function httpError(status: number, message: string): Error & { status: number } {
  return Object.assign(new Error(message), { status });
}

/** HTTP status for a thrown value: explicit `status` first, then by error kind. */
export function statusOf(err: unknown): number {
  if (hasOwn(err, "status") && typeof err.status === "number") {
    return err.status;
  }
  if (
    err instanceof DimensionMismatchError ||
    err instanceof UnknownMetricError ||
    err instanceof CorruptDataError ||
    err instanceof RangeError
  ) {
    return 400;
  }
  if (err instanceof NotFoundError) {
    return 404;
  }
  if (err instanceof EmptyStoreError || err instanceof IndexNotBuiltError) {
    return 409;
  }
  if (err instanceof EmbeddingProviderError) {
    return 502;
  }
  return 500;
}
