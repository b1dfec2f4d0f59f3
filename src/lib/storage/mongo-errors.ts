import {
  MongoError,
  MongoNetworkError,
  MongoNetworkTimeoutError,
  MongoServerError,
  MongoServerSelectionError,
} from "mongodb";
import { StorageError, errorMessage } from "../../utils/errors.js";

export const DUPLICATE_KEY = 11000;

const TRANSIENT_LABELS = ["RetryableWriteError", "ResetPool", "TransientTransactionError"];

/**
 * Map a driver failure onto a StorageError carrying a transient/fatal hint
 */
export function toStorageError(error: unknown, context: Record<string, unknown> = {}): StorageError {
  if (error instanceof StorageError) {
    return error;
  }

  const options = { cause: error };

  if (error instanceof MongoNetworkTimeoutError) {
    return new StorageError("TIMEOUT", error.message, true, context, options);
  }
  if (error instanceof MongoNetworkError) {
    return new StorageError("NETWORK", error.message, true, context, options);
  }
  if (error instanceof MongoServerSelectionError) {
    return new StorageError("TIMEOUT", error.message, true, context, options);
  }
  if (error instanceof MongoServerError) {
    if (error.code === DUPLICATE_KEY) {
      return new StorageError("DUPLICATE_KEY", error.message, false, { ...context, code: error.code }, options);
    }
    return new StorageError(
      "SERVER_ERROR",
      error.message,
      hasTransientLabel(error),
      { ...context, code: error.code, codeName: error.codeName },
      options,
    );
  }
  if (error instanceof MongoError) {
    return new StorageError("UNKNOWN", error.message, hasTransientLabel(error), context, options);
  }

  return new StorageError("UNKNOWN", errorMessage(error), false, context, options);
}

function hasTransientLabel(error: MongoError): boolean {
  return TRANSIENT_LABELS.some((label) => error.hasErrorLabel(label));
}

/**
 * Sanitize URI for logging (remove credentials)
 */
export function sanitizeUri(uri: string): string {
  return uri.replace(/:\/\/[^@/]+@/, "://***:***@");
}
