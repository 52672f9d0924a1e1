/**
 * The only place that knows the blob service's error codes.
 * Recognised not-found codes become datastore errors; everything else
 * stays opaque and propagates as thrown.
 */

import { NotFoundError } from "@blob-datastore/core/errors";

export const BlobErrorCode = {
  BlobNotFound: "BlobNotFound",
  ContainerAlreadyExists: "ContainerAlreadyExists",
  ContainerNotFound: "ContainerNotFound",
} as const;

export type BlobErrorCode = (typeof BlobErrorCode)[keyof typeof BlobErrorCode];

/**
 * Service error code carried by a backend error: `details.errorCode`
 * (filled from the x-ms-error-code header, also on bodiless HEAD
 * responses), else `code` on the SDK's RestError.
 */
export function serviceErrorCode(err: unknown): string | undefined {
  if (typeof err !== "object" || err === null) return undefined;
  const details: unknown = "details" in err ? err.details : undefined;
  if (
    typeof details === "object" &&
    details !== null &&
    "errorCode" in details &&
    typeof details.errorCode === "string"
  ) {
    return details.errorCode;
  }
  if ("code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

export function isServiceError(err: unknown, code: BlobErrorCode): boolean {
  return serviceErrorCode(err) === code;
}

export function isBlobNotFound(err: unknown): boolean {
  return isServiceError(err, BlobErrorCode.BlobNotFound);
}

export function isContainerAlreadyExists(err: unknown): boolean {
  return isServiceError(err, BlobErrorCode.ContainerAlreadyExists);
}

/**
 * BlobNotFound → NotFoundError (backend error kept as cause).
 * Any other value is returned unchanged for the caller to rethrow.
 */
export function translateNotFound(err: unknown, key: string): unknown {
  if (isBlobNotFound(err)) {
    return new NotFoundError({ details: { key }, cause: err });
  }
  return err;
}
