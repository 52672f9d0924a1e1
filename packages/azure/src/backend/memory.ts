import { RestError } from "@azure/storage-blob";

import type {
  BlobContainer,
  BlobListSegment,
  BlobRequestOptions,
  ListBlobsOptions,
} from "./interface.js";
import { BlobErrorCode } from "../errors/translate.js";

export interface MemoryBlobContainerOptions {
  name?: string;
  /** Page size used when a listing does not ask for one (service default is 5000). */
  pageSize?: number;
}

const DEFAULT_PAGE_SIZE = 5000;

function serviceError(code: string, statusCode: number, message: string): RestError {
  return new RestError(message, { code, statusCode });
}

function checkAborted(options?: BlobRequestOptions): void {
  options?.signal?.throwIfAborted();
}

/**
 * In-process blob container with the service's paging and error codes.
 * Blobs are listed in name order; the continuation marker is the name of
 * the first blob of the next page.
 */
export function createMemoryBlobContainer(
  options?: MemoryBlobContainerOptions,
): BlobContainer {
  const name = options?.name ?? "datastore";
  const defaultPageSize = options?.pageSize ?? DEFAULT_PAGE_SIZE;
  const blobs = new Map<string, Uint8Array>();
  let created = false;

  function requireContainer(): void {
    if (!created) {
      throw serviceError(
        BlobErrorCode.ContainerNotFound,
        404,
        "The specified container does not exist.",
      );
    }
  }

  function requireBlob(blobName: string): Uint8Array {
    requireContainer();
    const data = blobs.get(blobName);
    if (data === undefined) {
      throw serviceError(
        BlobErrorCode.BlobNotFound,
        404,
        "The specified blob does not exist.",
      );
    }
    return data;
  }

  return {
    name,

    async create(requestOptions) {
      checkAborted(requestOptions);
      if (created) {
        throw serviceError(
          BlobErrorCode.ContainerAlreadyExists,
          409,
          "The specified container already exists.",
        );
      }
      created = true;
    },

    async upload(blobName, data, requestOptions) {
      checkAborted(requestOptions);
      requireContainer();
      blobs.set(blobName, new Uint8Array(data));
    },

    async download(blobName, requestOptions) {
      checkAborted(requestOptions);
      return new Uint8Array(requireBlob(blobName));
    },

    async getProperties(blobName, requestOptions) {
      checkAborted(requestOptions);
      return { contentLength: requireBlob(blobName).length };
    },

    async delete(blobName, requestOptions) {
      checkAborted(requestOptions);
      requireBlob(blobName);
      blobs.delete(blobName);
    },

    async listBlobs(listOptions?: ListBlobsOptions): Promise<BlobListSegment> {
      checkAborted(listOptions);
      requireContainer();
      const prefix = listOptions?.prefix ?? "";
      const pageSize = listOptions?.pageSize ?? defaultPageSize;
      const marker = listOptions?.marker;

      const names = [...blobs.keys()]
        .filter((blobName) => blobName.startsWith(prefix))
        .filter((blobName) => marker === undefined || blobName >= marker)
        .sort();

      const page = names.slice(0, pageSize);
      const items = page.map((blobName) => ({
        name: blobName,
        contentLength: requireBlob(blobName).length,
      }));
      const nextMarker = names.length > pageSize ? names[pageSize] : undefined;

      return nextMarker === undefined ? { items } : { items, nextMarker };
    },
  };
}
