/**
 * Azure Blob Storage binding of the BlobContainer port.
 * Uses shared-key auth against https://{accountName}.blob.core.windows.net
 * (or an explicit endpoint such as a local emulator).
 * Retries and backoff are left to the SDK pipeline.
 */

import {
  BlobServiceClient,
  StorageSharedKeyCredential,
  type ContainerClient,
} from "@azure/storage-blob";

import type { BlobContainer } from "./interface.js";

export interface AzureBlobContainerOptions {
  accountName: string;
  accountKey: string;
  containerName: string;
  /** Blob service URL; defaults to the account's public endpoint. */
  endpoint?: string;
}

export function createAzureContainerClient(
  options: AzureBlobContainerOptions,
): ContainerClient {
  const { accountName, accountKey, containerName } = options;
  const endpoint = (
    options.endpoint ?? `https://${accountName}.blob.core.windows.net`
  ).replace(/\/+$/, "");
  const credential = new StorageSharedKeyCredential(accountName, accountKey);
  return new BlobServiceClient(endpoint, credential).getContainerClient(
    containerName,
  );
}

/** Adapts an SDK container client. Errors are the SDK's RestError, untouched. */
export function fromContainerClient(client: ContainerClient): BlobContainer {
  return {
    name: client.containerName,

    async create(options) {
      await client.create({ abortSignal: options?.signal });
    },

    async upload(blobName, data, options) {
      const body = Buffer.from(data.buffer, data.byteOffset, data.byteLength);
      await client
        .getBlockBlobClient(blobName)
        .upload(body, data.byteLength, { abortSignal: options?.signal });
    },

    async download(blobName, options) {
      const buffer = await client
        .getBlobClient(blobName)
        .downloadToBuffer(0, undefined, { abortSignal: options?.signal });
      return new Uint8Array(buffer.buffer, buffer.byteOffset, buffer.byteLength);
    },

    async getProperties(blobName, options) {
      const properties = await client
        .getBlobClient(blobName)
        .getProperties({ abortSignal: options?.signal });
      return { contentLength: properties.contentLength ?? 0 };
    },

    async delete(blobName, options) {
      await client.getBlobClient(blobName).delete({
        deleteSnapshots: "include",
        abortSignal: options?.signal,
      });
    },

    async listBlobs(options) {
      const pages = client
        .listBlobsFlat({
          // An empty prefix would still be sent as `prefix=`
          prefix: options?.prefix || undefined,
          abortSignal: options?.signal,
        })
        .byPage({
          continuationToken: options?.marker,
          maxPageSize: options?.pageSize,
        });
      const page = await pages.next();
      if (page.done) {
        return { items: [] };
      }

      const items = page.value.segment.blobItems.map((item) => ({
        name: item.name,
        contentLength: item.properties.contentLength ?? -1,
      }));
      const nextMarker = page.value.continuationToken;
      return nextMarker ? { items, nextMarker } : { items };
    },
  };
}

export function createAzureBlobContainer(
  options: AzureBlobContainerOptions,
): BlobContainer {
  return fromContainerClient(createAzureContainerClient(options));
}
