export type {
  BlobContainer,
  BlobItem,
  BlobListSegment,
  BlobProperties,
  BlobRequestOptions,
  ListBlobsOptions,
} from "./interface.js";
export {
  createAzureBlobContainer,
  createAzureContainerClient,
  fromContainerClient,
  type AzureBlobContainerOptions,
} from "./azure.js";
export {
  createMemoryBlobContainer,
  type MemoryBlobContainerOptions,
} from "./memory.js";
