export {
  createBlobDatastore,
  DEFAULT_FETCH_CONCURRENCY,
  type BlobDatastoreOptions,
} from "./datastore.js";
export { openAzureDatastore, type OpenAzureDatastoreOptions } from "./open.js";
export {
  BlobErrorCode,
  serviceErrorCode,
  isServiceError,
  isBlobNotFound,
  isContainerAlreadyExists,
  translateNotFound,
} from "./errors/translate.js";
export * from "./backend/index.js";
