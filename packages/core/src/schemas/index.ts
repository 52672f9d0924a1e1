export {
  DEFAULTS,
  AzureConfigSchema,
  QueryConfigSchema,
  LoggingConfigSchema,
  DatastoreConfigSchema,
  type DatastoreConfig,
  type AzureConfig,
  type QueryConfig,
  type LoggingConfig,
} from "./datastore-config.js";
