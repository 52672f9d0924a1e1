import { z } from "zod";

export const DEFAULTS = {
  azure: {
    containerName: "datastore",
  },
  query: {
    fetchConcurrency: 16,
  },
  logging: {
    level: "info" as const,
    pretty: false,
  },
};

/** 3-63 chars of lowercase letters, digits and single hyphens, alphanumeric at both ends. */
const CONTAINER_NAME = /^(?=.{3,63}$)[a-z0-9]+(-[a-z0-9]+)*$/;

export const AzureConfigSchema = z.object({
  accountName: z
    .string()
    .regex(/^[a-z0-9]{3,24}$/, "Storage account names are 3-24 lowercase letters or digits"),
  accountKey: z.string().min(1),
  containerName: z
    .string()
    .regex(CONTAINER_NAME, "Invalid container name")
    .default(DEFAULTS.azure.containerName),
  endpoint: z
    .url()
    .optional()
    .describe("Blob service URL; defaults to https://{accountName}.blob.core.windows.net"),
});

export const QueryConfigSchema = z.object({
  fetchConcurrency: z
    .number()
    .int()
    .min(1)
    .max(256)
    .default(DEFAULTS.query.fetchConcurrency),
  pageSize: z
    .number()
    .int()
    .min(1)
    .max(5000)
    .optional()
    .describe("Listing page size; backend default when unset"),
});

export const LoggingConfigSchema = z.object({
  level: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default(DEFAULTS.logging.level),
  pretty: z.boolean().default(DEFAULTS.logging.pretty),
});

export const DatastoreConfigSchema = z.object({
  azure: AzureConfigSchema,
  query: QueryConfigSchema.default(DEFAULTS.query),
  logging: LoggingConfigSchema.default(DEFAULTS.logging),
});

export type DatastoreConfig = z.infer<typeof DatastoreConfigSchema>;
export type AzureConfig = DatastoreConfig["azure"];
export type QueryConfig = DatastoreConfig["query"];
export type LoggingConfig = DatastoreConfig["logging"];
