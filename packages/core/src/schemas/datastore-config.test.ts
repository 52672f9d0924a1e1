import { describe, it, expect } from "vitest";
import { DatastoreConfigSchema } from "./datastore-config.js";

const AZURE = { accountName: "devaccount", accountKey: "test-secret" };

describe("DatastoreConfigSchema", () => {
  it("fills query and logging defaults", () => {
    const config = DatastoreConfigSchema.parse({ azure: AZURE });

    expect(config.azure.containerName).toBe("datastore");
    expect(config.azure.endpoint).toBeUndefined();
    expect(config.query.fetchConcurrency).toBe(16);
    expect(config.query.pageSize).toBeUndefined();
    expect(config.logging.level).toBe("info");
    expect(config.logging.pretty).toBe(false);
  });

  it("requires azure credentials", () => {
    expect(() => DatastoreConfigSchema.parse({})).toThrow();
    expect(() =>
      DatastoreConfigSchema.parse({ azure: { accountName: "devaccount" } }),
    ).toThrow();
  });

  it("accepts an explicit endpoint", () => {
    const config = DatastoreConfigSchema.parse({
      azure: { ...AZURE, endpoint: "http://127.0.0.1:10000/devaccount" },
    });

    expect(config.azure.endpoint).toBe("http://127.0.0.1:10000/devaccount");
  });

  it.each(["ab", "Upper", "-leading", "trailing-", "double--hyphen"])(
    "rejects container name %s",
    (containerName) => {
      expect(() =>
        DatastoreConfigSchema.parse({ azure: { ...AZURE, containerName } }),
      ).toThrow();
    },
  );

  it("accepts a valid container name", () => {
    const config = DatastoreConfigSchema.parse({
      azure: { ...AZURE, containerName: "ipfs-blocks-01" },
    });
    expect(config.azure.containerName).toBe("ipfs-blocks-01");
  });

  it("rejects out-of-range fetch concurrency", () => {
    expect(() =>
      DatastoreConfigSchema.parse({ azure: AZURE, query: { fetchConcurrency: 0 } }),
    ).toThrow();
  });
});
