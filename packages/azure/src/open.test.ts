import { describe, it, expect, vi, beforeEach } from "vitest";
import type { Logger } from "pino";
import { DatastoreConfigSchema } from "@blob-datastore/core/schemas";

import type { BlobContainer } from "./backend/interface.js";
import { createMemoryBlobContainer } from "./backend/memory.js";
import { openAzureDatastore } from "./open.js";

const { createAzureBlobContainer } = vi.hoisted(() => ({
  createAzureBlobContainer: vi.fn(),
}));

vi.mock("./backend/azure.js", () => ({ createAzureBlobContainer }));

function makeMockLogger(): Logger {
  const mockLogger: Partial<Logger> = {
    info: vi.fn(),
    error: vi.fn(),
    warn: vi.fn(),
    debug: vi.fn(),
  };
  return mockLogger as Logger;
}

describe("openAzureDatastore", () => {
  let container: BlobContainer;

  beforeEach(() => {
    const memory = createMemoryBlobContainer({ name: "photos" });
    container = { ...memory, listBlobs: vi.fn(memory.listBlobs) };
    createAzureBlobContainer.mockReset();
    createAzureBlobContainer.mockReturnValue(container);
  });

  it("builds the container from the azure section", async () => {
    const config = DatastoreConfigSchema.parse({
      azure: {
        accountName: "devaccount",
        accountKey: "test-secret",
        containerName: "photos",
        endpoint: "http://127.0.0.1:10000/devaccount",
      },
    });
    const logger = makeMockLogger();

    const datastore = await openAzureDatastore(config, { logger });
    await datastore.put("/a", new Uint8Array([1]));

    expect(createAzureBlobContainer).toHaveBeenCalledWith({
      accountName: "devaccount",
      accountKey: "test-secret",
      containerName: "photos",
      endpoint: "http://127.0.0.1:10000/devaccount",
    });
    expect(logger.info).toHaveBeenCalledWith(
      { account: "devaccount", container: "photos" },
      "Opening blob datastore",
    );
    expect(await datastore.has("/a")).toBe(true);
  });

  it("applies the query section to listings", async () => {
    const config = DatastoreConfigSchema.parse({
      azure: { accountName: "devaccount", accountKey: "test-secret" },
      query: { fetchConcurrency: 2, pageSize: 25 },
    });

    const datastore = await openAzureDatastore(config, { logger: makeMockLogger() });
    await (await datastore.query({ keysOnly: true })).rest();

    expect(container.listBlobs).toHaveBeenCalledWith(
      expect.objectContaining({ prefix: "", pageSize: 25 }),
    );
  });
});
