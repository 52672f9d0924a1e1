import { describe, expect, it } from "vitest";
import { homedir } from "node:os";
import { resolve } from "node:path";
import { DEFAULT_CONFIG_PATH } from "./defaults.js";
import { expandHomePath, resolveConfigPath } from "./paths.js";

describe("expandHomePath", () => {
  it('expands "~" to the current home directory', () => {
    expect(expandHomePath("~")).toBe(homedir());
  });

  it('expands "~/" prefixes to the current home directory', () => {
    expect(expandHomePath("~/blob-datastore/config.json")).toBe(
      resolve(homedir(), "blob-datastore/config.json"),
    );
  });

  it("leaves other paths unchanged", () => {
    expect(expandHomePath("/tmp/sandbox")).toBe("/tmp/sandbox");
    expect(expandHomePath("~other/config.json")).toBe("~other/config.json");
  });
});

describe("resolveConfigPath", () => {
  it("falls back to the default config file", () => {
    expect(resolveConfigPath(undefined, {})).toBe(resolve(DEFAULT_CONFIG_PATH));
  });

  it("uses BLOB_DATASTORE_CONFIG when no path is given", () => {
    const env = { BLOB_DATASTORE_CONFIG: "~/stores/photos.json" };
    expect(resolveConfigPath(undefined, env)).toBe(
      resolve(homedir(), "stores/photos.json"),
    );
  });

  it("prefers an explicit path over the environment", () => {
    const env = { BLOB_DATASTORE_CONFIG: "/etc/ignored.json" };
    expect(resolveConfigPath("relative/config.json", env)).toBe(
      resolve("relative/config.json"),
    );
  });

  it("ignores an empty BLOB_DATASTORE_CONFIG", () => {
    expect(resolveConfigPath(undefined, { BLOB_DATASTORE_CONFIG: "" })).toBe(
      resolve(DEFAULT_CONFIG_PATH),
    );
  });
});
