import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { field } from "../../schema/Field.js";
import { defineSchema } from "../../schema/Schema.js";
import { ConfigLoader } from "../ConfigLoader.js";
import { RequiredFieldMissingError } from "../errors.js";
import { inlineResources } from "../resources.js";
import { ErrorSeverity } from "../types.js";

const DEFAULTS = `version: "2.0.0"
host: localhost
port: 8080
debug: false
`;

const ServerSchema = defineSchema({
  host: field.string().required(),
  port: field.integer().range(1, 65535),
  debug: field.boolean().default(false),
  apiKey: field.string().name("API_KEY").softRequired(),
});

describe("ConfigLoader", () => {
  let dir: string;
  let target: string;
  const resources = inlineResources({ "server.yml": DEFAULTS });

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "configsmith-loader-"));
    target = path.join(dir, "server.yml");
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  function load(options: { autoUpdate?: boolean } = {}) {
    return ConfigLoader.load({
      schema: ServerSchema,
      targetFile: target,
      resourcePath: "server.yml",
      resources,
      ...options,
    });
  }

  it("creates the file from its default on first load", async () => {
    const loader = await load();

    expect(await fs.readFile(target, "utf-8")).toBe(DEFAULTS);
    expect(loader.state).toBe("loaded");
    expect(loader.targetFile).toBe(target);
    expect(loader.config).toEqual({ host: "localhost", port: 8080, debug: false, apiKey: null });
  });

  it("reports soft issues from the resolve", async () => {
    const loader = await load();

    expect(loader.issues).toEqual([
      {
        severity: ErrorSeverity.WARNING,
        code: "SOFT_REQUIRED_MISSING",
        field: "apiKey",
        message: "Soft required field 'apiKey' is not set.",
        suggestion: 'Set "API_KEY" in the config file',
        file: target,
      },
    ]);
  });

  it("keeps an existing file as it is without autoUpdate", async () => {
    await fs.writeFile(target, 'version: "1.0.0"\nhost: example.test\n');

    const loader = await load();

    expect(loader.config).toEqual({ host: "example.test", port: null, debug: false, apiKey: null });
    expect(await fs.readFile(target, "utf-8")).toBe('version: "1.0.0"\nhost: example.test\n');
  });

  it("merges an outdated file before resolving with autoUpdate", async () => {
    await fs.writeFile(target, 'version: "1.0.0"\nhost: example.test\nAPI_KEY: test-secret\n');

    const loader = await load({ autoUpdate: true });

    expect(loader.config).toEqual({
      host: "example.test",
      port: 8080,
      debug: false,
      apiKey: "test-secret",
    });
    expect(await fs.readFile(target, "utf-8")).toContain('version: "2.0.0"');
  });

  it("rejects when a required field is missing", async () => {
    await fs.writeFile(target, 'version: "2.0.0"\nport: 80\n');

    await expect(load()).rejects.toBeInstanceOf(RequiredFieldMissingError);
  });

  it("picks up changes on reload", async () => {
    const loader = await load();
    await fs.writeFile(target, 'version: "2.0.0"\nhost: example.test\nport: 9000\n');

    const config = await loader.reload();

    expect(config).toEqual({ host: "example.test", port: 9000, debug: false, apiKey: null });
    expect(loader.config).toBe(config);
    expect(loader.state).toBe("loaded");
  });

  it("keeps the previous config when a reload fails", async () => {
    const loader = await load();
    const before = loader.config;
    await fs.writeFile(target, 'version: "2.0.0"\nhost: localhost\nport: 70000\n');

    await expect(loader.reload()).rejects.toThrow(
      "Config field 'port' out of range [1, 65535]: 70000",
    );

    expect(loader.config).toBe(before);
    expect(loader.state).toBe("loaded");
  });

  it("updates the file on request and reloads it after", async () => {
    const loader = await load();
    await fs.writeFile(target, 'version: "1.0.0"\nhost: example.test\n');

    expect(await loader.updateConfig()).toBe(true);
    expect(await loader.updateConfig()).toBe(false);

    expect((await loader.reload()).port).toBe(8080);
  });

  it("serialises concurrent reloads", async () => {
    const loader = await load();

    const results = await Promise.all([loader.reload(), loader.reload(), loader.reload()]);

    expect(results.map((config) => config.host)).toEqual(["localhost", "localhost", "localhost"]);
    expect(loader.state).toBe("loaded");
  });

  it("reloads when the file changes on disk", async () => {
    const loader = await load();
    const onReload = vi.fn();
    const watcher = loader.watch({ onReload });

    try {
      await watcher.ready();
      await fs.writeFile(target, 'version: "2.0.0"\nhost: example.test\n');

      await vi.waitFor(() => expect(onReload).toHaveBeenCalled(), { timeout: 5000 });
      expect(loader.config.host).toBe("example.test");
    } finally {
      await loader.close();
    }
  });

  it("rejects an unknown format before touching the disk", async () => {
    await expect(
      ConfigLoader.load({
        schema: ServerSchema,
        targetFile: path.join(dir, "server.ini"),
        resourcePath: "server.yml",
        resources,
      }),
    ).rejects.toThrow(`Cannot detect config format of ${path.join(dir, "server.ini")}`);
    expect(await fs.readdir(dir)).toEqual([]);
  });
});
