import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { type Mock, type MockInstance, afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createProgram } from "../program.js";

const DEFAULTS_V2 = 'version: "2.0.0"\nport: 8080\ntimeout: 30\n';
const CURRENT_V1 = 'version: "1.0.0"\nport: 9000\n';

describe("configsmith CLI", () => {
  let dir: string;
  let log: MockInstance<typeof console.log>;
  let error: MockInstance<typeof console.error>;
  let exit: Mock<(code: number) => void>;

  async function run(...args: string[]): Promise<void> {
    await createProgram({ exit }).parseAsync(args, { from: "user" });
  }

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "configsmith-cli-"));
    await fs.mkdir(path.join(dir, "defaults"));
    await fs.writeFile(path.join(dir, "defaults", "app.yml"), DEFAULTS_V2);

    log = vi.spyOn(console, "log").mockImplementation(() => {});
    error = vi.spyOn(console, "error").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    exit = vi.fn<(code: number) => void>();
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  describe("reconcile", () => {
    it("creates, updates and then leaves the target alone", async () => {
      const resource = path.join(dir, "defaults", "app.yml");
      const target = path.join(dir, "app.yml");

      await run("reconcile", resource, target);
      expect(log).toHaveBeenLastCalledWith(`✨ Created ${target}`);
      expect(await fs.readFile(target, "utf-8")).toBe(DEFAULTS_V2);

      await fs.writeFile(target, CURRENT_V1);
      await run("reconcile", resource, target);
      expect(log).toHaveBeenLastCalledWith(`✅ Updated ${target}`);
      expect(await fs.readFile(target, "utf-8")).toBe('version: "2.0.0"\nport: 9000\ntimeout: 30\n');

      await run("reconcile", resource, target);
      expect(log).toHaveBeenLastCalledWith(`✅ ${target} is up to date`);
      expect(exit).not.toHaveBeenCalled();
    });

    it("writes nothing with --dry-run", async () => {
      const target = path.join(dir, "app.yml");
      await fs.writeFile(target, CURRENT_V1);

      await run("reconcile", path.join(dir, "defaults", "app.yml"), target, "--dry-run");

      expect(log).toHaveBeenLastCalledWith(`✅ ${target} is up to date`);
      expect(await fs.readFile(target, "utf-8")).toBe(CURRENT_V1);
    });

    it("exits with 1 when the default is missing", async () => {
      await run("reconcile", path.join(dir, "defaults", "missing.yml"), path.join(dir, "app.yml"));

      expect(error).toHaveBeenCalledWith(
        "\n❌ Error reconciling configuration:",
        `Resource missing.yml not found in ${path.join(dir, "defaults")}`,
      );
      expect(exit).toHaveBeenCalledWith(1);
    });
  });

  describe("sync", () => {
    it("reconciles every default in the directory", async () => {
      await fs.mkdir(path.join(dir, "defaults", "nested"));
      await fs.writeFile(path.join(dir, "defaults", "nested", "db.json"), '{"version": "1.0.0", "pool": 5}');
      const targetDir = path.join(dir, "etc");
      await fs.mkdir(targetDir);
      await fs.writeFile(path.join(targetDir, "app.yml"), CURRENT_V1);

      await run("sync", path.join(dir, "defaults"), targetDir);

      expect(log).toHaveBeenCalledWith("📋 Processing 2 configuration files...\n");
      expect(log).toHaveBeenCalledWith("  ✅ Updated app.yml");
      expect(log).toHaveBeenCalledWith("  ✨ Created nested/db.json");
      expect(await fs.readFile(path.join(targetDir, "nested", "db.json"), "utf-8")).toBe(
        '{"version": "1.0.0", "pool": 5}',
      );
      expect(exit).not.toHaveBeenCalled();
    });

    it("exits with 1 when a file fails", async () => {
      const targetDir = path.join(dir, "etc");
      await fs.mkdir(targetDir);
      await fs.writeFile(path.join(targetDir, "app.yml"), "- not\n- a mapping\n");

      await run("sync", path.join(dir, "defaults"), targetDir);

      expect(error).toHaveBeenCalledWith(
        `  ❌ app.yml: Root of ${path.join(targetDir, "app.yml")} must be a mapping`,
      );
      expect(error).toHaveBeenCalledWith("\n❌ 1 of 1 files failed");
      expect(exit).toHaveBeenCalledWith(1);
    });
  });

  describe("diff", () => {
    it("prints versions and drift", async () => {
      const target = path.join(dir, "app.yml");
      await fs.writeFile(target, CURRENT_V1);

      await run("diff", path.join(dir, "defaults", "app.yml"), target);

      expect(log).toHaveBeenCalledWith(`📦 ${target} is at 1.0.0, default is 2.0.0`);
      expect(log).toHaveBeenCalledWith("  ℹ️ [KEY_ADDED] Default adds 'timeout'");
      expect(log).toHaveBeenCalledWith("  ℹ️ [KEY_OVERRIDDEN] 'port' differs from the default");
      expect(log).toHaveBeenLastCalledWith("📊 Summary: 0 errors, 0 warnings, 2 info");
    });
  });

  describe("restore", () => {
    it("lists backups and restores the newest one", async () => {
      const resource = path.join(dir, "defaults", "app.yml");
      const target = path.join(dir, "app.yml");

      await run("restore", target, "--list");
      expect(log).toHaveBeenLastCalledWith("No backups found");

      await fs.writeFile(target, CURRENT_V1);
      await run("reconcile", resource, target, "--backup");
      const [timestamp] = await fs.readdir(path.join(dir, ".config-backups"));

      await run("restore", target, "--list");
      expect(log).toHaveBeenLastCalledWith(timestamp);

      await run("restore", target);
      expect(log).toHaveBeenLastCalledWith("✅ Restore completed");
      expect(await fs.readFile(target, "utf-8")).toBe(CURRENT_V1);
    });

    it("exits with 1 when there is nothing to restore", async () => {
      await run("restore", path.join(dir, "app.yml"));

      expect(error).toHaveBeenCalledWith("❌ No backups found");
      expect(exit).toHaveBeenCalledWith(1);
    });
  });
});
