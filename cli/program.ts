/**
 * configsmith CLI commands
 *
 * Keep config files in step with the defaults an application ships
 */

import * as path from "node:path";
import { Command } from "commander";
import { glob } from "glob";
import { describeError } from "../core/errors.js";
import { FileWatcher } from "../core/FileWatcher.js";
import { createConsoleLogger } from "../core/Logger.js";
import { type ResourceReader, fileResources } from "../core/resources.js";
import { BackupManager } from "../migration/BackupManager.js";
import { UpdateCoordinator } from "../migration/UpdateCoordinator.js";
import { supportedExtensions } from "../strategies/index.js";
import { driftToIssues, printIssueReport } from "../validation/IssueReport.js";

export interface ProgramOptions {
  /** Process exit, replaced in tests */
  exit?: (code: number) => void;
}

interface ReconcileOptions {
  format?: string;
  backup?: boolean;
  dryRun?: boolean;
  verbose?: boolean;
}

interface RestoreOptions {
  list?: boolean;
}

interface DiffOptions {
  format?: string;
}

/**
 * A reader for the directory holding `resource`, and the file name inside it
 */
function locate(resource: string): { resources: ResourceReader; resourcePath: string } {
  const absolute = path.resolve(resource);
  return {
    resources: fileResources(path.dirname(absolute)),
    resourcePath: path.basename(absolute),
  };
}

export function createProgram(programOptions: ProgramOptions = {}): Command {
  const exit = programOptions.exit ?? ((code: number) => process.exit(code));
  const program = new Command();

  program
    .name("configsmith")
    .description("Keep config files in step with their bundled defaults")
    .version("1.0.0");

  // Reconcile command
  program
    .command("reconcile <resource> <target>")
    .description("Create the target from its default, or merge it onto a newer default")
    .option("--format <name>", "Config format: yaml, json, toml (default: from extension)")
    .option("--backup", "Back up the target before overwriting it")
    .option("--dry-run", "Show what would change without writing files")
    .option("--verbose", "Detailed output")
    .action(async (resource: string, target: string, options: ReconcileOptions) => {
      const logger = createConsoleLogger({ verbose: options.verbose });
      const { resources, resourcePath } = locate(resource);
      const coordinator = new UpdateCoordinator({
        resources,
        logger,
        backup: options.backup,
        dryRun: options.dryRun,
      });

      try {
        if (await coordinator.bootstrap(resourcePath, target)) {
          console.log(`✨ Created ${target}`);
        } else if (await coordinator.reconcile(resourcePath, target, options.format)) {
          console.log(`✅ Updated ${target}`);
        } else {
          console.log(`✅ ${target} is up to date`);
        }
      } catch (error) {
        console.error("\n❌ Error reconciling configuration:", describeError(error));
        exit(1);
      }
    });

  // Sync command
  program
    .command("sync <resourceDir> <targetDir>")
    .description("Reconcile every default in a directory against the same path in the target directory")
    .option("--backup", "Back up targets before overwriting them")
    .option("--dry-run", "Show what would change without writing files")
    .option("--verbose", "Detailed output")
    .action(async (resourceDir: string, targetDir: string, options: ReconcileOptions) => {
      const logger = createConsoleLogger({ verbose: options.verbose });
      const coordinator = new UpdateCoordinator({
        resources: fileResources(resourceDir),
        logger,
        backup: options.backup,
        dryRun: options.dryRun,
      });

      const patterns = supportedExtensions().map((ext) => `**/*${ext}`);
      const defaults = (await glob(patterns, {
        cwd: resourceDir,
        nodir: true,
        posix: true,
        ignore: ["**/node_modules/**", "**/.config-backups/**"],
      })).sort();

      console.log(`📋 Processing ${defaults.length} configuration files...\n`);

      let failed = 0;
      for (const relativePath of defaults) {
        const target = path.join(targetDir, relativePath);
        try {
          if (await coordinator.bootstrap(relativePath, target)) {
            console.log(`  ✨ Created ${relativePath}`);
          } else if (await coordinator.reconcile(relativePath, target)) {
            console.log(`  ✅ Updated ${relativePath}`);
          } else {
            console.log(`  ⏭️  ${relativePath} is up to date`);
          }
        } catch (error) {
          failed++;
          console.error(`  ❌ ${relativePath}: ${describeError(error)}`);
        }
      }

      if (failed > 0) {
        console.error(`\n❌ ${failed} of ${defaults.length} files failed`);
        exit(1);
      }
    });

  // Diff command
  program
    .command("diff <resource> <target>")
    .description("Show how the target differs from its default")
    .option("--format <name>", "Config format: yaml, json, toml (default: from extension)")
    .action(async (resource: string, target: string, options: DiffOptions) => {
      const { resources, resourcePath } = locate(resource);
      const coordinator = new UpdateCoordinator({ resources });

      try {
        const plan = await coordinator.plan(resourcePath, target, options.format);
        console.log(
          plan.outdated
            ? `📦 ${target} is at ${plan.currentVersion}, default is ${plan.defaultVersion}`
            : `✅ ${target} is at ${plan.currentVersion} (default ${plan.defaultVersion})`,
        );
        printIssueReport("Drift Report", driftToIssues(plan.drift, target));
      } catch (error) {
        console.error("\n❌ Error comparing configuration:", describeError(error));
        exit(1);
      }
    });

  // Restore command
  program
    .command("restore <target> [timestamp]")
    .description("Restore the target from its newest backup, or the named one")
    .option("--list", "List available backups")
    .action(async (target: string, timestamp: string | undefined, options: RestoreOptions) => {
      const logger = createConsoleLogger({ verbose: true });
      const backups = new BackupManager(path.dirname(path.resolve(target)), logger);

      try {
        const available = await backups.listBackups();
        if (options.list) {
          console.log(available.length > 0 ? available.join("\n") : "No backups found");
          return;
        }

        const chosen = timestamp ?? available[0];
        if (chosen === undefined) {
          console.error("❌ No backups found");
          exit(1);
          return;
        }

        console.log(`🔄 Restoring from backup ${chosen}...`);
        await backups.restore(chosen);
        console.log("✅ Restore completed");
      } catch (error) {
        console.error("\n❌ Error restoring backup:", describeError(error));
        exit(1);
      }
    });

  // Watch command
  program
    .command("watch <resource> <target>")
    .description("Reconcile the target whenever its default changes")
    .option("--backup", "Back up the target before overwriting it")
    .option("--verbose", "Detailed output")
    .action(async (resource: string, target: string, options: ReconcileOptions) => {
      const logger = createConsoleLogger({ verbose: options.verbose });
      const { resources, resourcePath } = locate(resource);
      const coordinator = new UpdateCoordinator({ resources, logger, backup: options.backup });

      console.log(`👀 Watching ${resource} for changes...`);
      console.log("\nPress Ctrl+C to stop\n");

      const watcher = new FileWatcher(
        path.resolve(resource),
        async () => {
          const timestamp = new Date().toLocaleTimeString();
          await coordinator.bootstrap(resourcePath, target);
          const updated = await coordinator.reconcile(resourcePath, target);
          console.log(`[${timestamp}] ${updated ? "✅ Updated" : "⏭️  Up to date:"} ${target}`);
        },
        { logger },
      );

      process.once("SIGINT", () => {
        console.log("\n\n👋 Stopping watcher...");
        watcher.close().then(
          () => exit(0),
          (error: unknown) => {
            console.error("❌ Failed to stop watcher:", describeError(error));
            exit(1);
          },
        );
      });
    });

  return program;
}
