#!/usr/bin/env node

/**
 * rpc-cassette CLI
 *
 * Command-line interface for listing, inspecting, diffing and deleting
 * recorded cassettes.
 */

import { Command } from "commander";
import chalk from "chalk";
import { CassetteStore } from "./store.js";
import { CassetteDiff } from "./diff.js";
import { CassetteConfig } from "./config.js";

interface DirOptions {
  dir?: string;
}

interface OutputOptions extends DirOptions {
  json: boolean;
}

interface DiffOptions extends OutputOptions {
  ignore?: string[];
  failOnBreaking: boolean;
}

const program = new Command();

function storeFor(options: DirOptions): CassetteStore {
  const config = CassetteConfig.fromEnv(process.env, options.dir ? { cassetteDir: options.dir } : {});
  return new CassetteStore(() => config.cassetteDir);
}

function fail(error: unknown): never {
  console.error(chalk.red("Error:"), error instanceof Error ? error.message : error);
  process.exit(1);
}

program
  .name("rpc-cassette")
  .description("Inspect and manage recorded RPC cassettes")
  .version("0.1.0");

// List command
program
  .command("list")
  .description("List the cassettes in a directory")
  .option("-d, --dir <path>", "Cassette directory (defaults to $RPC_CASSETTE_DIR)")
  .option("--json", "Output as JSON", false)
  .action(async (options: OutputOptions) => {
    try {
      const store = storeFor(options);
      const names = await store.list();

      if (options.json) {
        console.log(JSON.stringify(names, null, 2));
        return;
      }

      if (names.length === 0) {
        console.log(chalk.yellow(`No cassettes in ${store.dir}`));
        return;
      }
      for (const name of names) {
        console.log(name);
      }
    } catch (error) {
      fail(error);
    }
  });

// Inspect command
program
  .command("inspect")
  .description("Display a cassette's metadata and recorded calls")
  .argument("<name>", "Cassette name")
  .option("-d, --dir <path>", "Cassette directory (defaults to $RPC_CASSETTE_DIR)")
  .option("--json", "Output as JSON", false)
  .action(async (name: string, options: OutputOptions) => {
    try {
      const store = storeFor(options);
      const cassette = await store.load(name);

      if (options.json) {
        console.log(JSON.stringify(cassette.toFile(), null, 2));
        return;
      }

      console.log(chalk.bold("=== Cassette ==="));
      console.log(`Name: ${cassette.name}`);
      console.log(`Path: ${store.pathFor(name)}`);
      console.log(`Recorded at: ${cassette.recordedAt ?? "unknown"}`);
      console.log(`Entries: ${cassette.size}`);

      console.log(chalk.bold("\n=== Calls ==="));
      const methods = new Map<string, number>();
      for (const [request] of cassette.entries) {
        methods.set(request.method, (methods.get(request.method) || 0) + 1);
      }

      for (const [method, count] of methods.entries()) {
        console.log(`${method}: ${count}`);
      }
    } catch (error) {
      fail(error);
    }
  });

// Diff command
program
  .command("diff")
  .description("Compare two cassettes and detect changes")
  .argument("<baseline>", "Baseline cassette name")
  .argument("<current>", "Current cassette name")
  .option("-d, --dir <path>", "Cassette directory (defaults to $RPC_CASSETTE_DIR)")
  .option("--ignore <fields...>", "Field names to skip when pairing requests")
  .option("--fail-on-breaking", "Exit with code 1 if breaking changes detected", false)
  .option("--json", "Output as JSON", false)
  .action(async (baselineName: string, currentName: string, options: DiffOptions) => {
    try {
      const store = storeFor(options);
      const result = await CassetteDiff.compareStored(
        store,
        baselineName,
        currentName,
        options.ignore
      );

      if (options.json) {
        console.log(
          JSON.stringify(
            {
              summary: result.summary,
              added: result.added.map((change) => change.method),
              removed: result.removed.map((change) => change.method),
              modified: result.modified.map((change) => ({
                method: change.method,
                details: change.details,
                breaking: change.breaking,
              })),
            },
            null,
            2
          )
        );
      } else {
        console.log(chalk.bold("\n=== Summary ==="));
        console.log(`Total changes: ${result.summary.total_changes}`);
        console.log(chalk.red(`Breaking changes: ${result.summary.breaking_count}`));
        console.log(chalk.green(`Added: ${result.summary.added_count}`));
        console.log(chalk.red(`Removed: ${result.summary.removed_count}`));
        console.log(chalk.yellow(`Modified: ${result.summary.modified_count}`));

        if (result.added.length > 0) {
          console.log(chalk.bold.green("\n=== Added ==="));
          for (const change of result.added) {
            console.log(`${chalk.green("+")} ${change.current?.[0].toString() ?? change.method}`);
          }
        }

        if (result.removed.length > 0) {
          console.log(chalk.bold.red("\n=== Removed ==="));
          for (const change of result.removed) {
            console.log(`${chalk.red("-")} ${change.baseline?.[0].toString() ?? change.method}`);
          }
        }

        if (result.modified.length > 0) {
          console.log(chalk.bold.yellow("\n=== Modified ==="));
          for (const change of result.modified) {
            const marker = change.breaking ? chalk.red("✗") : chalk.yellow("~");
            console.log(`${marker} ${change.method}`);
            if (change.details) {
              console.log(`  ${change.details}`);
            }
          }
        }
      }

      if (options.failOnBreaking && result.summary.breaking_count > 0) {
        console.log(chalk.red(`\nFailing due to ${result.summary.breaking_count} breaking changes`));
        process.exit(1);
      }
    } catch (error) {
      fail(error);
    }
  });

// Delete command
program
  .command("delete-all")
  .description("Delete every cassette in a directory")
  .option("-d, --dir <path>", "Cassette directory (defaults to $RPC_CASSETTE_DIR)")
  .action(async (options: DirOptions) => {
    try {
      const store = storeFor(options);
      const removed = await store.deleteAll();
      console.log(chalk.green(`Deleted ${removed} cassette(s) from ${store.dir}`));
    } catch (error) {
      fail(error);
    }
  });

program.parseAsync().catch(fail);
