#!/usr/bin/env node
import { Command } from "commander";

import { isPatchError } from "./domain/errors";
import type { CommandName } from "./domain/types";
import { colors, isColorMode, setColorMode } from "./utils/cliUi";
import { assertDependency } from "./utils/dependencies";
import { readStream } from "./utils/stdin";

const program = new Command();

async function handleCommand(
  command: CommandName,
  options: { dryRun?: boolean; projectRoot?: string },
): Promise<void> {
  const { verbose } = program.opts<{ verbose?: boolean }>();
  assertDependency("yaml");
  // Imported lazily: everything behind ./commands loads yaml.
  const { runCommand } = await import("./commands");
  const raw = await readStream(process.stdin);
  process.exitCode = await runCommand(
    command,
    raw,
    { stdout: process.stdout, stderr: process.stderr },
    { dryRun: options.dryRun, projectRoot: options.projectRoot, verbose },
  );
}

function reportFailure(error: unknown): void {
  if (isPatchError(error)) {
    process.stderr.write(`${colors.red(error.message)}\n`);
    process.exitCode = 1;
    return;
  }
  const details = error instanceof Error ? (error.stack ?? error.message) : String(error);
  process.stderr.write(`${details}\n`);
  process.exitCode = 2;
}

program
  .name("dbt-yaml-patch")
  .description("Patch dbt model property YAML files in place, reading a JSON request on stdin")
  .version("0.1.0");

program.helpCommand(false);

program.option("--color <when>", "color output: auto|always|never", "auto");
program.option("--verbose", "report file writes and deletions on stderr", false);

program.hook("preAction", (_, actionCommand: Command) => {
  const { color } = actionCommand.optsWithGlobals<{ color?: string }>();
  const normalized = (color ?? "auto").toLowerCase();
  if (!isColorMode(normalized)) {
    actionCommand.error("--color must be one of: auto, always, never");
  }
  setColorMode(normalized);
});

program
  .command("apply")
  .description("Apply column and model description edits for several models in one file")
  .option("--dry-run", "report what would change without writing")
  .action((options: { dryRun?: boolean }) => handleCommand("apply", options));

program
  .command("update")
  .description("Apply column and model description edits for a single model")
  .option("--dry-run", "report what would change without writing")
  .action((options: { dryRun?: boolean }) => handleCommand("update", options));

program
  .command("relocate")
  .description("Move a model's YAML block to another properties file")
  .option("--dry-run", "report whether the model would move without touching files")
  .action((options: { dryRun?: boolean }) => handleCommand("relocate", options));

program
  .command("writeback")
  .description("Relocate models and apply description edits across a dbt project")
  .option("--project-root <dir>", "directory relative patch paths resolve against")
  .action((options: { projectRoot?: string }) => handleCommand("writeback", options));

program.parseAsync(process.argv).catch(reportFailure);
