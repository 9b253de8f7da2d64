#!/usr/bin/env node

import { Command, InvalidArgumentError } from "commander";
import { listCommand } from "./commands/list.js";
import { logCommand } from "./commands/log.js";
import { publishCommand } from "./commands/publish.js";
import type { CommandResult } from "./commands/result.js";
import { scanCommand } from "./commands/scan.js";
import { validateCommand } from "./commands/validate.js";
import { verifyCommand } from "./commands/verify.js";
import { EXIT } from "./commands/exit-codes.js";
import { type OutputFormat, emit, isOutputFormat } from "./core/diagnostics.js";

function parseFormat(value: string): OutputFormat {
  if (!isOutputFormat(value)) throw new InvalidArgumentError("expected human or jsonl");
  return value;
}

function parseLimit(value: string): number {
  const n = Number.parseInt(value, 10);
  if (Number.isNaN(n) || n < 0) throw new InvalidArgumentError("expected a non-negative integer");
  return n;
}

function finish<T>(res: CommandResult<T>, format: OutputFormat): void {
  emit(res.diagnostics, format);
  if (res.exitCode !== EXIT.SUCCESS) process.exit(res.exitCode);
}

const program = new Command();

program
  .name("bridgectl")
  .description("Promote valuable workspace files to a public directory")
  .version("0.1.0");

program
  .command("publish")
  .description("Scan, score and publish eligible files (dry run unless --apply)")
  .requiredOption("--workspace <path>", "Private workspace root to scan")
  .requiredOption("--dest <path>", "Public destination root (created if absent)")
  .option("--apply", "Write publications, manifests and log entries")
  .option("--config <path>", "Config directory (default: bundled config/)")
  .option("--env <name>", "Config layer to merge over base.yaml")
  .option("--format <format>", "Output format: human|jsonl", parseFormat, "human")
  .action(async (opts: { workspace: string; dest: string; apply?: boolean; config?: string; env?: string; format: OutputFormat }) => {
    const res = await publishCommand({
      workspace: opts.workspace,
      dest: opts.dest,
      apply: opts.apply,
      configDir: opts.config,
      env: opts.env,
    });
    finish(res, opts.format);
  });

program
  .command("scan")
  .description("List scored candidates without publishing")
  .requiredOption("--workspace <path>", "Private workspace root to scan")
  .option("--config <path>", "Config directory (default: bundled config/)")
  .option("--env <name>", "Config layer to merge over base.yaml")
  .option("--format <format>", "Output format: human|jsonl", parseFormat, "human")
  .action((opts: { workspace: string; config?: string; env?: string; format: OutputFormat }) => {
    finish(scanCommand({ workspace: opts.workspace, configDir: opts.config, env: opts.env }), opts.format);
  });

program
  .command("list")
  .description("List publications at a destination root")
  .requiredOption("--dest <path>", "Public destination root")
  .option("--format <format>", "Output format: human|jsonl", parseFormat, "human")
  .action((opts: { dest: string; format: OutputFormat }) => {
    finish(listCommand({ dest: opts.dest }), opts.format);
  });

program
  .command("verify")
  .description("Check every publication against its manifest checksum")
  .requiredOption("--dest <path>", "Public destination root")
  .option("--format <format>", "Output format: human|jsonl", parseFormat, "human")
  .action((opts: { dest: string; format: OutputFormat }) => {
    finish(verifyCommand({ dest: opts.dest }), opts.format);
  });

program
  .command("log")
  .description("Show the evolution log")
  .requiredOption("--dest <path>", "Public destination root")
  .option("--limit <n>", "Show only the most recent n entries", parseLimit)
  .option("--config <path>", "Config directory (default: bundled config/)")
  .option("--env <name>", "Config layer to merge over base.yaml")
  .option("--format <format>", "Output format: human|jsonl", parseFormat, "human")
  .action((opts: { dest: string; limit?: number; config?: string; env?: string; format: OutputFormat }) => {
    finish(logCommand({ dest: opts.dest, limit: opts.limit, configDir: opts.config, env: opts.env }), opts.format);
  });

program
  .command("validate")
  .description("Validate configuration files")
  .option("--config <path>", "Config directory (default: bundled config/)")
  .option("--format <format>", "Output format: human|jsonl", parseFormat, "human")
  .action((opts: { config?: string; format: OutputFormat }) => {
    finish(validateCommand({ configDir: opts.config }), opts.format);
  });

program.exitOverride((err) => {
  process.exit(err.exitCode === 0 ? EXIT.SUCCESS : EXIT.INVALID_ARGS);
});

program.parseAsync(process.argv).catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  process.stderr.write(JSON.stringify({ ok: false, error: message }) + "\n");
  process.exit(EXIT.FAILURE);
});
