#!/usr/bin/env node

import { Command, InvalidArgumentError } from "commander";
import { generate } from "./commands/generate.js";
import { info } from "./commands/info.js";
import { EXIT } from "./commands/exit-codes.js";
import { isOutputFormat, type OutputFormat } from "./commands/output.js";
import { generatorVersion } from "./core/generator-info.js";

function parseFormat(value: string): OutputFormat {
  if (!isOutputFormat(value)) throw new InvalidArgumentError("expected human or jsonl");
  return value;
}

const program = new Command();

program
  .name("tpack")
  .description("Generate package manifests and resolve cross-package dependencies")
  .version(generatorVersion())
  .exitOverride((err) => {
    process.exit(err.exitCode === 0 ? EXIT.SUCCESS : EXIT.INVALID_ARGS);
  });

program
  .argument("[dirs...]", "Package directories (default: current directory)")
  .option("--dry-run", "Compute everything but write nothing")
  .option("-v, --verbose", "Include info-level diagnostics and dry-run previews")
  .option("--format <format>", "Output format: human|jsonl", parseFormat, "human")
  .option("--root <path>", "Directory whose manifests form the repository index")
  .option("--env <name>", "Config overlay to apply on top of base.yaml")
  .option("--config <path>", "Path to config directory")
  .option("--manifest-only", "Only run the manifest generator")
  .option("--install-block-only", "Only print the installation block")
  .option("--no-manifest", "Skip the manifest generator")
  .action(
    async (
      dirs: string[],
      opts: {
        dryRun?: boolean;
        verbose?: boolean;
        format: OutputFormat;
        root?: string;
        env?: string;
        config?: string;
        manifestOnly?: boolean;
        installBlockOnly?: boolean;
        manifest: boolean;
      },
    ) => {
      const code = await generate({
        dirs,
        dryRun: opts.dryRun,
        verbose: opts.verbose,
        format: opts.format,
        root: opts.root,
        env: opts.env,
        configDir: opts.config,
        flags: { manifestOnly: opts.manifestOnly, installBlockOnly: opts.installBlockOnly, manifest: opts.manifest },
      });
      process.exitCode = code;
    },
  );

program
  .command("info")
  .description("Show contributions, dependencies and requirements of a package")
  .argument("[dir]", "Package directory", ".")
  .option("--format <format>", "Output format: human|jsonl", parseFormat, "human")
  .option("--root <path>", "Directory whose manifests form the repository index")
  .option("--env <name>", "Config overlay to apply on top of base.yaml")
  .option("--config <path>", "Path to config directory")
  .action(async (dir: string, opts: { format: OutputFormat; root?: string; env?: string; config?: string }) => {
    process.exitCode = await info({ dir, format: opts.format, root: opts.root, env: opts.env, configDir: opts.config });
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  process.stderr.write(JSON.stringify({ ok: false, error: message }) + "\n");
  process.exit(EXIT.PACKAGE_FAILED);
});
