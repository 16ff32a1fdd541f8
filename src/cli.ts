#!/usr/bin/env node
import path from 'path';
import { Command } from 'commander';
import { build, check } from './pipeline.js';
import { BuildError, errorMessage } from './shared/errors.js';
import { enableVerbose, logger } from './shared/logger.js';

interface CommonOptions {
  root: string;
  config?: string;
  verbose?: boolean;
}

function withCommonOptions(command: Command): Command {
  return command
    .option('-r, --root <dir>', 'crate root containing Cargo.toml', process.cwd())
    .option('-c, --config <file>', 'config file (default: <root>/screeps.yaml)')
    .option('-v, --verbose', 'debug logging');
}

function prepare(opts: CommonOptions): string {
  if (opts.verbose) enableVerbose();
  return path.resolve(opts.root);
}

function report(err: unknown): void {
  process.stderr.write(`✗ ${errorMessage(err)}\n`);
  if (err instanceof BuildError) {
    logger.error({ code: err.code, context: err.context }, 'build step failed');
  } else {
    logger.error({ error: err }, 'unexpected failure');
  }
  process.exitCode = 1;
}

const program = new Command()
  .name('screeps-wasm-build')
  .description('Build a cargo-web crate and produce compiled.wasm + main.js for Screeps')
  .version('0.1.0');

withCommonOptions(program.command('check').description("run 'cargo check' for the wasm target")).action(
  async (opts: CommonOptions) => {
    await check(prepare(opts), { configPath: opts.config });
  }
);

withCommonOptions(program.command('build').description("run 'cargo web build' and rewrite the loader")).action(
  async (opts: CommonOptions) => {
    const outputs = await build(prepare(opts), { configPath: opts.config });
    process.stderr.write(`✓ ${outputs.wasmPath}\n✓ ${outputs.jsPath}\n`);
  }
);

program.parseAsync(process.argv).catch(report);
