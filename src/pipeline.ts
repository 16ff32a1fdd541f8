import fs from 'fs/promises';
import { scanArtifacts } from './artifacts/locator.js';
import { loadConfig } from './config/loader.js';
import { processLoaderScript, writeOutputs } from './loader/assembler.js';
import type { OutputArtifacts } from './loader/assembler.js';
import { ExecaRunner, describeCommand, runOrThrow } from './shared/exec.js';
import type { ProcessRunner } from './shared/exec.js';
import { logger } from './shared/logger.js';
import { buildCommand, buildOutputDir, checkCommand, outputDir } from './toolchain/cargo.js';

export interface PipelineOptions {
  configPath?: string;
  runner?: ProcessRunner;
}

export async function check(root: string, options: PipelineOptions = {}): Promise<void> {
  const { config } = await loadConfig(root, options.configPath);
  const spec = checkCommand(root, config);

  logger.info({ command: describeCommand(spec) }, 'running check');
  await runOrThrow(options.runner ?? new ExecaRunner(), spec);
  logger.info('check finished');
}

/**
 * Builds the crate and rewrites its loader for Screeps. Nothing under the output
 * directory is touched until the artifacts are located and the loader validated.
 */
export async function build(root: string, options: PipelineOptions = {}): Promise<OutputArtifacts> {
  const { config, configPath, fromFile } = await loadConfig(root, options.configPath);
  if (fromFile) logger.debug({ configPath, config }, 'config loaded');
  const spec = buildCommand(root, config);

  logger.info({ command: describeCommand(spec) }, 'building');
  await runOrThrow(options.runner ?? new ExecaRunner(), spec);

  // TODO: ask `cargo metadata` for the artifact names instead of scanning the directory.
  const artifacts = await scanArtifacts(buildOutputDir(root, config));
  const loaderPath = artifacts['loader-script'];
  logger.debug({ artifacts }, 'located build artifacts');

  const loader = processLoaderScript(loaderPath, await fs.readFile(loaderPath, 'utf-8'));
  const outputs = await writeOutputs(outputDir(root, config), artifacts['binary-module'], loader);

  logger.info({ wasm: outputs.wasmPath, js: outputs.jsPath }, 'build finished');
  return outputs;
}
