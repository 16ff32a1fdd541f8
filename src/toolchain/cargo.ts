import path from 'path';
import type { BuildConfig } from '../config/types.js';
import type { CommandSpec } from '../shared/exec.js';

export const WASM_TARGET = 'wasm32-unknown-unknown';

function featureArgs(config: BuildConfig): string[] {
  return config.build.features.length > 0 ? ['--features', config.build.features.join(',')] : [];
}

export function checkCommand(root: string, config: BuildConfig): CommandSpec {
  return {
    program: 'cargo',
    args: ['check', `--target=${WASM_TARGET}`, ...featureArgs(config)],
    cwd: root,
  };
}

export function buildCommand(root: string, config: BuildConfig): CommandSpec {
  return {
    program: 'cargo',
    args: [
      'web',
      'build',
      `--target=${WASM_TARGET}`,
      ...(config.build.release ? ['--release'] : []),
      ...featureArgs(config),
    ],
    cwd: root,
  };
}

// Where `cargo web build` leaves the .wasm and generated .js for this profile.
export function buildOutputDir(root: string, config: BuildConfig): string {
  return path.join(root, 'target', WASM_TARGET, config.build.release ? 'release' : 'debug');
}

export function outputDir(root: string, config: BuildConfig): string {
  return path.resolve(root, config.output.directory);
}
