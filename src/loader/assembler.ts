import fs from 'fs/promises';
import path from 'path';
import { BuildError, BuildErrorCode, errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { compileTemplate, matchTemplate } from './matcher.js';
import type { MatchSpan } from './matcher.js';
import {
  ENTRY_POINT,
  EXPECTED_PREFIX,
  EXPECTED_SUFFIX,
  INITIALIZE_CALL,
  OUTPUT_JS_FILE,
  OUTPUT_WASM_FILE,
} from './templates.js';

const PREFIX_PATTERN = compileTemplate(EXPECTED_PREFIX, 'start');
const SUFFIX_PATTERN = compileTemplate(EXPECTED_SUFFIX, 'end');

export interface LoaderBody {
  prefix: MatchSpan;
  suffix: MatchSpan;
}

function unexpectedStructure(fileName: string, detail: string): BuildError {
  return new BuildError(
    BuildErrorCode.UNEXPECTED_STRUCTURE,
    `'cargo web' generated an unexpected loader in ${fileName} (${detail}). ` +
      `It has probably been updated in a way this tool does not understand yet; ` +
      `the loader templates need updating. Include the first ~30 lines of ${fileName} when reporting this.`,
    { file: fileName }
  );
}

/** Locates the generated UMD header and browser/node bootstrap tail around the loader body. */
export function locateLoaderBody(fileName: string, subject: string): LoaderBody {
  logger.debug({ prefix: PREFIX_PATTERN.regex.source, suffix: SUFFIX_PATTERN.regex.source }, 'loader patterns');
  const prefix = matchTemplate(PREFIX_PATTERN, subject);
  if (!prefix) throw unexpectedStructure(fileName, 'prefix did not match');
  const suffix = matchTemplate(SUFFIX_PATTERN, subject);
  if (!suffix) throw unexpectedStructure(fileName, 'suffix did not match');
  return { prefix, suffix };
}

export function extractPayload(fileName: string, subject: string, prefix: MatchSpan, suffix: MatchSpan): string {
  if (prefix.end > suffix.start) {
    throw unexpectedStructure(fileName, `prefix ends at ${prefix.end}, after suffix starts at ${suffix.start}`);
  }
  const payload = subject.slice(prefix.end, suffix.start);
  if (!payload.includes(ENTRY_POINT)) {
    throw new BuildError(
      BuildErrorCode.MISSING_ENTRY_POINT,
      `'cargo web' generated unexpected output in ${fileName}: it does not define '${ENTRY_POINT}'`,
      { file: fileName, entryPoint: ENTRY_POINT }
    );
  }
  return payload;
}

export function assembleLoader(payload: string): string {
  return payload + INITIALIZE_CALL;
}

/** Strips the generated bootstrap from a cargo web loader and appends the Screeps call. */
export function processLoaderScript(fileName: string, text: string): string {
  const { prefix, suffix } = locateLoaderBody(fileName, text);
  return assembleLoader(extractPayload(fileName, text, prefix, suffix));
}

export interface OutputArtifacts {
  wasmPath: string;
  jsPath: string;
}

/**
 * Copies the module and writes the loader into `outDir`, replacing earlier output.
 * If either write fails both output files are removed.
 */
export async function writeOutputs(outDir: string, wasmSource: string, loader: string): Promise<OutputArtifacts> {
  const wasmPath = path.join(outDir, OUTPUT_WASM_FILE);
  const jsPath = path.join(outDir, OUTPUT_JS_FILE);

  await fs.mkdir(outDir, { recursive: true });
  try {
    logger.debug({ from: wasmSource, to: wasmPath }, 'copying wasm module');
    await fs.copyFile(wasmSource, wasmPath);
    logger.debug({ to: jsPath }, 'writing loader');
    await fs.writeFile(jsPath, loader, 'utf-8');
  } catch (err) {
    // The write failure is what gets reported; cleanup problems are only logged.
    const cleanup = await Promise.allSettled([fs.rm(wasmPath, { force: true }), fs.rm(jsPath, { force: true })]);
    for (const r of cleanup) {
      if (r.status === 'rejected') logger.warn({ error: errorMessage(r.reason) }, 'could not remove partial output');
    }
    throw err;
  }
  return { wasmPath, jsPath };
}
