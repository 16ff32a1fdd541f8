import fs from 'fs/promises';
import path from 'path';
import { BuildError, BuildErrorCode } from '../shared/errors.js';
import { logger } from '../shared/logger.js';

export type ArtifactCategory = 'binary-module' | 'loader-script';

export interface CandidateFile {
  path: string;
  category: ArtifactCategory | 'ignored';
}

export type LocatedArtifacts = Record<ArtifactCategory, string>;

export const TOOLCHAIN_EXTENSIONS: Readonly<Record<string, ArtifactCategory>> = {
  '.wasm': 'binary-module',
  '.js': 'loader-script',
};

export async function classifyDirectory(
  directory: string,
  extensionToCategory: Readonly<Record<string, ArtifactCategory>> = TOOLCHAIN_EXTENSIONS
): Promise<CandidateFile[]> {
  let entries;
  try {
    entries = await fs.readdir(directory, { withFileTypes: true });
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === 'ENOENT') {
      throw new BuildError(
        BuildErrorCode.MISSING_ARTIFACT,
        `Build output directory not found: ${directory}`,
        { directory }
      );
    }
    throw err;
  }

  const files: string[] = [];
  for (const e of entries) {
    if (e.isFile() || (e.isSymbolicLink() && (await isLinkToFile(path.join(directory, e.name))))) {
      files.push(e.name);
    }
  }

  return files
    .sort()
    .map(name => {
      const category = Object.hasOwn(extensionToCategory, path.extname(name))
        ? extensionToCategory[path.extname(name)]
        : 'ignored';
      return { path: path.join(directory, name), category };
    });
}

// Dangling links are not artifacts.
async function isLinkToFile(linkPath: string): Promise<boolean> {
  try {
    return (await fs.stat(linkPath)).isFile();
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === 'ENOENT') return false;
    throw err;
  }
}

/**
 * Finds exactly one file per artifact category in `directory`.
 * cargo web emits a single .wasm/.js pair per crate; anything else means the
 * build is configured for something this tool does not handle.
 */
export async function scanArtifacts(
  directory: string,
  extensionToCategory: Readonly<Record<string, ArtifactCategory>> = TOOLCHAIN_EXTENSIONS
): Promise<LocatedArtifacts> {
  const candidates = await classifyDirectory(directory, extensionToCategory);

  for (const c of candidates) {
    if (c.category === 'ignored') logger.debug({ file: c.path }, 'ignoring build output entry');
  }

  const pick = (category: ArtifactCategory): string => {
    const matches = candidates.filter(c => c.category === category).map(c => c.path);
    if (matches.length > 1) {
      throw new BuildError(
        BuildErrorCode.AMBIGUOUS_ARTIFACT,
        `Multiple ${category} files found in ${directory}: ${matches.map(m => path.basename(m)).join(', ')}`,
        { directory, category, candidates: matches }
      );
    }
    if (matches.length === 0) {
      throw new BuildError(
        BuildErrorCode.MISSING_ARTIFACT,
        `No ${category} file found in ${directory}`,
        { directory, category }
      );
    }
    return matches[0];
  };

  return {
    'binary-module': pick('binary-module'),
    'loader-script': pick('loader-script'),
  };
}
