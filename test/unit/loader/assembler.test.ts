import os from 'os';
import path from 'path';
import fs from 'fs/promises';
import {
  assembleLoader,
  extractPayload,
  locateLoaderBody,
  processLoaderScript,
  writeOutputs,
} from '../../../src/loader/assembler.js';
import { INITIALIZE_CALL } from '../../../src/loader/templates.js';
import { BuildErrorCode } from '../../../src/shared/errors.js';
import { renderLoader, SAMPLE_PAYLOAD } from '../../helpers/loader.js';

const FIXTURES = path.join(__dirname, '../../fixtures');

const WHITESPACE_VARIANTS = ['', ' ', '\n', '\t\t', '\r\n    ', '  \n\n  '];

describe('processLoaderScript', () => {
  it('keeps the loader body and appends the Screeps initialize call', () => {
    const text = renderLoader(SAMPLE_PAYLOAD);
    expect(processLoaderScript('out.js', text)).toBe(SAMPLE_PAYLOAD + INITIALIZE_CALL);
  });

  it('recovers the payload under arbitrary whitespace and crate names', () => {
    const names = ['a', 'screeps_ai', 'Bot2', 'x_1_y'];
    for (let seed = 0; seed < 12; seed++) {
      const text = renderLoader(SAMPLE_PAYLOAD, {
        crateName: names[seed % names.length],
        whitespace: (_run, index) => WHITESPACE_VARIANTS[(index * 7 + seed) % WHITESPACE_VARIANTS.length],
      });
      const { prefix, suffix } = locateLoaderBody('out.js', text);
      expect(extractPayload('out.js', text, prefix, suffix)).toBe(SAMPLE_PAYLOAD);
    }
  });

  it('handles a reformatted loader from disk', async () => {
    const text = await fs.readFile(path.join(FIXTURES, 'cargo-web-loader.js'), 'utf-8');
    const expectedPayload = [
      'var Module = {};',
      '  Module.STDWEB_PRIVATE = {};',
      '  function __initialize(__wasm_module, __load_asynchronously) {',
      '    return Module.instantiate(__wasm_module);',
      '  }',
    ].join('\n');
    expect(processLoaderScript('cargo-web-loader.js', text)).toBe(expectedPayload + INITIALIZE_CALL);
  });

  it.each([
    ['"use strict";', '"use sloppy";'],
    ['typeof Rust ===', 'typeof Rust2 ==='],
    ['define.amd', 'define.AMD'],
    ['fetch( "', 'fetchWasm( "'],
    ['__initialize( mod, true )', '__initialize( mod, 1 )'],
    ['.then( response => response.arrayBuffer() )', '.then( r => r.blob() )'],
    ['}));', '});'],
  ])('rejects a loader where %s became %s', (from, to) => {
    const text = renderLoader(SAMPLE_PAYLOAD);
    expect(text).toContain(from);
    expect(() => processLoaderScript('out.js', text.replace(from, to))).toThrow(
      expect.objectContaining({ code: BuildErrorCode.UNEXPECTED_STRUCTURE })
    );
  });

  it('names the file and asks for the templates to be updated', () => {
    expect(() => processLoaderScript('target/out.js', 'console.log(1);')).toThrow(
      /unexpected loader in target\/out\.js \(prefix did not match\).*templates need updating/
    );
  });

  it('reports a missing suffix separately from a missing prefix', () => {
    const text = renderLoader(SAMPLE_PAYLOAD).replace('fetch(', 'fletch(');
    expect(() => locateLoaderBody('out.js', text)).toThrow(/suffix did not match/);
  });

  it('fails with MISSING_ENTRY_POINT when the body does not define __initialize', () => {
    const text = renderLoader('var Module = {};\n    Module.run = function() {};');
    expect(() => processLoaderScript('out.js', text)).toThrow(
      expect.objectContaining({ code: BuildErrorCode.MISSING_ENTRY_POINT })
    );
  });
});

describe('extractPayload', () => {
  it('returns the text between the two spans', () => {
    const subject = 'HEAD __initialize() TAIL';
    expect(extractPayload('f.js', subject, { start: 0, end: 5 }, { start: 19, end: 24 })).toBe('__initialize()');
  });

  it('rejects a prefix that ends after the suffix starts', () => {
    expect(() => extractPayload('f.js', '__initialize', { start: 0, end: 8 }, { start: 4, end: 12 })).toThrow(
      expect.objectContaining({ code: BuildErrorCode.UNEXPECTED_STRUCTURE })
    );
  });

  it('rejects a loader with nothing between header and tail', () => {
    // The header's trailing whitespace swallows the tail's leading whitespace,
    // so the two matches overlap.
    expect(() => processLoaderScript('x.js', renderLoader(''))).toThrow(
      expect.objectContaining({ code: BuildErrorCode.UNEXPECTED_STRUCTURE })
    );
    expect(() => processLoaderScript('x.js', renderLoader(''))).toThrow(/prefix ends at \d+, after suffix starts at \d+/);
  });

  it('accepts an empty payload range but then requires the entry point', () => {
    expect(() => extractPayload('f.js', 'abcdef', { start: 0, end: 3 }, { start: 3, end: 6 })).toThrow(
      expect.objectContaining({ code: BuildErrorCode.MISSING_ENTRY_POINT })
    );
  });
});

describe('assembleLoader', () => {
  it('calls __initialize with the required module and false', () => {
    expect(assembleLoader('function __initialize(a,b){}')).toBe(
      "function __initialize(a,b){}\n\n__initialize(new WebAssembly.Module(require('compiled')), false);\n"
    );
  });
});

describe('writeOutputs', () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'swb-out-'));
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it('creates the output directory and overwrites earlier output', async () => {
    const wasm = path.join(tmpDir, 'in.wasm');
    await fs.writeFile(wasm, Buffer.from([0x00, 0x61, 0x73, 0x6d]));
    const outDir = path.join(tmpDir, 'target');
    await fs.mkdir(outDir);
    await fs.writeFile(path.join(outDir, 'main.js'), 'stale', 'utf-8');

    const outputs = await writeOutputs(outDir, wasm, 'fresh');

    expect(outputs).toEqual({ wasmPath: path.join(outDir, 'compiled.wasm'), jsPath: path.join(outDir, 'main.js') });
    expect(await fs.readFile(outputs.wasmPath)).toEqual(Buffer.from([0x00, 0x61, 0x73, 0x6d]));
    expect(await fs.readFile(outputs.jsPath, 'utf-8')).toBe('fresh');
  });

  it('removes both outputs when the module cannot be copied', async () => {
    const outDir = path.join(tmpDir, 'target');
    await fs.mkdir(outDir);
    await fs.writeFile(path.join(outDir, 'main.js'), 'stale', 'utf-8');

    await expect(writeOutputs(outDir, path.join(tmpDir, 'missing.wasm'), 'fresh')).rejects.toThrow();
    await expect(fs.readdir(outDir)).resolves.toEqual([]);
  });

  it('reports the loader write failure and removes the copied module', async () => {
    const wasm = path.join(tmpDir, 'in.wasm');
    await fs.writeFile(wasm, Buffer.from([0x00, 0x61, 0x73, 0x6d]));
    const outDir = path.join(tmpDir, 'target');
    // A directory where main.js belongs makes writeFile fail, and rm without
    // `recursive` fails on it too.
    await fs.mkdir(path.join(outDir, 'main.js'), { recursive: true });

    await expect(writeOutputs(outDir, wasm, 'fresh')).rejects.toMatchObject({ code: 'EISDIR', syscall: 'open' });
    await expect(fs.readdir(outDir)).resolves.toEqual(['main.js']);
  });
});
