import fs from 'fs-extra';
import * as os from 'os';
import * as path from 'path';
import { buildDataset } from '../src/dataset/schema.js';
import type { CodeGenerator } from '../src/generator/generator.js';
import type { Dataset, GeneratedCode, GeneratorInfo } from '../src/ir/types.js';

export const TEST_GENERATOR: GeneratorInfo = Object.freeze({ name: 'fixed', version: '0.0.1' });

/** Four rows; column C has one missing value. */
export function sampleDataset(): Dataset {
  return buildDataset('sample', 'sample.csv', [
    { A: 1, B: 'x', C: 2 },
    { A: 2, B: 'y', C: 4 },
    { A: 3, B: 'x', C: 6 },
    { A: 6, B: 'y', C: null },
  ]);
}

export function fragment(source: string, inputs: string[] = ['df']): GeneratedCode {
  return { source, declaredInputs: new Set(inputs), generator: TEST_GENERATOR };
}

/** Generator that always emits the same code, whatever the query. */
export function fixedGenerator(source: string, inputs: string[] = ['df']): CodeGenerator {
  return { info: TEST_GENERATOR, generate: () => fragment(source, inputs) };
}

/** Ten nested loops over ten elements: far more work than any test timeout allows. */
export function busyLoopSource(): string {
  let body = 'n = n + 1;';
  for (let i = 0; i < 10; i += 1) {
    body = `for (const i${i} of xs) { ${body} }`;
  }
  return ['const xs = [0, 1, 2, 3, 4, 5, 6, 7, 8, 9];', 'let n = 0;', body, 'const result = n;'].join('\n');
}

export async function makeTempDir(prefix = 'statquery-test-'): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}
