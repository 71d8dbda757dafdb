/**
 * Benchmark: copy-then-write vectors vs Native vs Immer
 * Each iteration keeps the original intact, as a copied value would.
 */

import { bench, describe } from 'vitest';
import { assign, binaryOp, copyVector, extract, sequence, vectorOf } from '../packages/core/src/index';
import { produce as immerProduce } from 'immer';

// ===== Setup =====
const SIZE = 1000;
const nativeArr = Array.from({ length: SIZE }, (_, i) => i + 1);
const vector = sequence(1, SIZE);
const quiet = { onWarning: () => undefined };
const written = vectorOf('integer', [999]);
const zero = vectorOf('integer', [0]);

describe('Single write at position 500', () => {
  bench('Native (copy)', () => {
    const copy = nativeArr.slice();
    copy[499] = 999;
    copy;
  });

  bench('Vector assign()', () => {
    assign(copyVector(vector), 500, written);
  });

  bench('Immer produce()', () => {
    immerProduce(nativeArr, (draft) => {
      draft[499] = 999;
    });
  });
});

// ===== Growth =====
describe('Grow by 10 elements', () => {
  bench('Native (copy)', () => {
    const copy = nativeArr.slice();
    for (let i = 0; i < 10; i++) {
      copy.push(i);
    }
    copy;
  });

  bench('Vector assign()', () => {
    assign(copyVector(vector), sequence(SIZE + 1, SIZE + 10), zero);
  });

  bench('Immer produce()', () => {
    immerProduce(nativeArr, (draft) => {
      for (let i = 0; i < 10; i++) {
        draft.push(i);
      }
    });
  });
});

// ===== Elementwise =====
describe('Add a length-2 vector', () => {
  bench('Native (map)', () => {
    nativeArr.map((x, i) => x + (i % 2 === 0 ? 1 : 2));
  });

  bench('Vector binaryOp()', () => {
    binaryOp('+', vector, [1, 2], quiet);
  });
});

// ===== Filtering =====
describe('Filter by comparison', () => {
  bench('Native (filter)', () => {
    nativeArr.filter((x) => x > 500);
  });

  bench('Vector extract()', () => {
    extract(vector, binaryOp('>', vector, 500));
  });
});
