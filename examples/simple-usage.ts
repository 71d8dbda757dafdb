/**
 * Simple usage - building, reading and writing vectors
 */

import {
  assign,
  binaryOp,
  combine,
  extract,
  kindOf,
  names,
  roundTo,
  setNames,
  toArray,
  vectorOf,
  type AtomicVector,
} from '../packages/core/src/index';

const show = (v: AtomicVector) => {
  const labels = names(v);
  return labels ? { kind: kindOf(v), values: toArray(v), names: toArray(labels) } : { kind: kindOf(v), values: toArray(v) };
};

console.log('=== Atomic vectors ===\n');

// ===== Construction =====
console.log('1️⃣ combine() promotes to the highest kind');
console.log(show(combine(1, 2.5)));
console.log(show(combine(1, 'a', true)));

// ===== Recycling =====
console.log('\n2️⃣ Shorter operands are recycled');
console.log(show(binaryOp('+', [1, 3, 5, 8], [1, 2])));

// ===== Filtering =====
console.log('\n3️⃣ Filter with a comparison');
const temps = vectorOf('double', [7, 6.5, 4, 11, 8]);
console.log(show(extract(temps, binaryOp('>', temps, 6.5))));
console.log(show(extract(temps, [-1, -2])));

// ===== Growth =====
console.log('\n4️⃣ Writing past the end grows the vector');
const v = vectorOf('integer', [1, 2, 3]);
assign(v, 5, 10);
console.log(show(v));

// ===== Names =====
console.log('\n5️⃣ Named vectors work as small maps');
const prices = setNames(vectorOf('double', [1.25, 3.5]), ['tea', 'cake']);
assign(prices, 'jam', 2.75);
console.log(show(extract(prices, ['cake', 'jam'])));
console.log(show(roundTo(prices)));

// ===== Warnings =====
console.log('\n6️⃣ Warnings go to a handler');
binaryOp('+', [1, 2, 3], [1, 2], {
  onWarning: (warning) => console.log(`warning [${warning.code}]: ${warning.message}`),
});
