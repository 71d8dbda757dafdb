/**
 * HAMT - Hash Array Mapped Trie
 * Bitmap-indexed trie keyed by element names
 */

import { BITS, MASK } from './constants';
import { popcount } from './utils';
import type { Owner } from './types';

// Types
export interface HLeaf<V> {
  kind: 'leaf';
  key: string;
  hash: number;
  value: V;
}

export interface HCollision<V> {
  kind: 'collision';
  entries: HLeaf<V>[];
}

export interface HNode<V> {
  kind: 'node';
  owner?: Owner;
  bitmap: number;
  children: HChild<V>[];
}

export type HChild<V> = HLeaf<V> | HCollision<V> | HNode<V>;

export interface HMap<V> {
  root: HChild<V> | null;
  size: number;
}

// Murmur3 32-bit hash for strings
export function hashKey(key: string, seed = 0): number {
  let h = seed ^ key.length;
  let k: number;
  let i = 0;

  while (i + 4 <= key.length) {
    k =
      (key.charCodeAt(i) & 0xff) |
      ((key.charCodeAt(i + 1) & 0xff) << 8) |
      ((key.charCodeAt(i + 2) & 0xff) << 16) |
      ((key.charCodeAt(i + 3) & 0xff) << 24);
    i += 4;
    k = Math.imul(k, 0xcc9e2d51);
    k = (k << 15) | (k >>> 17);
    k = Math.imul(k, 0x1b873593);
    h ^= k;
    h = (h << 13) | (h >>> 19);
    h = (Math.imul(h, 5) + 0xe6546b64) | 0;
  }

  k = 0;
  switch (key.length & 3) {
    case 3:
      k ^= (key.charCodeAt(i + 2) & 0xff) << 16;
    // falls through
    case 2:
      k ^= (key.charCodeAt(i + 1) & 0xff) << 8;
    // falls through
    case 1:
      k ^= key.charCodeAt(i) & 0xff;
      k = Math.imul(k, 0xcc9e2d51);
      k = (k << 15) | (k >>> 17);
      k = Math.imul(k, 0x1b873593);
      h ^= k;
  }

  h ^= key.length;
  h ^= h >>> 16;
  h = Math.imul(h, 0x85ebca6b);
  h ^= h >>> 13;
  h = Math.imul(h, 0xc2b2ae35);
  h ^= h >>> 16;
  return h >>> 0;
}

export function hamtEmpty<V>(): HMap<V> {
  return { root: null, size: 0 };
}

function ensureEditableHNode<V>(node: HNode<V>, owner: Owner): HNode<V> {
  if (owner && node.owner === owner) return node;
  return {
    kind: 'node',
    owner,
    bitmap: node.bitmap,
    children: node.children.slice(),
  };
}

function mergeLeaves<V>(leaf1: HLeaf<V>, leaf2: HLeaf<V>, owner: Owner, shift: number): HNode<V> {
  const idx1 = (leaf1.hash >>> shift) & MASK;
  const idx2 = (leaf2.hash >>> shift) & MASK;

  if (idx1 === idx2) {
    return {
      kind: 'node',
      owner,
      bitmap: 1 << idx1,
      children: [mergeLeaves(leaf1, leaf2, owner, shift + BITS)],
    };
  }

  return {
    kind: 'node',
    owner,
    bitmap: (1 << idx1) | (1 << idx2),
    children: idx1 < idx2 ? [leaf1, leaf2] : [leaf2, leaf1],
  };
}

function hamtInsert<V>(
  node: HChild<V> | null,
  owner: Owner,
  hash: number,
  key: string,
  value: V,
  shift: number
): { node: HChild<V>; added: boolean; changed: boolean } {
  if (!node) {
    return { node: { kind: 'leaf', key, hash, value }, added: true, changed: true };
  }

  if (node.kind === 'leaf') {
    if (node.hash === hash && node.key === key) {
      if (node.value === value) {
        return { node, added: false, changed: false };
      }
      return { node: { kind: 'leaf', key, hash, value }, added: false, changed: true };
    }

    const newLeaf: HLeaf<V> = { kind: 'leaf', key, hash, value };
    // Full 32-bit hash collision between different names
    if (node.hash === hash) {
      return { node: { kind: 'collision', entries: [node, newLeaf] }, added: true, changed: true };
    }
    return { node: mergeLeaves(node, newLeaf, owner, shift), added: true, changed: true };
  }

  if (node.kind === 'collision') {
    const entries = node.entries.slice();
    const idx = entries.findIndex((leaf) => leaf.key === key);
    if (idx >= 0) {
      if (entries[idx].value === value) {
        return { node, added: false, changed: false };
      }
      entries[idx] = { kind: 'leaf', key, hash, value };
      return { node: { kind: 'collision', entries }, added: false, changed: true };
    }
    entries.push({ kind: 'leaf', key, hash, value });
    return { node: { kind: 'collision', entries }, added: true, changed: true };
  }

  // node.kind === 'node'
  const idx = (hash >>> shift) & MASK;
  const bit = 1 << idx;
  const packedIdx = popcount(node.bitmap & (bit - 1));

  if ((node.bitmap & bit) === 0) {
    const editable = ensureEditableHNode(node, owner);
    editable.children.splice(packedIdx, 0, { kind: 'leaf', key, hash, value });
    editable.bitmap |= bit;
    return { node: editable, added: true, changed: true };
  }

  const res = hamtInsert(node.children[packedIdx], owner, hash, key, value, shift + BITS);
  if (!res.changed) {
    return { node, added: false, changed: false };
  }

  const editable = ensureEditableHNode(node, owner);
  editable.children[packedIdx] = res.node;
  return { node: editable, added: res.added, changed: true };
}

export function hamtGet<V>(map: HMap<V>, key: string): V | undefined {
  const hash = hashKey(key);
  let node = map.root;
  let shift = 0;

  while (node) {
    if (node.kind === 'leaf') {
      return node.hash === hash && node.key === key ? node.value : undefined;
    }
    if (node.kind === 'collision') {
      return node.entries.find((leaf) => leaf.key === key)?.value;
    }
    const bit = 1 << ((hash >>> shift) & MASK);
    if ((node.bitmap & bit) === 0) return undefined;
    node = node.children[popcount(node.bitmap & (bit - 1))];
    shift += BITS;
  }

  return undefined;
}

export function hamtSet<V>(map: HMap<V>, owner: Owner, key: string, value: V): HMap<V> {
  const res = hamtInsert(map.root, owner, hashKey(key), key, value, 0);
  if (!res.changed) return map;
  return {
    root: res.node,
    size: map.size + (res.added ? 1 : 0),
  };
}
