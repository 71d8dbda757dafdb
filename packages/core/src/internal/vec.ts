/**
 * Vec - persistent bit-trie vector
 *
 * 32-way trie of leaves plus a tail buffer for cheap appends. Nodes tagged
 * with the current owner are edited in place; everything else is copied on
 * the way down, so older versions never change.
 */

import { BITS, BRANCH_FACTOR, MASK } from './constants';
import type { Branch, Leaf, Owner, TrieNode, Vec } from './types';

export function emptyNode<T>(owner?: Owner): Branch<T> {
  return { kind: 'branch', owner, children: [] };
}

export function emptyVec<T>(): Vec<T> {
  return { count: 0, shift: BITS, root: emptyNode<T>(), tail: [], treeCount: 0 };
}

export function ensureEditableNode<T>(node: Branch<T>, owner: Owner): Branch<T> {
  if (owner && node.owner === owner) return node;
  return { kind: 'branch', owner, children: node.children.slice() };
}

function ensureEditableLeaf<T>(leaf: Leaf<T>, owner: Owner): Leaf<T> {
  if (owner && leaf.owner === owner) return leaf;
  return { kind: 'leaf', owner, items: leaf.items.slice() };
}

function newPath<T>(level: number, leaf: Leaf<T>, owner: Owner): TrieNode<T> {
  if (level === 0) return leaf;
  return { kind: 'branch', owner, children: [newPath(level - BITS, leaf, owner)] };
}

function pushTail<T>(
  level: number,
  parent: Branch<T>,
  leaf: Leaf<T>,
  treeCount: number,
  owner: Owner
): Branch<T> {
  const node = ensureEditableNode(parent, owner);
  const subIdx = (treeCount >>> level) & MASK;

  if (level === BITS) {
    node.children[subIdx] = leaf;
    return node;
  }

  const child = node.children[subIdx];
  node.children[subIdx] =
    child && child.kind === 'branch'
      ? pushTail(level - BITS, child, leaf, treeCount, owner)
      : newPath(level - BITS, leaf, owner);
  return node;
}

/** Leaf array holding `index`; caller guarantees `index < treeCount`. */
function leafFor<T>(vec: Vec<T>, index: number): T[] {
  let node: TrieNode<T> = vec.root;
  let level = vec.shift;

  while (node.kind === 'branch') {
    node = node.children[(index >>> level) & MASK];
    level -= BITS;
  }

  return node.items;
}

export function vecGet<T>(vec: Vec<T>, index: number): T | undefined {
  if (index < 0 || index >= vec.count) return undefined;
  if (index >= vec.treeCount) return vec.tail[index - vec.treeCount];
  return leafFor(vec, index)[index & MASK];
}

/**
 * Random-access reader that remembers the last leaf it descended to.
 * Sequential and clustered reads skip the trie walk.
 */
export function vecReader<T>(vec: Vec<T>): (index: number) => T | undefined {
  let cachedLeaf: T[] | undefined;
  let cachedLeafStart = -1;

  return (index) => {
    if (index < 0 || index >= vec.count) return undefined;
    if (index >= vec.treeCount) return vec.tail[index - vec.treeCount];

    const leafStart = index & ~MASK;
    if (cachedLeaf === undefined || cachedLeafStart !== leafStart) {
      cachedLeaf = leafFor(vec, index);
      cachedLeafStart = leafStart;
    }
    return cachedLeaf[index & MASK];
  };
}

export function vecPush<T>(vec: Vec<T>, owner: Owner, value: T): Vec<T> {
  const tailSize = vec.count - vec.treeCount;

  if (tailSize < BRANCH_FACTOR) {
    const tail = owner && vec.tailOwner === owner ? vec.tail : vec.tail.slice();
    tail.push(value);
    return { ...vec, count: vec.count + 1, tail, tailOwner: owner };
  }

  // Tail is full: move it into the trie
  const items = owner && vec.tailOwner === owner ? vec.tail : vec.tail.slice();
  const leaf: Leaf<T> = { kind: 'leaf', owner, items };
  let root: Branch<T>;
  let shift = vec.shift;

  if (vec.treeCount >>> BITS >= 1 << vec.shift) {
    root = { kind: 'branch', owner, children: [vec.root, newPath(vec.shift, leaf, owner)] };
    shift += BITS;
  } else {
    root = pushTail(vec.shift, vec.root, leaf, vec.treeCount, owner);
  }

  return {
    count: vec.count + 1,
    shift,
    root,
    tail: [value],
    treeCount: vec.treeCount + BRANCH_FACTOR,
    tailOwner: owner,
  };
}

function assocInBranch<T>(
  level: number,
  node: Branch<T>,
  owner: Owner,
  index: number,
  value: T
): Branch<T> {
  const branch = ensureEditableNode(node, owner);
  const subIdx = (index >>> level) & MASK;
  const child = branch.children[subIdx];

  if (child.kind === 'leaf') {
    const leaf = ensureEditableLeaf(child, owner);
    leaf.items[index & MASK] = value;
    branch.children[subIdx] = leaf;
  } else {
    branch.children[subIdx] = assocInBranch(level - BITS, child, owner, index, value);
  }
  return branch;
}

/** Replace the item at `index`; `index === count` appends. */
export function vecAssoc<T>(vec: Vec<T>, owner: Owner, index: number, value: T): Vec<T> {
  if (index === vec.count) return vecPush(vec, owner, value);
  if (index < 0 || index > vec.count) {
    throw new RangeError(`Index ${index} out of bounds for length ${vec.count}`);
  }

  if (index >= vec.treeCount) {
    const tail = owner && vec.tailOwner === owner ? vec.tail : vec.tail.slice();
    tail[index - vec.treeCount] = value;
    return { ...vec, tail, tailOwner: owner };
  }

  return { ...vec, root: assocInBranch(vec.shift, vec.root, owner, index, value) };
}

/** Bulk build: full leaves go straight into the trie, the rest is the tail. */
export function vecFromArray<T>(arr: readonly T[]): Vec<T> {
  const count = arr.length;
  const tailSize = count === 0 ? 0 : ((count - 1) & MASK) + 1;
  const treeCount = count - tailSize;

  let nodes: TrieNode<T>[] = [];
  for (let i = 0; i < treeCount; i += BRANCH_FACTOR) {
    nodes.push({ kind: 'leaf', items: arr.slice(i, i + BRANCH_FACTOR) });
  }

  let shift = BITS;
  while (nodes.length > BRANCH_FACTOR) {
    const parents: TrieNode<T>[] = [];
    for (let i = 0; i < nodes.length; i += BRANCH_FACTOR) {
      parents.push({ kind: 'branch', children: nodes.slice(i, i + BRANCH_FACTOR) });
    }
    nodes = parents;
    shift += BITS;
  }

  return {
    count,
    shift,
    root: { kind: 'branch', children: nodes },
    tail: arr.slice(treeCount),
    treeCount,
  };
}

/**
 * Grow to `size` items, filling new slots with `fill(index)`. Small gaps
 * are pushed; larger ones rebuild the trie in one pass.
 */
export function vecResize<T>(vec: Vec<T>, owner: Owner, size: number, fill: (index: number) => T): Vec<T> {
  const start = vec.count;
  if (size <= start) return vec;

  if (size - start <= BRANCH_FACTOR) {
    let grown = vec;
    for (let i = start; i < size; i++) {
      grown = vecPush(grown, owner, fill(i));
    }
    return grown;
  }

  const items = vecToArray(vec);
  for (let i = start; i < size; i++) {
    items.push(fill(i));
  }
  return vecFromArray(items);
}

export function* vecIter<T>(vec: Vec<T>): IterableIterator<T> {
  for (let start = 0; start < vec.treeCount; start += BRANCH_FACTOR) {
    yield* leafFor(vec, start);
  }
  yield* vec.tail;
}

export function vecToArray<T>(vec: Vec<T>): T[] {
  const out: T[] = [];
  for (const item of vecIter(vec)) {
    out.push(item);
  }
  return out;
}
