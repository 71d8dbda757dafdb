/**
 * Core type definitions
 */

// Transient owner for structural sharing
export type Owner = object | undefined;

// Bit-trie nodes: branches above, leaves of up to 32 items at the bottom
export interface Branch<T> {
  kind: 'branch';
  owner?: Owner;
  children: TrieNode<T>[];
}

export interface Leaf<T> {
  kind: 'leaf';
  owner?: Owner;
  items: T[];
}

export type TrieNode<T> = Branch<T> | Leaf<T>;

// Bit-trie persistent vector
export interface Vec<T> {
  count: number;
  shift: number;
  root: Branch<T>;
  tail: T[];
  treeCount: number;
  tailOwner?: Owner;
}
