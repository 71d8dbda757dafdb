/**
 * Core constants for Vecta storage
 */

// Bit-trie parameters (32-way branching)
export const BITS = 5;
export const BRANCH_FACTOR = 1 << BITS; // 32
export const MASK = BRANCH_FACTOR - 1;  // 31

// Brand for atomic vector values
export const VECTOR = Symbol('VECTOR');

// 32-bit signed range of integer vectors
export const INT_MAX = 2147483647;
export const INT_MIN = -2147483647;

// Longest vector `sequence` and `repeat` will build
export const MAX_LENGTH = 2 ** 31 - 1;
