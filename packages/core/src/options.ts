/**
 * Process-wide engine options
 */

import type { VectorWarning } from './errors';

export type WarningHandler = (warning: VectorWarning) => void;

export interface EngineOptions {
  /** Receives advisory warnings; defaults to `process.emitWarning`. */
  onWarning?: WarningHandler;
}

const emitProcessWarning: WarningHandler = (warning) => {
  process.emitWarning(warning);
};

let current: Required<EngineOptions> = { onWarning: emitProcessWarning };

export function configure(options: EngineOptions): void {
  if (options.onWarning) current = { ...current, onWarning: options.onWarning };
}

export function resetConfiguration(): void {
  current = { onWarning: emitProcessWarning };
}

/** Deliver warnings to the per-call handler, or the configured one. */
export function reportWarnings(
  warnings: readonly (VectorWarning | undefined)[],
  options?: EngineOptions
): void {
  const handler = options?.onWarning ?? current.onWarning;
  for (const warning of warnings) {
    if (warning) handler(warning);
  }
}
