import { describeError } from '../errors.js';

export type StrategyResult<T> = { ok: true; value: T } | { ok: false; reason: string };

export interface Strategy<T> {
  name: string;
  attempt(): Promise<StrategyResult<T>>;
}

export type FirstMatchResult<T> =
  | { ok: true; value: T; strategy: string }
  | { ok: false; misses: Array<{ strategy: string; reason: string }> };

export interface FirstMatchOptions {
  onMiss?: (strategy: string, reason: string, error?: unknown) => void;
}

export function hit<T>(value: T): StrategyResult<T> {
  return { ok: true, value };
}

export function miss<T = never>(reason: string): StrategyResult<T> {
  return { ok: false, reason };
}

/**
 * Try each strategy in order and return the first success. A strategy that
 * throws counts as a miss; later strategies still run.
 */
export async function firstMatch<T>(
  strategies: ReadonlyArray<Strategy<T>>,
  options: FirstMatchOptions = {}
): Promise<FirstMatchResult<T>> {
  const misses: Array<{ strategy: string; reason: string }> = [];

  for (const strategy of strategies) {
    let result: StrategyResult<T>;
    try {
      result = await strategy.attempt();
    } catch (error) {
      const reason = describeError(error);
      misses.push({ strategy: strategy.name, reason });
      options.onMiss?.(strategy.name, reason, error);
      continue;
    }

    if (result.ok) {
      return { ok: true, value: result.value, strategy: strategy.name };
    }
    misses.push({ strategy: strategy.name, reason: result.reason });
    options.onMiss?.(strategy.name, result.reason);
  }

  return { ok: false, misses };
}
