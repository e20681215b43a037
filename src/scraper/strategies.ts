/**
 * Ordered fallback strategies
 *
 * Selector chains ("try the strict selector, then a looser one") are
 * expressed as a list of strategies; the first one that finds something
 * wins.
 */

export interface Strategy<TInput, TResult> {
  name: string;
  run: (input: TInput) => TResult | null;
}

export interface StrategyMatch<TResult> {
  strategy: string;
  value: TResult;
}

export function firstMatch<TInput, TResult>(
  strategies: ReadonlyArray<Strategy<TInput, TResult>>,
  input: TInput
): StrategyMatch<TResult> | null {
  for (const strategy of strategies) {
    const value = strategy.run(input);
    if (value !== null) {
      return { strategy: strategy.name, value };
    }
  }
  return null;
}

/**
 * Strategies that each try one CSS selector in turn
 */
export function selectorStrategies<TInput, TResult>(
  selectors: readonly string[],
  run: (input: TInput, selector: string) => TResult | null
): Array<Strategy<TInput, TResult>> {
  return selectors.map((selector) => ({
    name: selector,
    run: (input: TInput) => run(input, selector),
  }));
}
