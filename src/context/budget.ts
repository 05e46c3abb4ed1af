// Context Budget - usable input tokens for one request

export const DEFAULT_SAFETY_MARGIN_PERCENT = 2;

export interface BudgetBreakdown {
  contextWindow: number;
  reservedOutput: number;
  safetyBuffer: number;
  /** Tokens available for system prompt, tools and messages */
  budget: number;
}

/**
 * `window - reservedOutput - floor(window * pct / 100)`, clamped at zero at every step
 */
export function computeBudget(
  contextWindow: number,
  reservedOutput: number,
  safetyMarginPercent: number = DEFAULT_SAFETY_MARGIN_PERCENT
): BudgetBreakdown {
  const window = Math.max(0, Math.floor(contextWindow));
  const reserved = Math.max(0, Math.floor(reservedOutput));
  const margin = Math.max(0, safetyMarginPercent);
  const safetyBuffer = Math.floor((window * margin) / 100);

  const afterOutput = Math.max(0, window - reserved);
  const budget = Math.max(0, afterOutput - safetyBuffer);

  return { contextWindow: window, reservedOutput: reserved, safetyBuffer, budget };
}

/**
 * Share of the budget in use, 0-100
 */
export function percentUsed(totalTokens: number, budget: number): number {
  if (budget <= 0) return totalTokens > 0 ? 100 : 0;
  return Math.min(100, (totalTokens / budget) * 100);
}
