export interface EfficiencyInputs {
  redundancyCount: number
  inefficiencyCount: number
  parallelMissed: number
  startsWithPlan: boolean
  usesSandbox: boolean
}

/**
 * 1 − min(r·0.1, 0.3) − min(i·0.15, 0.3) − min(p·0.1, 0.2) + 0.1·plan + 0.05·sandbox,
 * clamped to [0, 1] and rounded to 3 decimals.
 */
export function computeEfficiencyScore(inputs: EfficiencyInputs): number {
  let score = 1.0
  score -= Math.min(inputs.redundancyCount * 0.1, 0.3)
  score -= Math.min(inputs.inefficiencyCount * 0.15, 0.3)
  score -= Math.min(inputs.parallelMissed * 0.1, 0.2)
  if (inputs.startsWithPlan) score += 0.1
  if (inputs.usesSandbox) score += 0.05

  const clamped = Math.max(0, Math.min(1, score))
  return Math.round(clamped * 1000) / 1000
}
