/**
 * Prebuilt expression trees for the closed-form formulas used throughout
 * emission reporting. Each tree names its inputs in its type, so
 * `co2FromFuelExpr().evaluate({ FC: 1000, EF: 2.5, OF: 0.98 })` is checked
 * at compile time.
 */

import {
	divide,
	EvaluationError,
	exp,
	type FormulaExpression,
	multiply,
	negate,
	reference,
} from '@ghg-formula/formula-tree'
import { CARBON_TO_CO2_RATIO, KG_PER_TONNE, NITROGEN_TO_N2O_RATIO } from './constants.ts'

// =============================================================================
// Emission Expressions
// =============================================================================

/**
 * CO2 from fuel combustion: E = FC * EF * OF
 *
 * References required:
 * - FC: fuel consumed (t or m³)
 * - EF: emission factor (t CO2 per unit of fuel)
 * - OF: oxidation factor, 1 for complete combustion
 */
export function co2FromFuelExpr(): FormulaExpression<'FC' | 'EF' | 'OF'> {
	return multiply(multiply(reference('FC'), reference('EF')), reference('OF'))
}

/**
 * CH4 or N2O in CO2-equivalent tonnes: E = FC * EF * GWP / 1000
 *
 * The emission factor is in kg of gas per unit of fuel.
 */
export function nonCo2EmissionExpr(): FormulaExpression<'FC' | 'EF' | 'GWP'> {
	return divide(multiply(multiply(reference('FC'), reference('EF')), reference('GWP')), KG_PER_TONNE)
}

export function carbonContentExpr(): FormulaExpression<'mass' | 'carbonFraction'> {
	return multiply(reference('mass'), reference('carbonFraction'))
}

export function co2FromCarbonExpr(): FormulaExpression<'C'> {
	return multiply(reference('C'), CARBON_TO_CO2_RATIO)
}

export function n2oFromNitrogenExpr(): FormulaExpression<'N'> {
	return multiply(reference('N'), NITROGEN_TO_N2O_RATIO)
}

/**
 * First-order decay, e.g. methane generation from landfilled waste:
 * N(t) = N0 * exp(-k * t)
 */
export function exponentialDecayExpr(): FormulaExpression<'N0' | 'k' | 't'> {
	return multiply(reference('N0'), exp(negate(multiply(reference('k'), reference('t')))))
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * Σ(value_i * weight_i) / Σ(weight_i)
 */
export function weightedAverage(values: readonly number[], weights: readonly number[]): number {
	if (values.length !== weights.length) {
		throw new EvaluationError(
			`Values and weights differ in length (${values.length} vs ${weights.length})`,
			'invalid-input',
		)
	}

	let weightedSum = 0
	let totalWeight = 0
	for (const [i, value] of values.entries()) {
		const weight = weights[i] ?? 0
		weightedSum += value * weight
		totalWeight += weight
	}

	if (totalWeight === 0) {
		throw EvaluationError.domain('Weights sum to zero')
	}
	const average = weightedSum / totalWeight
	if (!Number.isFinite(average)) {
		throw EvaluationError.nonFinite('weighted average')
	}
	return average
}

/**
 * Linear interpolation between (x1, y1) and (x2, y2).
 * A degenerate segment (x1 === x2) yields y1.
 */
export function interpolateLinear(x: number, x1: number, y1: number, x2: number, y2: number): number {
	if (x2 === x1) {
		return y1
	}
	return y1 + ((y2 - y1) * (x - x1)) / (x2 - x1)
}
