import { describe, expect, it } from 'vitest'
import {
	CARBON_TO_CO2_RATIO,
	carbonContentExpr,
	co2FromCarbonExpr,
	co2FromFuelExpr,
	EvaluationError,
	evaluate,
	exponentialDecayExpr,
	interpolateLinear,
	n2oFromNitrogenExpr,
	nonCo2EmissionExpr,
	parse,
	weightedAverage,
} from '../src/index.ts'
import { catchError } from './catch-error.ts'

describe('emission expressions', () => {
	it('computes CO2 from fuel combustion', () => {
		expect(co2FromFuelExpr().evaluate({ FC: 1000, EF: 2.5, OF: 0.98 })).toBe(2450)
	})

	it('computes CO2-equivalent tonnes of other gases', () => {
		expect(nonCo2EmissionExpr().evaluate({ FC: 1000, EF: 0.5, GWP: 28 })).toBe(14)
	})

	it('computes carbon content', () => {
		expect(carbonContentExpr().evaluate({ mass: 200, carbonFraction: 0.75 })).toBe(150)
	})

	it('converts carbon and nitrogen by molar mass', () => {
		expect(CARBON_TO_CO2_RATIO).toBeCloseTo(3.6667, 4)
		expect(co2FromCarbonExpr().evaluate({ C: 12 })).toBeCloseTo(44)
		expect(n2oFromNitrogenExpr().evaluate({ N: 28 })).toBeCloseTo(44)
	})

	it('computes first-order decay', () => {
		const decay = exponentialDecayExpr()
		expect(decay.evaluate({ N0: 100, k: 0.1, t: 0 })).toBe(100)
		expect(decay.evaluate({ N0: 100, k: 0.1, t: 10 })).toBeCloseTo(36.787944117144235)
	})

	it('serializes to text the parser reads back', () => {
		expect(co2FromFuelExpr().toString()).toBe('FC * EF * OF')
		expect(nonCo2EmissionExpr().toString()).toBe('FC * EF * GWP / 1000')
		expect(exponentialDecayExpr().toString()).toBe('N0 * exp(-(k * t))')

		const bindings = { N0: 100, k: 0.1, t: 10 }
		expect(evaluate(parse(exponentialDecayExpr().toString()), bindings)).toBe(
			exponentialDecayExpr().evaluate(bindings),
		)
	})

	it('lists the inputs each formula needs', () => {
		expect([...co2FromFuelExpr().refs].sort()).toEqual(['EF', 'FC', 'OF'])
		expect([...exponentialDecayExpr().refs].sort()).toEqual(['N0', 'k', 't'])
	})
})

describe('weightedAverage', () => {
	it('weights each value', () => {
		expect(weightedAverage([10, 20], [1, 3])).toBe(17.5)
	})

	it('rejects mismatched lengths', () => {
		const error = catchError(EvaluationError, () => weightedAverage([1, 2], [1]))
		expect(error.reason).toBe('invalid-input')
	})

	it('rejects weights that sum to zero', () => {
		const error = catchError(EvaluationError, () => weightedAverage([1, 2], [0, 0]))
		expect(error.reason).toBe('domain')
		expect(error.message).toBe('Weights sum to zero')
	})
})

describe('interpolateLinear', () => {
	it('interpolates between two points', () => {
		expect(interpolateLinear(5, 0, 0, 10, 100)).toBe(50)
	})

	it('extrapolates beyond the segment', () => {
		expect(interpolateLinear(20, 0, 0, 10, 100)).toBe(200)
	})

	it('returns the first value for a degenerate segment', () => {
		expect(interpolateLinear(3, 2, 7, 2, 9)).toBe(7)
	})
})
