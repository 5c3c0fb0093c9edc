import { describe, expect, it } from 'vitest'
import {
	EvaluationError,
	evaluateComposite,
	evaluateFormula,
	evaluateSum,
	type FormulaLogger,
	formulaInputs,
	formulaVariables,
	ParseError,
	type SumBlock,
	sumBlockInputs,
	validateFormula,
} from '../src/index.ts'
import { catchError } from './catch-error.ts'

function recordingLogger(info: string[]): FormulaLogger {
	return {
		debug: () => {},
		info: (message) => info.push(message),
	}
}

describe('evaluateFormula', () => {
	it('normalizes, parses and evaluates in one step', () => {
		expect(evaluateFormula('E = FC \\cdot EF', { FC: 2, EF: 3 })).toBe(6)
	})

	it('logs the result', () => {
		const info: string[] = []
		evaluateFormula('E = FC \\cdot EF', { FC: 2, EF: 3 }, { logger: recordingLogger(info) })
		expect(info).toEqual(["Formula evaluated: 'E = FC \\cdot EF' = 6"])
	})
})

describe('formulaVariables', () => {
	it('extracts from raw formula text', () => {
		expect([...formulaVariables('E = \\frac{a}{b_{1}}')].sort()).toEqual(['a', 'b_1'])
	})
})

describe('validateFormula', () => {
	it('accepts valid formulas', () => {
		expect(validateFormula('E = a + b')).toEqual({ valid: true })
	})

	it('reports syntax errors without throwing', () => {
		const result = validateFormula('E = a +')
		expect(result.valid).toBe(false)
		if (result.valid) {
			return
		}
		expect(result.error).toBeInstanceOf(ParseError)
		expect(result.error.message).toBe('Unexpected end of expression at position 3')
	})
})

describe('formulaInputs', () => {
	it('excludes sum block names regardless of case', () => {
		expect(formulaInputs('E = Sum_Block_1 * OF + sum_block_2 - FC')).toEqual(['FC', 'OF'])
	})

	it('uses a configurable sum block prefix', () => {
		expect(formulaInputs('Total_A + x', { sumBlockPrefix: 'Total_' })).toEqual(['x'])
	})
})

describe('sumBlockInputs', () => {
	it('lists the variables of each term', () => {
		expect(sumBlockInputs('FC_j * EF_j', 2)).toEqual([
			['EF_1', 'FC_1'],
			['EF_2', 'FC_2'],
		])
	})

	it('lists exactly the names the summation looks up', () => {
		for (const template of ['FC_j * EF_j', 'FC_{j} * EF_{j}', 'EF_{CO2}_j * FC_j']) {
			const rows = sumBlockInputs(template, 2)
			const items = rows.map((names, offset) => Object.fromEntries(names.map((name) => [name, offset + 1])))
			expect(evaluateSum(template, items)).toBe(5)
		}
	})

	it('leaves a braced placeholder unindexed', () => {
		expect(sumBlockInputs('FC_{j} * EF_{j}', 2)).toEqual([
			['EF_j', 'FC_j'],
			['EF_j', 'FC_j'],
		])
		expect(sumBlockInputs('EF_{CO2}_j', 1)).toEqual([['EF_CO2_1']])
	})

	it('rejects a count that is not a positive integer', () => {
		expect(() => sumBlockInputs('FC_j', 0)).toThrow(RangeError)
		expect(() => sumBlockInputs('FC_j', 1.5)).toThrow(RangeError)
	})

	it('rejects a template without variables', () => {
		const error = catchError(EvaluationError, () => sumBlockInputs('2 * 3', 1))
		expect(error.reason).toBe('invalid-input')
	})
})

describe('evaluateComposite', () => {
	const fuel: SumBlock = {
		name: 'Sum_Block_1',
		template: 'FC_j * EF_j',
		items: [{ FC_1: 100, EF_1: 2 }],
	}

	it('binds each block total under its name', () => {
		const { result, bindings, sumBlocks } = evaluateComposite('E = Sum_Block_1 * OF', { OF: 0.98 }, [fuel])

		expect(result).toBeCloseTo(196)
		expect(bindings).toEqual({ OF: 0.98, Sum_Block_1: 200 })
		expect(sumBlocks).toEqual([{ ...fuel, total: 200 }])
	})

	it('combines several blocks', () => {
		const blocks: SumBlock[] = [
			{ name: 'Sum_Block_1', template: 'a_j', items: [{ a_1: 1 }, { a_2: 2 }] },
			{ name: 'Sum_Block_2', template: 'b_j * 2', items: [{ b_1: 5 }] },
		]
		expect(evaluateComposite('Sum_Block_1 + Sum_Block_2', {}, blocks).result).toBe(13)
	})

	it('overrides a simple variable of the same name', () => {
		expect(evaluateComposite('Sum_Block_1 * OF', { Sum_Block_1: 5, OF: 1 }, [fuel]).result).toBe(200)
	})

	it('fails when the formula uses a block that was not supplied', () => {
		const error = catchError(EvaluationError, () => evaluateComposite('Sum_Block_2', {}, [fuel]))
		expect(error.reason).toBe('missing-variables')
		expect(error.variables).toEqual(['Sum_Block_2'])
	})

	describe('invalid blocks', () => {
		it('rejects duplicate names', () => {
			const error = catchError(EvaluationError, () => evaluateComposite('Sum_Block_1', {}, [fuel, fuel]))
			expect(error.message).toBe("Duplicate sum block 'Sum_Block_1'")
			expect(error.reason).toBe('invalid-input')
			expect(error.variables).toEqual(['Sum_Block_1'])
		})

		it('rejects an empty template', () => {
			const error = catchError(EvaluationError, () =>
				evaluateComposite('Sum_Block_1', {}, [{ ...fuel, template: '  ' }]),
			)
			expect(error.message).toBe("Sum block 'Sum_Block_1' has no expression")
		})

		it('rejects a block without items', () => {
			const error = catchError(EvaluationError, () =>
				evaluateComposite('Sum_Block_1', {}, [{ ...fuel, items: [] }]),
			)
			expect(error.message).toBe("Sum block 'Sum_Block_1' has no items")
		})
	})

	it('logs the composite result', () => {
		const info: string[] = []
		evaluateComposite('Sum_Block_1', {}, [fuel], { logger: recordingLogger(info) })
		expect(info).toEqual([
			"Sum of 'FC_j * EF_j' over 1 terms = 200",
			"Composite formula evaluated: 'Sum_Block_1' with 1 sum blocks = 200",
		])
	})
})
