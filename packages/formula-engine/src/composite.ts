import { type Bindings, EvaluationError } from '@ghg-formula/formula-tree'
import { ParseError } from './errors.ts'
import { evaluate } from './evaluate.ts'
import { extract } from './extract.ts'
import { normalize } from './normalize.ts'
import { type EngineOptions, resolveOptions } from './options.ts'
import { parse } from './parser.ts'
import { evaluateSum, substituteIndex } from './summation.ts'
import type { CompositeResult, SumBlock, SumBlockResult, ValidationResult } from './types.ts'

/**
 * Normalize, parse and evaluate formula text in one step.
 */
export function evaluateFormula(text: string, bindings: Bindings, options: EngineOptions = {}): number {
	const { logger } = resolveOptions(options)
	const result = evaluate(parse(normalize(text)), bindings)
	logger.info(`Formula evaluated: '${text}' = ${result}`)
	return result
}

export function formulaVariables(text: string): ReadonlySet<string> {
	return extract(parse(normalize(text)))
}

/**
 * Check formula text for syntax errors without evaluating it.
 */
export function validateFormula(text: string): ValidationResult {
	try {
		parse(normalize(text))
		return { valid: true }
	} catch (error) {
		if (error instanceof ParseError) {
			return { valid: false, error }
		}
		throw error
	}
}

function isSumBlockName(name: string, prefix: string): boolean {
	return name.toLowerCase().startsWith(prefix.toLowerCase())
}

/**
 * Variables a user has to supply directly, sorted.
 * Names of sum blocks are excluded since their values come from summation.
 */
export function formulaInputs(text: string, options: EngineOptions = {}): string[] {
	const { sumBlockPrefix } = resolveOptions(options)
	return [...formulaVariables(text)].filter((name) => !isSumBlockName(name, sumBlockPrefix)).sort()
}

/**
 * Per-index variable names of a summation template: row `i - 1` lists, sorted,
 * the names `evaluateSum` will look up for term `i`.
 */
export function sumBlockInputs(template: string, count: number, options: EngineOptions = {}): string[][] {
	const { placeholder } = resolveOptions(options)
	if (!Number.isInteger(count) || count < 1) {
		throw new RangeError(`Item count must be a positive integer, got ${count}`)
	}

	// Same order as evaluateSum: the index goes into the raw text before normalizing
	const rows = Array.from({ length: count }, (_, offset) =>
		[...formulaVariables(substituteIndex(template, offset + 1, placeholder))].sort(),
	)
	if (rows.every((names) => names.length === 0)) {
		throw new EvaluationError(
			`Summation template '${template}' references no variables`,
			'invalid-input',
		)
	}
	return rows
}

function validateSumBlocks(sumBlocks: readonly SumBlock[]): void {
	const seen = new Set<string>()
	for (const block of sumBlocks) {
		const variables = [block.name]
		if (seen.has(block.name)) {
			throw new EvaluationError(`Duplicate sum block '${block.name}'`, 'invalid-input', { variables })
		}
		if (block.template.trim() === '') {
			throw new EvaluationError(`Sum block '${block.name}' has no expression`, 'invalid-input', {
				variables,
			})
		}
		if (block.items.length === 0) {
			throw new EvaluationError(`Sum block '${block.name}' has no items`, 'invalid-input', {
				variables,
			})
		}
		seen.add(block.name)
	}
}

/**
 * Evaluate a formula whose variables include sum-block totals.
 *
 * Each block is summed first and its total bound under the block's name,
 * overriding any simple variable of the same name. The main formula is then
 * evaluated against the combined bindings.
 *
 * @example
 * ```ts
 * evaluateComposite('E = Sum_Block_1 * OF', { OF: 0.98 }, [
 *   { name: 'Sum_Block_1', template: 'FC_j * EF_j', items: [{ FC_1: 100, EF_1: 2 }] },
 * ]).result // 196
 * ```
 */
export function evaluateComposite(
	text: string,
	bindings: Bindings,
	sumBlocks: readonly SumBlock[],
	options: EngineOptions = {},
): CompositeResult {
	const { logger } = resolveOptions(options)
	validateSumBlocks(sumBlocks)

	const values: Record<string, number> = { ...bindings }
	const results: SumBlockResult[] = []
	for (const block of sumBlocks) {
		const total = evaluateSum(block.template, block.items, options)
		values[block.name] = total
		results.push({ ...block, total })
	}

	const result = evaluate(parse(normalize(text)), values)
	logger.info(`Composite formula evaluated: '${text}' with ${sumBlocks.length} sum blocks = ${result}`)
	return { result, bindings: values, sumBlocks: results }
}
