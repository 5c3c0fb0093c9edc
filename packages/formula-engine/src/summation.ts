import { type Bindings, EvaluationError } from '@ghg-formula/formula-tree'
import { ParseError } from './errors.ts'
import { evaluate } from './evaluate.ts'
import { normalize } from './normalize.ts'
import { type EngineOptions, resolveOptions } from './options.ts'
import { parse } from './parser.ts'

/**
 * Replace every placeholder marker in a summation template with `_<index>`.
 * This is plain text templating: `FC_j * EF_j` at index 2 becomes `FC_2 * EF_2`.
 */
export function substituteIndex(template: string, index: number, placeholder: string): string {
	return template.replaceAll(placeholder, `_${index}`)
}

// Same error class, so callers can still branch on ParseError / EvaluationError
function annotateTerm(error: unknown, term: number): unknown {
	if (error instanceof ParseError) {
		return new ParseError(`Term ${term}: ${error.message}`, error.text, error.position, {
			cause: error,
			term,
		})
	}
	if (error instanceof EvaluationError) {
		return new EvaluationError(`Term ${term}: ${error.message}`, error.reason, {
			cause: error,
			variables: error.variables,
			term,
		})
	}
	return error
}

/**
 * Evaluate a summation block: Σ template_i for i = 1..n.
 *
 * Term `i` substitutes the index into the template and is evaluated against
 * `indexedBindings[i - 1]`. The first failing term aborts the whole sum;
 * an empty list sums to 0.
 *
 * @example
 * ```ts
 * evaluateSum('FC_j * EF_j', [
 *   { FC_1: 10, EF_1: 2 },
 *   { FC_2: 15, EF_2: 3 },
 * ]) // 65
 * ```
 */
export function evaluateSum(
	template: string,
	indexedBindings: readonly Bindings[],
	options: EngineOptions = {},
): number {
	const { placeholder, logger } = resolveOptions(options)

	let total = 0
	for (const [offset, bindings] of indexedBindings.entries()) {
		const term = offset + 1
		const text = substituteIndex(template, term, placeholder)

		let value: number
		try {
			value = evaluate(parse(normalize(text)), bindings)
		} catch (error) {
			throw annotateTerm(error, term)
		}

		total += value
		if (!Number.isFinite(total)) {
			throw annotateTerm(EvaluationError.nonFinite('summation'), term)
		}
		logger.debug(`Sum term ${term}: ${text} = ${value}`)
	}

	logger.info(`Sum of '${template}' over ${indexedBindings.length} terms = ${total}`)
	return total
}
