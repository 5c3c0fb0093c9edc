import { type Bindings, EvaluationError, type FormulaExpression } from '@ghg-formula/formula-tree'
import { extract } from './extract.ts'

/**
 * Reduce a parsed tree to a finite number.
 *
 * Throws `EvaluationError` when a referenced variable has no value, when an
 * operation leaves its mathematical domain, or when any step is non-finite.
 */
export function evaluate(tree: FormulaExpression<string>, bindings: Bindings): number {
	const missing = [...extract(tree)].filter((name) => !Object.hasOwn(bindings, name))
	if (missing.length > 0) {
		throw EvaluationError.missing(missing)
	}
	return tree.node.evaluate(bindings)
}
