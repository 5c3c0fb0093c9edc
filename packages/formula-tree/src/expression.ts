import { EvaluationError } from './errors.ts'
import type { Bindings, FormulaNode } from './types.ts'

/**
 * Immutable expression tree paired with the names it references.
 *
 * Trees built with the constructor functions track their references in the
 * `Refs` type parameter, so `evaluate` demands exactly those names. Parsed
 * trees only know their references at run time and use `string`.
 */
export class FormulaExpression<Refs extends string = never> {
	readonly node: FormulaNode
	readonly refs: ReadonlySet<string>

	constructor(node: FormulaNode, refs: ReadonlySet<string> = new Set()) {
		this.node = node
		this.refs = refs
	}

	/**
	 * Names referenced by this expression that `bindings` does not supply.
	 */
	missing(bindings: Bindings): string[] {
		return [...this.refs].filter((name) => !Object.hasOwn(bindings, name)).sort()
	}

	/**
	 * Evaluate the expression to a finite number.
	 * Every reference must be bound; the error lists all missing names at once.
	 */
	evaluate(bindings: Readonly<Record<Refs, number>>): number {
		const values: Bindings = bindings
		const missing = this.missing(values)
		if (missing.length > 0) {
			throw EvaluationError.missing(missing)
		}
		return this.node.evaluate(values)
	}

	/**
	 * Canonical expression text. Parsing it yields a tree that evaluates identically.
	 */
	toString(): string {
		return this.node.serialize()
	}
}
