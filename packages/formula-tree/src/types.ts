/**
 * Values supplied for the references of an expression tree.
 * Every referenced name must be present; extra keys are ignored.
 */
export type Bindings = Readonly<Record<string, number>>

export type NodeKind =
	| 'number'
	| 'reference'
	| 'constant'
	| 'negate'
	| 'sqrt'
	| 'exp'
	| 'log'
	| 'abs'
	| 'add'
	| 'subtract'
	| 'multiply'
	| 'divide'
	| 'power'

/**
 * Binding precedence used when serializing, lowest first.
 * Matches the grammar accepted by the engine's parser.
 */
export const Precedence = {
	additive: 1,
	multiplicative: 2,
	unary: 3,
	power: 4,
	atom: 5,
} as const

export type Precedence = (typeof Precedence)[keyof typeof Precedence]

/**
 * Internal node interface - implemented by all expression node classes
 */
export interface FormulaNode {
	readonly kind: NodeKind
	readonly precedence: Precedence

	/**
	 * Add the name of every reference below this node to `into`
	 */
	collectReferences(into: Set<string>): void

	/**
	 * Reduce this node to a finite number.
	 * Throws `EvaluationError` for missing references, domain violations and non-finite results.
	 */
	evaluate(bindings: Bindings): number

	/**
	 * Serialize to canonical expression text
	 */
	serialize(): string
}
