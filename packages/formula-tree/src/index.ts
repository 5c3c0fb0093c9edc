// Constructors

// Types
export type { ExpressionInput } from './constructors.ts'
export {
	abs,
	add,
	constant,
	divide,
	exp,
	log,
	multiply,
	namedConstant,
	negate,
	power,
	reference,
	sqrt,
	subtract,
	toExpression,
} from './constructors.ts'
export type { EvaluationErrorOptions, EvaluationFailure } from './errors.ts'
export { EvaluationError } from './errors.ts'
// FormulaExpression type (use constructor functions or the engine's parser to create instances)
export { FormulaExpression } from './expression.ts'
export type { ConstantName } from './nodes.ts'
export { NAMED_CONSTANTS } from './nodes.ts'
export type { Bindings, FormulaNode, NodeKind } from './types.ts'
export { Precedence } from './types.ts'
