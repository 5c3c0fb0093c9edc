import { EvaluationError } from './errors.ts'
import { type Bindings, type FormulaNode, type NodeKind, Precedence } from './types.ts'

export const NAMED_CONSTANTS = {
	pi: Math.PI,
	e: Math.E,
} as const

export type ConstantName = keyof typeof NAMED_CONSTANTS

function ensureFinite(value: number, operation: string): number {
	if (!Number.isFinite(value)) {
		throw EvaluationError.nonFinite(operation)
	}
	return value
}

function wrap(node: FormulaNode, minimum: Precedence): string {
	const text = node.serialize()
	return node.precedence < minimum ? `(${text})` : text
}

export class NumberNode implements FormulaNode {
	readonly kind = 'number'
	readonly value: number

	constructor(value: number) {
		this.value = value
	}

	get precedence(): Precedence {
		return this.value < 0 ? Precedence.unary : Precedence.atom
	}

	collectReferences(_into: Set<string>): void {}

	evaluate(_bindings: Bindings): number {
		return this.value
	}

	serialize(): string {
		return String(this.value)
	}
}

export class ConstantNode implements FormulaNode {
	readonly kind = 'constant'
	readonly precedence = Precedence.atom
	readonly name: ConstantName

	constructor(name: ConstantName) {
		this.name = name
	}

	get value(): number {
		return NAMED_CONSTANTS[this.name]
	}

	collectReferences(_into: Set<string>): void {}

	evaluate(_bindings: Bindings): number {
		return this.value
	}

	serialize(): string {
		return this.name
	}
}

export class ReferenceNode implements FormulaNode {
	readonly kind = 'reference'
	readonly precedence = Precedence.atom
	readonly name: string

	constructor(name: string) {
		this.name = name
	}

	collectReferences(into: Set<string>): void {
		into.add(this.name)
	}

	evaluate(bindings: Bindings): number {
		if (!Object.hasOwn(bindings, this.name)) {
			throw EvaluationError.missing([this.name])
		}
		const value = bindings[this.name]
		if (typeof value !== 'number' || !Number.isFinite(value)) {
			throw new EvaluationError(`Value of '${this.name}' is not a finite number`, 'non-finite', {
				variables: [this.name],
			})
		}
		return value
	}

	serialize(): string {
		return this.name
	}
}

abstract class UnaryNode implements FormulaNode {
	abstract readonly kind: NodeKind
	abstract readonly precedence: Precedence
	readonly arg: FormulaNode

	constructor(arg: FormulaNode) {
		this.arg = arg
	}

	protected abstract compute(x: number): number
	protected abstract format(arg: FormulaNode): string

	collectReferences(into: Set<string>): void {
		this.arg.collectReferences(into)
	}

	evaluate(bindings: Bindings): number {
		return ensureFinite(this.compute(this.arg.evaluate(bindings)), this.kind)
	}

	serialize(): string {
		return this.format(this.arg)
	}
}

export class NegateNode extends UnaryNode {
	readonly kind = 'negate'
	readonly precedence = Precedence.unary
	protected compute = (x: number) => -x
	protected format = (arg: FormulaNode) => `-${wrap(arg, Precedence.unary)}`
}

// Function calls bind like atoms: the argument is always parenthesized
abstract class FunctionNode extends UnaryNode {
	readonly precedence = Precedence.atom
	protected format = (arg: FormulaNode) => `${this.kind}(${arg.serialize()})`
}

export class SqrtNode extends FunctionNode {
	readonly kind = 'sqrt'

	protected compute = (x: number) => {
		if (x < 0) {
			throw EvaluationError.domain(`Square root of a negative number (${x})`)
		}
		return Math.sqrt(x)
	}
}

export class ExpNode extends FunctionNode {
	readonly kind = 'exp'
	protected compute = Math.exp
}

export class LogNode extends FunctionNode {
	readonly kind = 'log'

	protected compute = (x: number) => {
		if (x <= 0) {
			throw EvaluationError.domain(`Logarithm of a non-positive number (${x})`)
		}
		return Math.log(x)
	}
}

export class AbsNode extends FunctionNode {
	readonly kind = 'abs'
	protected compute = Math.abs
}

abstract class BinaryNode implements FormulaNode {
	abstract readonly kind: NodeKind
	abstract readonly precedence: Precedence
	readonly left: FormulaNode
	readonly right: FormulaNode

	constructor(left: FormulaNode, right: FormulaNode) {
		this.left = left
		this.right = right
	}

	protected abstract compute(a: number, b: number): number
	protected abstract format(left: FormulaNode, right: FormulaNode): string

	collectReferences(into: Set<string>): void {
		this.left.collectReferences(into)
		this.right.collectReferences(into)
	}

	// Left operand first, matching the order a reader would evaluate by hand
	evaluate(bindings: Bindings): number {
		const a = this.left.evaluate(bindings)
		const b = this.right.evaluate(bindings)
		return ensureFinite(this.compute(a, b), this.kind)
	}

	serialize(): string {
		return this.format(this.left, this.right)
	}
}

// Left-associative: a right operand of equal precedence keeps its parentheses
function formatInfix(operator: string, left: Precedence, right: Precedence) {
	return (a: FormulaNode, b: FormulaNode) => `${wrap(a, left)} ${operator} ${wrap(b, right)}`
}

export class AddNode extends BinaryNode {
	readonly kind = 'add'
	readonly precedence = Precedence.additive
	protected compute = (a: number, b: number) => a + b
	protected format = formatInfix('+', Precedence.additive, Precedence.multiplicative)
}

export class SubtractNode extends BinaryNode {
	readonly kind = 'subtract'
	readonly precedence = Precedence.additive
	protected compute = (a: number, b: number) => a - b
	protected format = formatInfix('-', Precedence.additive, Precedence.multiplicative)
}

export class MultiplyNode extends BinaryNode {
	readonly kind = 'multiply'
	readonly precedence = Precedence.multiplicative
	protected compute = (a: number, b: number) => a * b
	protected format = formatInfix('*', Precedence.multiplicative, Precedence.unary)
}

export class DivideNode extends BinaryNode {
	readonly kind = 'divide'
	readonly precedence = Precedence.multiplicative
	protected format = formatInfix('/', Precedence.multiplicative, Precedence.unary)

	protected compute = (a: number, b: number) => {
		if (b === 0) {
			throw EvaluationError.domain('Division by zero')
		}
		return a / b
	}
}

export class PowerNode extends BinaryNode {
	readonly kind = 'power'
	readonly precedence = Precedence.power

	// The base is an atom in the grammar; the exponent may carry a unary minus
	protected format = (base: FormulaNode, exponent: FormulaNode) =>
		`${wrap(base, Precedence.atom)}**${wrap(exponent, Precedence.unary)}`

	protected compute = (a: number, b: number) => {
		if (a < 0 && !Number.isInteger(b)) {
			throw EvaluationError.domain(`Fractional power (${b}) of a negative base (${a})`)
		}
		return a ** b
	}
}
