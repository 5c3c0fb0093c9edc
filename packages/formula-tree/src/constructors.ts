import { FormulaExpression } from './expression.ts'
import {
	AbsNode,
	AddNode,
	type ConstantName,
	ConstantNode,
	DivideNode,
	ExpNode,
	LogNode,
	MultiplyNode,
	NegateNode,
	NumberNode,
	PowerNode,
	ReferenceNode,
	SqrtNode,
	SubtractNode,
} from './nodes.ts'
import type { FormulaNode } from './types.ts'

export type ExpressionInput<Refs extends string = never> = FormulaExpression<Refs> | number

export function constant(value: number): FormulaExpression<never> {
	if (!Number.isFinite(value)) {
		throw new TypeError('Constant value must be a finite number')
	}
	return new FormulaExpression(new NumberNode(value))
}

export function namedConstant(name: ConstantName): FormulaExpression<never> {
	return new FormulaExpression(new ConstantNode(name))
}

export function toExpression<Refs extends string>(
	input: ExpressionInput<Refs>,
): FormulaExpression<Refs> {
	if (typeof input === 'number') {
		return constant(input) as FormulaExpression<Refs>
	}
	return input
}

export function reference<Name extends string>(name: Name): FormulaExpression<Name> {
	if (typeof name !== 'string' || name.length === 0) {
		throw new TypeError('Reference name must be a non-empty string')
	}
	return new FormulaExpression(new ReferenceNode(name), new Set([name]))
}

function mergeRefs(...exprs: FormulaExpression<string>[]): Set<string> {
	const refs = new Set<string>()
	for (const expr of exprs) {
		for (const ref of expr.refs) {
			refs.add(ref)
		}
	}
	return refs
}

function binary<A extends string = never, B extends string = never>(
	Node: new (left: FormulaNode, right: FormulaNode) => FormulaNode,
	left: ExpressionInput<A>,
	right: ExpressionInput<B>,
): FormulaExpression<A | B> {
	const l = toExpression(left)
	const r = toExpression(right)
	return new FormulaExpression(new Node(l.node, r.node), mergeRefs(l, r))
}

function unary<Refs extends string>(
	Node: new (arg: FormulaNode) => FormulaNode,
	arg: ExpressionInput<Refs>,
): FormulaExpression<Refs> {
	const a = toExpression(arg)
	return new FormulaExpression(new Node(a.node), new Set(a.refs))
}

export function add<A extends string = never, B extends string = never>(
	left: ExpressionInput<A>,
	right: ExpressionInput<B>,
): FormulaExpression<A | B> {
	return binary(AddNode, left, right)
}

export function subtract<A extends string = never, B extends string = never>(
	left: ExpressionInput<A>,
	right: ExpressionInput<B>,
): FormulaExpression<A | B> {
	return binary(SubtractNode, left, right)
}

export function multiply<A extends string = never, B extends string = never>(
	left: ExpressionInput<A>,
	right: ExpressionInput<B>,
): FormulaExpression<A | B> {
	return binary(MultiplyNode, left, right)
}

export function divide<A extends string = never, B extends string = never>(
	left: ExpressionInput<A>,
	right: ExpressionInput<B>,
): FormulaExpression<A | B> {
	return binary(DivideNode, left, right)
}

export function power<A extends string = never, B extends string = never>(
	base: ExpressionInput<A>,
	exponent: ExpressionInput<B>,
): FormulaExpression<A | B> {
	return binary(PowerNode, base, exponent)
}

export function negate<Refs extends string = never>(arg: ExpressionInput<Refs>): FormulaExpression<Refs> {
	return unary(NegateNode, arg)
}

export function sqrt<Refs extends string = never>(arg: ExpressionInput<Refs>): FormulaExpression<Refs> {
	return unary(SqrtNode, arg)
}

export function exp<Refs extends string = never>(arg: ExpressionInput<Refs>): FormulaExpression<Refs> {
	return unary(ExpNode, arg)
}

export function log<Refs extends string = never>(arg: ExpressionInput<Refs>): FormulaExpression<Refs> {
	return unary(LogNode, arg)
}

export function abs<Refs extends string = never>(arg: ExpressionInput<Refs>): FormulaExpression<Refs> {
	return unary(AbsNode, arg)
}
