/**
 * Recursive-descent parser for canonical expression text.
 *
 * The grammar is deliberately small: arithmetic, `**`, unary minus, a fixed
 * allow-list of one-argument functions and the constants `pi` and `e`.
 * Nothing in user-entered text is ever executed as code.
 */

import {
	abs,
	add,
	type ConstantName,
	constant,
	divide,
	exp,
	type FormulaExpression,
	log,
	multiply,
	NAMED_CONSTANTS,
	namedConstant,
	negate,
	power,
	reference,
	sqrt,
	subtract,
} from '@ghg-formula/formula-tree'
import { ParseError } from './errors.ts'
import { type Token, tokenize } from './tokenizer.ts'

type Expr = FormulaExpression<string>

export const FUNCTION_NAMES = ['sqrt', 'exp', 'log', 'abs'] as const

export type FunctionName = (typeof FUNCTION_NAMES)[number]

const FUNCTIONS: Readonly<Record<FunctionName, (arg: Expr) => Expr>> = { sqrt, exp, log, abs }

function isFunctionName(name: string): name is FunctionName {
	return Object.hasOwn(FUNCTIONS, name)
}

function isConstantName(name: string): name is ConstantName {
	return Object.hasOwn(NAMED_CONSTANTS, name)
}

class TokenStream {
	readonly text: string
	private readonly tokens: Token[]
	private index = 0

	constructor(text: string) {
		this.text = text
		this.tokens = tokenize(text)
	}

	peek(): Token {
		return this.tokens[Math.min(this.index, this.tokens.length - 1)] ?? { type: 'eof', pos: 0 }
	}

	next(): Token {
		const tok = this.peek()
		if (tok.type !== 'eof') {
			this.index += 1
		}
		return tok
	}

	isOp(...ops: string[]): boolean {
		const tok = this.peek()
		return tok.type === 'op' && ops.includes(tok.value)
	}

	isPunct(value: '(' | ')'): boolean {
		const tok = this.peek()
		return tok.type === 'punct' && tok.value === value
	}

	error(message: string, tok: Token): ParseError {
		return new ParseError(`${message} at position ${tok.pos}`, this.text, tok.pos)
	}
}

function describe(tok: Token): string {
	switch (tok.type) {
		case 'eof':
			return 'end of expression'
		case 'op':
		case 'punct':
			return `'${tok.value}'`
		case 'identifier':
			return `identifier '${tok.value}'`
		case 'number':
			return `number ${tok.text}`
		default: {
			const _exhaustive: never = tok
			return String(_exhaustive)
		}
	}
}

/**
 * Parse canonical expression text into an expression tree.
 * Throws `ParseError` on any input outside the grammar.
 */
export function parse(text: string): Expr {
	const stream = new TokenStream(text)
	if (stream.peek().type === 'eof') {
		throw new ParseError('Empty expression', text, 0)
	}

	const expr = parseAdditive(stream)
	const tail = stream.peek()
	if (tail.type !== 'eof') {
		const message =
			tail.type === 'punct' && tail.value === ')'
				? "Unbalanced parentheses: unexpected ')'"
				: `Unexpected ${describe(tail)}`
		throw stream.error(message, tail)
	}
	return expr
}

function parseAdditive(t: TokenStream): Expr {
	let left = parseMultiplicative(t)
	while (t.isOp('+', '-')) {
		const tok = t.next()
		const right = parseMultiplicative(t)
		left = tok.type === 'op' && tok.value === '+' ? add(left, right) : subtract(left, right)
	}
	return left
}

function parseMultiplicative(t: TokenStream): Expr {
	let left = parseUnary(t)
	while (t.isOp('*', '/')) {
		const tok = t.next()
		const right = parseUnary(t)
		left = tok.type === 'op' && tok.value === '*' ? multiply(left, right) : divide(left, right)
	}
	return left
}

function parseUnary(t: TokenStream): Expr {
	if (t.isOp('-')) {
		t.next()
		return negate(parseUnary(t))
	}
	return parsePower(t)
}

// Right-associative: the exponent is parsed as a full unary, which recurses back here
function parsePower(t: TokenStream): Expr {
	const base = parseAtom(t)
	if (t.isOp('**')) {
		t.next()
		return power(base, parseUnary(t))
	}
	return base
}

function expectClose(t: TokenStream, context: string): void {
	if (!t.isPunct(')')) {
		const tok = t.peek()
		throw t.error(`Unbalanced parentheses: expected ')' ${context}, found ${describe(tok)}`, tok)
	}
	t.next()
}

function parseAtom(t: TokenStream): Expr {
	const tok = t.next()

	switch (tok.type) {
		case 'number':
			return constant(tok.value)

		case 'identifier':
			return parseIdentifier(t, tok.value, tok)

		case 'punct': {
			if (tok.value === ')') {
				throw t.error("Unbalanced parentheses: unexpected ')'", tok)
			}
			const inner = parseAdditive(t)
			expectClose(t, 'to close group')
			return inner
		}

		case 'op':
			throw t.error(`Unexpected operator '${tok.value}'`, tok)

		case 'eof':
			throw t.error('Unexpected end of expression', tok)

		default: {
			const _exhaustive: never = tok
			throw t.error(`Unexpected token ${String(_exhaustive)}`, tok)
		}
	}
}

function parseIdentifier(t: TokenStream, name: string, tok: Token): Expr {
	const isCall = t.isPunct('(')

	if (isFunctionName(name)) {
		if (!isCall) {
			throw t.error(`Function '${name}' must be called with an argument in parentheses`, tok)
		}
		t.next()
		if (t.isPunct(')')) {
			throw t.error(`Function '${name}' expects exactly one argument`, t.peek())
		}
		const arg = parseAdditive(t)
		expectClose(t, `after argument of '${name}'`)
		return FUNCTIONS[name](arg)
	}

	if (isCall) {
		throw t.error(`Unknown function '${name}'`, tok)
	}

	if (isConstantName(name)) {
		return namedConstant(name)
	}

	return reference(name)
}
