import { ParseError } from './errors.ts'

export type Operator = '+' | '-' | '*' | '/' | '**'

export type Token =
	| { readonly type: 'number'; readonly value: number; readonly text: string; readonly pos: number }
	| { readonly type: 'identifier'; readonly value: string; readonly pos: number }
	| { readonly type: 'op'; readonly value: Operator; readonly pos: number }
	| { readonly type: 'punct'; readonly value: '(' | ')'; readonly pos: number }
	| { readonly type: 'eof'; readonly pos: number }

const WHITESPACE_RE = /\s+/y
const NUMBER_RE = /(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?/y
const IDENTIFIER_RE = /[\p{L}_][\p{L}\p{N}_]*/uy
// Everything a malformed literal could run into, reported as one piece
const LITERAL_TAIL_RE = /[\p{L}\p{N}_.]*/uy

const OPERATORS: readonly Operator[] = ['**', '+', '-', '*', '/']

function matchAt(pattern: RegExp, text: string, pos: number): string | undefined {
	pattern.lastIndex = pos
	return pattern.exec(text)?.[0]
}

type NumberToken = Extract<Token, { type: 'number' }>

function readNumber(text: string, pos: number): NumberToken {
	const literal = matchAt(NUMBER_RE, text, pos) ?? ''
	const tail = matchAt(LITERAL_TAIL_RE, text, pos + literal.length) ?? ''
	const value = Number(literal)
	if (tail.length > 0 || !Number.isFinite(value)) {
		throw new ParseError(`Invalid numeric literal '${literal}${tail}'`, text, pos)
	}
	return { type: 'number', value, text: literal, pos }
}

/**
 * Split canonical expression text into tokens, ending with an `eof` token.
 */
export function tokenize(text: string): Token[] {
	const tokens: Token[] = []
	let pos = 0

	while (pos < text.length) {
		const space = matchAt(WHITESPACE_RE, text, pos)
		if (space) {
			pos += space.length
			continue
		}

		const ch = text.charAt(pos)

		if (/[\d.]/.test(ch)) {
			const token = readNumber(text, pos)
			tokens.push(token)
			pos += token.text.length
			continue
		}

		const identifier = matchAt(IDENTIFIER_RE, text, pos)
		if (identifier) {
			tokens.push({ type: 'identifier', value: identifier, pos })
			pos += identifier.length
			continue
		}

		const operator = OPERATORS.find((op) => text.startsWith(op, pos))
		if (operator) {
			tokens.push({ type: 'op', value: operator, pos })
			pos += operator.length
			continue
		}

		if (ch === '(' || ch === ')') {
			tokens.push({ type: 'punct', value: ch, pos })
			pos += 1
			continue
		}

		throw new ParseError(`Unexpected character '${ch}'`, text, pos)
	}

	tokens.push({ type: 'eof', pos })
	return tokens
}
