export type { EvaluationErrorOptions, EvaluationFailure } from '@ghg-formula/formula-tree'
export { EvaluationError } from '@ghg-formula/formula-tree'

export interface ParseErrorOptions extends ErrorOptions {
	readonly term?: number
}

/**
 * Canonical text could not be tokenized or parsed into an expression tree.
 */
export class ParseError extends Error {
	override readonly name = 'ParseError'
	/** The text that failed to parse */
	readonly text: string
	/** 0-based offset of the offending token in `text` */
	readonly position: number
	/** 1-based summation term that failed, when raised inside a summation */
	readonly term: number | undefined

	constructor(message: string, text: string, position: number, options: ParseErrorOptions = {}) {
		super(message, options.cause === undefined ? undefined : { cause: options.cause })
		this.text = text
		this.position = position
		this.term = options.term
	}
}
