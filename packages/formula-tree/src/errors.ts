export type EvaluationFailure = 'missing-variables' | 'domain' | 'non-finite' | 'invalid-input'

export interface EvaluationErrorOptions extends ErrorOptions {
	readonly variables?: readonly string[]
	readonly term?: number
}

/**
 * A structurally valid formula could not be reduced to a finite number.
 */
export class EvaluationError extends Error {
	override readonly name = 'EvaluationError'
	readonly reason: EvaluationFailure
	/** Names involved in the failure, sorted */
	readonly variables: readonly string[]
	/** 1-based summation term that failed, when raised inside a summation */
	readonly term: number | undefined

	constructor(message: string, reason: EvaluationFailure, options: EvaluationErrorOptions = {}) {
		super(message, options.cause === undefined ? undefined : { cause: options.cause })
		this.reason = reason
		this.variables = [...(options.variables ?? [])].sort()
		this.term = options.term
	}

	static missing(names: Iterable<string>): EvaluationError {
		const variables = [...names].sort()
		return new EvaluationError(
			`Missing values for variables: ${variables.join(', ')}`,
			'missing-variables',
			{ variables },
		)
	}

	static domain(message: string): EvaluationError {
		return new EvaluationError(message, 'domain')
	}

	static nonFinite(operation: string): EvaluationError {
		return new EvaluationError(`Result of ${operation} is not a finite number`, 'non-finite')
	}
}
