import { z } from 'zod'

/**
 * Sink for engine diagnostics. `console` satisfies it.
 */
export interface FormulaLogger {
	debug(message: string): void
	info(message: string): void
}

export const silentLogger: FormulaLogger = {
	debug() {},
	info() {},
}

/**
 * Options accepted by the summation and composite-formula operations.
 * All fields have defaults applied by `resolveOptions`.
 */
export interface EngineOptions {
	/**
	 * Name of the summation index. The placeholder marker is this name
	 * prefixed with an underscore, so `FC_j` becomes `FC_1`, `FC_2`, ...
	 * @default 'j'
	 */
	readonly indexName?: string
	/**
	 * Prefix of variables that hold sum-block totals in a composite formula.
	 * Matched case-insensitively.
	 * @default 'Sum_Block_'
	 */
	readonly sumBlockPrefix?: string
	/** @default silentLogger */
	readonly logger?: FormulaLogger
}

export interface ResolvedOptions {
	readonly indexName: string
	readonly placeholder: string
	readonly sumBlockPrefix: string
	readonly logger: FormulaLogger
}

const optionsSchema = z.object({
	indexName: z
		.string()
		.regex(
			/^[A-Za-z][A-Za-z0-9]*$/,
			'Index name must start with a letter and contain only letters and digits',
		)
		.default('j'),
	sumBlockPrefix: z.string().min(1, 'Sum block prefix must not be empty').default('Sum_Block_'),
})

export function resolveOptions(options: EngineOptions = {}): ResolvedOptions {
	const parsed = optionsSchema.safeParse({
		indexName: options.indexName,
		sumBlockPrefix: options.sumBlockPrefix,
	})
	if (!parsed.success) {
		const details = parsed.error.issues.map((issue) => issue.message).join('; ')
		throw new TypeError(`Invalid engine options: ${details}`)
	}

	const { indexName, sumBlockPrefix } = parsed.data
	return {
		indexName,
		placeholder: `_${indexName}`,
		sumBlockPrefix,
		logger: options.logger ?? silentLogger,
	}
}
