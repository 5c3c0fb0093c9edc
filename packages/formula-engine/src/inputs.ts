import { type Bindings, EvaluationError } from '@ghg-formula/formula-tree'
import { type ZodError, z } from 'zod'

// Accepts a decimal comma, as typed into localized forms
const NUMERIC_TEXT_RE = /^[+-]?(?:\d+[.,]?\d*|[.,]\d+)(?:[eE][+-]?\d+)?$/

const numericText = z
	.string()
	.trim()
	.min(1, 'value is empty')
	.regex(NUMERIC_TEXT_RE, 'value is not a number')
	.transform((text) => Number(text.replace(',', '.')))

const numericValue = z
	.union([z.number(), numericText])
	.pipe(z.number().finite('value is not a finite number'))

export const bindingsSchema = z.record(z.string(), numericValue)

export const indexedBindingsSchema = z.array(bindingsSchema)

function invalidInput(prefix: string, error: ZodError, nameAt: number): EvaluationError {
	const variables = new Set<string>()
	const details: string[] = []
	for (const issue of error.issues) {
		const name = issue.path[nameAt]
		if (name !== undefined) {
			variables.add(String(name))
		}
		details.push(issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message)
	}
	return new EvaluationError(`${prefix}: ${details.join('; ')}`, 'invalid-input', {
		variables: [...variables],
	})
}

/**
 * Parse a single value typed by a user. Surrounding whitespace and a
 * decimal comma are accepted; empty or non-numeric text is rejected.
 */
export function parseNumericInput(text: string, field: string): number {
	const parsed = numericText.pipe(z.number().finite('value is not a finite number')).safeParse(text)
	if (!parsed.success) {
		const reason = parsed.error.issues[0]?.message ?? 'value is invalid'
		throw new EvaluationError(`Invalid value for '${field}': ${reason}`, 'invalid-input', {
			variables: [field],
		})
	}
	return parsed.data
}

/**
 * Validate untyped variable values into `Bindings`.
 * Values may be numbers or numeric strings.
 */
export function parseBindings(input: unknown): Bindings {
	const parsed = bindingsSchema.safeParse(input)
	if (!parsed.success) {
		throw invalidInput('Invalid variable values', parsed.error, 0)
	}
	return parsed.data
}

/**
 * Validate untyped per-term values of a summation block.
 */
export function parseIndexedBindings(input: unknown): Bindings[] {
	const parsed = indexedBindingsSchema.safeParse(input)
	if (!parsed.success) {
		throw invalidInput('Invalid summation values', parsed.error, 1)
	}
	return parsed.data
}
