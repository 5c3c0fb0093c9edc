/**
 * Rewrites a human-typed formula into canonical expression text.
 *
 * Handles the notation users paste from regulatory documents: an optional
 * `name =` prefix, LaTeX operators, `\frac`, `\sqrt`, braced subscripts and
 * `^` for powers. Anything unrecognized is left for the parser to reject.
 */

const OPERATOR_REPLACEMENTS: readonly (readonly [string, string])[] = [
	['\\times', '*'],
	['\\cdot', '*'],
	['\\div', '/'],
]

type Rewrite = readonly [pattern: RegExp, replace: (match: string, ...groups: string[]) => string]

// Each rewrite removes a brace pair, so repeating them until nothing changes terminates.
// Running them together resolves nesting from the inside out, e.g. \frac{a_{1}}{b}.
const BRACE_REWRITES: readonly Rewrite[] = [
	[/\\frac\{([^{}]+)\}\{([^{}]+)\}/g, (_, numerator, denominator) => `(${numerator})/(${denominator})`],
	[/\\sqrt\{([^{}]+)\}/g, (_, radicand) => `sqrt(${radicand})`],
	[
		/([\p{L}_][\p{L}\p{N}_]*)_\{([\p{L}\p{N}_,]+)\}/gu,
		(_, name, subscript) => `${name}_${subscript.replaceAll(',', '_')}`,
	],
	[/\^\{([^{}]+)\}/g, (_, exponent) => `**(${exponent})`],
]

function rewriteBraces(text: string): string {
	let current = text
	for (;;) {
		let next = current
		for (const [pattern, replace] of BRACE_REWRITES) {
			next = next.replace(pattern, replace)
		}
		if (next === current) {
			return next
		}
		current = next
	}
}

/**
 * Normalize formula text into the syntax accepted by `parse`. Never throws.
 *
 * @example
 * ```ts
 * normalize('E_{CO2} = \\frac{FC \\cdot EF}{1000}') // '(FC * EF)/(1000)'
 * ```
 */
export function normalize(text: string): string {
	const equals = text.indexOf('=')
	let result = equals === -1 ? text : text.slice(equals + 1)

	for (const [latex, replacement] of OPERATOR_REPLACEMENTS) {
		result = result.replaceAll(latex, replacement)
	}

	result = rewriteBraces(result)
	result = result.replaceAll('^', '**')

	return result.trim()
}
