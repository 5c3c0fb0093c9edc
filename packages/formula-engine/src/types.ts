/**
 * Shared type definitions for the formula engine.
 */

import type { Bindings } from '@ghg-formula/formula-tree'
import type { ParseError } from './errors.ts'

/**
 * A named summation block inside a composite formula.
 * Its total is bound under `name` before the main formula is evaluated.
 */
export interface SumBlock {
	readonly name: string
	readonly template: string
	readonly items: readonly Bindings[]
}

export interface SumBlockResult extends SumBlock {
	readonly total: number
}

/**
 * Outcome of `evaluateComposite`, with everything needed to report how the
 * result was reached.
 */
export interface CompositeResult {
	readonly result: number
	/** Simple variables plus one entry per sum-block total */
	readonly bindings: Bindings
	readonly sumBlocks: readonly SumBlockResult[]
}

export type ValidationResult =
	| { readonly valid: true }
	| { readonly valid: false; readonly error: ParseError }
