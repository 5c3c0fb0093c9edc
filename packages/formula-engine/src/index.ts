/**
 * Formula expression engine for greenhouse-gas calculations.
 *
 * @example
 * ```ts
 * const tree = parse(normalize('E = FC \\cdot EF \\cdot OF'))
 * extract(tree) // Set { 'FC', 'EF', 'OF' }
 * evaluate(tree, { FC: 1000, EF: 2.5, OF: 0.98 }) // 2450
 * ```
 */

export type { Bindings, FormulaExpression } from '@ghg-formula/formula-tree'
export {
	evaluateComposite,
	evaluateFormula,
	formulaInputs,
	formulaVariables,
	sumBlockInputs,
	validateFormula,
} from './composite.ts'
export { CARBON_TO_CO2_RATIO, KG_PER_TONNE, NITROGEN_TO_N2O_RATIO } from './constants.ts'
export type { EvaluationErrorOptions, EvaluationFailure, ParseErrorOptions } from './errors.ts'
export { EvaluationError, ParseError } from './errors.ts'
export { evaluate } from './evaluate.ts'
export { extract } from './extract.ts'
export {
	carbonContentExpr,
	co2FromCarbonExpr,
	co2FromFuelExpr,
	exponentialDecayExpr,
	interpolateLinear,
	n2oFromNitrogenExpr,
	nonCo2EmissionExpr,
	weightedAverage,
} from './formulas.ts'
export {
	bindingsSchema,
	indexedBindingsSchema,
	parseBindings,
	parseIndexedBindings,
	parseNumericInput,
} from './inputs.ts'
export { normalize } from './normalize.ts'
export type { EngineOptions, FormulaLogger, ResolvedOptions } from './options.ts'
export { resolveOptions, silentLogger } from './options.ts'
export type { FunctionName } from './parser.ts'
export { FUNCTION_NAMES, parse } from './parser.ts'
export { evaluateSum, substituteIndex } from './summation.ts'
export type { CompositeResult, SumBlock, SumBlockResult, ValidationResult } from './types.ts'
