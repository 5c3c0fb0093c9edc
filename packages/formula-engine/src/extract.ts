import type { FormulaExpression } from '@ghg-formula/formula-tree'

/**
 * Every distinct variable name referenced by a tree.
 * Function names and the constants `pi` and `e` are never variables.
 */
export function extract(tree: FormulaExpression<string>): ReadonlySet<string> {
	const names = new Set<string>()
	tree.node.collectReferences(names)
	return names
}
