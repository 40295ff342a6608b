/**
 * texcalc - typeset algebraic expressions as symbolic, substituted and result LaTeX
 *
 * @example
 * ```ts
 * const a = variable('a', 4, 'm')
 * const b = variable('b', 2, 'm')
 * const c = expression('c', divide(a, b))
 * c.strFull() // c = \frac{ {a} }{ {b} } = \frac{ 4.00 }{ 2.00 } = 2.00
 * ```
 */

export * from '@texcalc/expr-tree'
export { STORE_VERSION } from './schema.ts'
export type { Storable, StoredVariable, StoreOptions } from './store.ts'
export { DEFAULT_STORE_FILE, loadVars, readVars, resolveStoreFile, saveVars } from './store.ts'
