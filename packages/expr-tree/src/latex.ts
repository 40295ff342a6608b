export type LaTeXCommand = 'def' | 'newcommand' | 'renewcommand'

const MACRO_NAME = /^[a-z]+$/i

/**
 * Format a LaTeX macro definition for `name` expanding to `body`.
 *
 * @example
 * ```ts
 * toLaTeXVariable('force', '4.50 \\ \\mathrm{kN}')
 * // \def\force{4.50 \ \mathrm{kN}}
 * toLaTeXVariable('force', '4.50', 'newcommand')
 * // \newcommand{\force}{4.50}
 * ```
 */
export function toLaTeXVariable(name: string, body: string, command: LaTeXCommand = 'def'): string {
	if (!MACRO_NAME.test(name)) {
		throw new TypeError(`Invalid LaTeX macro name '${name}'. Macro names may only contain letters.`)
	}
	if (command === 'def') {
		return `\\def\\${name}{${body}}`
	}
	return `\\${command}{\\${name}}{${body}}`
}
