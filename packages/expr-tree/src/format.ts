import type { NumberFormat } from './types.ts'

export const DEFAULT_FORMAT: NumberFormat = { notation: 'fixed', digits: 2 }
export const DEFAULT_UNIT_FORMAT = '\\mathrm{%s}'

const PRINTF_PATTERN = /^%(?:\.(\d+))?([fegd])$/

/**
 * Convert a printf-style format string into a structured `NumberFormat`.
 *
 * `%g` maps to the shortest round-trip representation, `%.Ng` to N significant
 * digits, and `%d` to a fixed format without decimals.
 */
export function parseNumberFormat(spec: string): NumberFormat {
	const match = PRINTF_PATTERN.exec(spec)
	if (!match) {
		throw new TypeError(
			`Invalid number format '${spec}'. Expected one of %f, %.Nf, %e, %.Ne, %g, %.Ng or %d.`,
		)
	}
	const [, precision, conversion] = match
	const digits = precision === undefined ? undefined : Number(precision)

	switch (conversion) {
		case 'f':
			return normalizeFormat({ notation: 'fixed', digits: digits ?? 6 })
		case 'e':
			return normalizeFormat({ notation: 'exponential', digits: digits ?? 6 })
		case 'g':
			return digits === undefined
				? { notation: 'general' }
				: normalizeFormat({ notation: 'precision', digits: Math.max(digits, 1) })
		default:
			return { notation: 'fixed', digits: 0 }
	}
}

function assertDigits(digits: number, min: number): void {
	if (!Number.isInteger(digits) || digits < min || digits > 100) {
		throw new TypeError(`Format digits must be an integer between ${min} and 100, got ${digits}`)
	}
}

export function normalizeFormat(format: NumberFormat | string | undefined): NumberFormat {
	if (format === undefined) {
		return DEFAULT_FORMAT
	}
	if (typeof format === 'string') {
		return parseNumberFormat(format)
	}
	switch (format.notation) {
		case 'fixed':
		case 'exponential':
			assertDigits(format.digits, 0)
			break
		case 'precision':
			assertDigits(format.digits, 1)
			break
	}
	return format
}

export function normalizeExponent(exponent: number | undefined): number {
	const value = exponent ?? 0
	if (!Number.isInteger(value)) {
		throw new TypeError(`Exponent must be an integer, got ${value}`)
	}
	return value
}

export function formatNumber(value: number, format: NumberFormat): string {
	switch (format.notation) {
		case 'fixed':
			return value.toFixed(format.digits)
		case 'exponential':
			return value.toExponential(format.digits)
		case 'precision':
			return value.toPrecision(format.digits)
		case 'general':
			return String(value)
	}
}

/**
 * Format a value for display, factoring out `10^exponent` when the exponent is non-zero.
 * Negative values are parenthesized so they can be substituted into any template.
 */
export function formatValue(value: number, format: NumberFormat, exponent: number): string {
	if (exponent === 0) {
		const text = formatNumber(value, format)
		return value < 0 ? `\\left( ${text} \\right)` : text
	}

	// Scale by an exact power of ten in both directions
	const mantissa = exponent > 0 ? value / 10 ** exponent : value * 10 ** -exponent
	const text = `${formatNumber(mantissa, format)} \\cdot 10^{${exponent}}`
	return value < 0 ? `\\left( ${text} \\right)` : `{ ${text} }`
}

export function formatUnit(unit: string, unitFormat: string): string {
	return unitFormat.replace('%s', () => unit)
}

export function withUnit(result: string, unit: string, unitFormat: string): string {
	return unit === '' ? result : `${result} \\ ${formatUnit(unit, unitFormat)}`
}
