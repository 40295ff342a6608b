import { z } from 'zod'

export const STORE_VERSION = 1

// Values JSON numbers cannot carry
const SPECIAL_VALUES = ['Infinity', '-Infinity', 'NaN', '-0'] as const

/**
 * Stored value: a JSON number, null for a declared but unassigned variable,
 * or a string spelling out a value JSON numbers cannot carry.
 */
const StoredValueSchema = z.union([z.number(), z.null(), z.enum(SPECIAL_VALUES)])

const StoredVariableSchema = z.object({
	value: StoredValueSchema,
	unit: z.string(),
})

export const StoreFileSchema = z.object({
	version: z.literal(STORE_VERSION),
	variables: z.record(z.string(), StoredVariableSchema),
})

export type StoredValue = z.infer<typeof StoredValueSchema>
export type StoreFile = z.infer<typeof StoreFileSchema>

export function encodeValue(value: number | undefined): StoredValue {
	if (value === undefined) {
		return null
	}
	if (Number.isNaN(value)) {
		return 'NaN'
	}
	if (!Number.isFinite(value)) {
		return value > 0 ? 'Infinity' : '-Infinity'
	}
	return Object.is(value, -0) ? '-0' : value
}

export function decodeValue(value: StoredValue): number | undefined {
	if (value === null) {
		return undefined
	}
	return typeof value === 'number' ? value : Number(value)
}
