/**
 * File-backed variable store.
 *
 * Each snippet of a document build runs in its own process; values computed in
 * one snippet reach the next through this file. The file is rewritten in full
 * on every save and nothing guards against concurrent writers.
 */

import { readFileSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import {
	type Expression,
	type Operation,
	StoreCorruptError,
	type Variable,
} from '@texcalc/expr-tree'
import {
	decodeValue,
	encodeValue,
	STORE_VERSION,
	type StoreFile,
	StoreFileSchema,
} from './schema.ts'

export const DEFAULT_STORE_FILE = 'texcalc-vars.json'

export interface StoreOptions {
	/**
	 * Path of the store file.
	 * @default process.env.TEXCALC_STORE, else `texcalc-vars.json` in the OS temp directory
	 */
	readonly file?: string
}

/**
 * Anything `saveVars` can persist. Operations and raw numbers are saved without a unit.
 */
export type Storable = Variable | Expression | Operation | number

export interface StoredVariable {
	readonly value: number | undefined
	readonly unit: string
}

export function resolveStoreFile(options: StoreOptions = {}): string {
	return options.file ?? process.env.TEXCALC_STORE ?? join(tmpdir(), DEFAULT_STORE_FILE)
}

function describe(entry: Storable): StoreFile['variables'][string] {
	if (typeof entry === 'number') {
		return { value: encodeValue(entry), unit: '' }
	}
	switch (entry.kind) {
		case 'variable':
			return {
				value: encodeValue(entry.isAssigned() ? entry.value() : undefined),
				unit: entry.unit,
			}
		case 'expression':
			return { value: encodeValue(entry.value()), unit: entry.unit }
		case 'operation':
			return { value: encodeValue(entry.value()), unit: '' }
	}
}

/**
 * Write the current value and unit of every entry, replacing any previous content.
 *
 * @example
 * ```ts
 * const F = variable('F', 4.5, 'kN')
 * saveVars({ F })
 * ```
 */
export function saveVars(
	mapping: Readonly<Record<string, Storable>>,
	options: StoreOptions = {},
): void {
	const variables: StoreFile['variables'] = {}
	for (const [name, entry] of Object.entries(mapping)) {
		variables[name] = describe(entry)
	}
	const document: StoreFile = { version: STORE_VERSION, variables }
	writeFileSync(resolveStoreFile(options), `${JSON.stringify(document, null, '\t')}\n`, 'utf8')
}

function isMissingFile(error: unknown): boolean {
	return error instanceof Error && 'code' in error && error.code === 'ENOENT'
}

function readStoreText(file: string): string | undefined {
	try {
		return readFileSync(file, 'utf8')
	} catch (error) {
		if (isMissingFile(error)) {
			return undefined
		}
		throw error
	}
}

/**
 * Read and decode the store. A store that has never been written reads as empty.
 */
export function readVars(options: StoreOptions = {}): Record<string, StoredVariable> {
	const file = resolveStoreFile(options)
	const text = readStoreText(file)
	if (text === undefined) {
		return {}
	}

	let json: unknown
	try {
		json = JSON.parse(text)
	} catch (error) {
		throw new StoreCorruptError(file, 'content is not valid JSON', { cause: error })
	}

	const parsed = StoreFileSchema.safeParse(json)
	if (!parsed.success) {
		const issue = parsed.error.issues[0]
		const reason = issue
			? `${issue.path.join('.') || '<root>'}: ${issue.message}`
			: 'content does not match the store schema'
		throw new StoreCorruptError(file, reason, { cause: parsed.error })
	}

	const variables: Record<string, StoredVariable> = {}
	for (const [name, stored] of Object.entries(parsed.data.variables)) {
		variables[name] = { value: decodeValue(stored.value), unit: stored.unit }
	}
	return variables
}

/**
 * Assign stored values into the live variables of `mapping` that share their name.
 * Stored names missing from `mapping` are ignored and stored units are not checked.
 *
 * @returns the names that were assigned
 */
export function loadVars(
	mapping: Readonly<Record<string, Variable>>,
	options: StoreOptions = {},
): string[] {
	const stored = readVars(options)
	const loaded: string[] = []
	for (const [name, entry] of Object.entries(stored)) {
		const target = Object.hasOwn(mapping, name) ? mapping[name] : undefined
		if (target) {
			target.assign(entry.value)
			loaded.push(name)
		}
	}
	return loaded
}
