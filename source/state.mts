import { type CoE } from "./errors.mjs"

/* === Markers ============================================================== */

/** not yet started */
export const START = -1
/** returned COMPLETE */
export const DONE = -2
/** returned ERROR */
export const FAILED = -3


/* === Types ================================================================ */

export type StateHead = {
	/** START, DONE, FAILED or the index of the last suspension site */
	line: number
	err?: CoE
}

/**
 * Everything a procedure keeps between invocations: the resume marker plus
 * its locals. Children's states usually live inside the parent's locals.
 */
export type State<L extends object = object> = L & StateHead

export type Decl<L extends object = object> = {
	readonly name: string
	readonly fields: L
}


/* === Public functions ===================================================== */

/**
 * Declares the state layout of procedure `name`.
 * Defaults are deep-copied on every init(), so they must be plain
 * (structured-cloneable) data.
 */
export function declare<L extends object>(name: string, fields: L): Decl<L> {
	return { name, fields }
}

/**
 * Prepares a state for its first invocation. With `into`, resets that state
 * in place (its progress is lost) and returns it.
 * Overrides set to undefined keep the declared default.
 */
export function init<L extends object>(decl: Decl<L>, fields?: Partial<L>, into?: State<L>): State<L> {
	const overrides = Object.entries(fields ?? {}).filter(([, v]) => v !== undefined)
	const locals: L = Object.assign(structuredClone(decl.fields), Object.fromEntries(overrides))
	const head: StateHead = { line: START, err: undefined }
	if (into) {
		return Object.assign(into, locals, head)
	}
	return Object.assign(locals, head)
}

export function isTerminated(state: StateHead): boolean {
	return state.line === DONE || state.line === FAILED
}
