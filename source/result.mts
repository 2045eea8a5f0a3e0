/* === Result tags ========================================================== */

/*
	Outcome of one invocation:
	- COMPLETE:  exited normally
	- ERROR:     exited abnormally, the procedure recorded state.err
	- SCHEDULED: suspended, resumption is up to an external scheduler
	- WAITING:   suspended, blocks the whole call chain until retried
	- YIELDED:   suspended to hand back a value this step

	A state that returned COMPLETE or ERROR must not be invoked again.
*/

export const COMPLETE = "COMPLETE"
export const ERROR = "ERROR"
export const SCHEDULED = "SCHEDULED"
export const WAITING = "WAITING"
export const YIELDED = "YIELDED"

export type Result =
	typeof COMPLETE |
	typeof ERROR |
	typeof SCHEDULED |
	typeof WAITING |
	typeof YIELDED

export type Propagating = typeof ERROR | typeof SCHEDULED | typeof WAITING
export type Terminal = typeof COMPLETE | typeof ERROR
export type Suspended = typeof SCHEDULED | typeof WAITING | typeof YIELDED

export const Result = {
	COMPLETE,
	ERROR,
	SCHEDULED,
	WAITING,
	YIELDED,
} as const


/**
 * Await-site combinator. Returns the result the caller must hand upward, or
 * undefined when the caller keeps running past the await (a child YIELDED is
 * forward progress for the parent).
 */
export function propagateOrContinue(rc: Result): Propagating | undefined {
	if (rc === ERROR || rc === SCHEDULED || rc === WAITING) {
		return rc
	}
	return undefined
}

export function isTerminal(rc: Result): rc is Terminal {
	return rc === COMPLETE || rc === ERROR
}

export function isSuspended(rc: Result): rc is Suspended {
	return rc === SCHEDULED || rc === WAITING || rc === YIELDED
}
