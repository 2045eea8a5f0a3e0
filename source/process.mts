import { type Result } from "./result.mjs"
import { type Decl, type State } from "./state.mjs"
import { invokeLog } from "./log.mjs"

/* === Types ================================================================ */

/**
 * Compiled procedure. Called with its own state and the root process of the
 * current call chain.
 */
export interface Entry<L extends object = object> {
	(self: State<L>, proc: Process): Result
	readonly decl: Decl<L>
}

/**
 * The root of one call chain, as seen from any depth of it. Bodies only pass
 * it along (eg, to an external scheduling function through awaitExtern()).
 */
export interface Process {
	readonly name: string
	/** Re-enters the root procedure with its bound state */
	step(): Result
}


/* === Proc class =========================================================== */

/**
 * Binds a root entry to its state. Not persisted: invoke() builds a fresh
 * one per call, schedulers may keep one around to resume().
 */
export class Proc<L extends object = object> implements Process {

	constructor(
		readonly entry: Entry<L>,
		readonly state: State<L>,
	) { }

	get name(): string {
		return this.entry.decl.name
	}

	step(): Result {
		const rc = this.entry(this.state, this)
		invokeLog("%s -> %s (line %d)", this.name, rc, this.state.line)
		return rc
	}
}


/* === Public functions ===================================================== */

/**
 * Runs `entry` on `state` from its resume marker until it completes, fails
 * or reaches a suspension site.
 */
export function invoke<L extends object>(entry: Entry<L>, state: State<L>): Result {
	return new Proc(entry, state).step()
}

export function resume(proc: Process): Result {
	return proc.step()
}
