import { COMPLETE, ERROR, WAITING, YIELDED, propagateOrContinue, type Result } from "./result.mjs"
import { DONE, FAILED, START, type Decl, type State } from "./state.mjs"
import { E, EPrecondition, Err } from "./errors.mjs"
import { type Entry, type Process } from "./process.mjs"
import { bodyLog } from "./log.mjs"

/* Body model:

	- A body is a list of statements built with Co<L>. define() compiles it
	once into a flat array of ops: loops and branches become jumps, and every
	suspension site (yield, wait, await) is one slot of that array. The slot
	index is what gets stored in state.line.

	- Resuming dispatches on the op found at state.line:
		- "suspend" (yield/wait): continue at the next op
		- "await": re-enter the same op, ie, re-invoke the child, which picks
		up from its own marker.

	- One invocation runs ops until the end of the array (COMPLETE), a fail
	(ERROR) or a suspension. Nothing suspends between ops implicitly.
*/


/* === Types ================================================================ */

type Cond<L extends object> = (self: State<L>) => boolean

/** Runs the awaited thing; on ERROR it has already recorded self.err */
type Call<L extends object> = (self: State<L>, proc: Process, op: string) => Result

export type Stmt<L extends object> =
	{ readonly k: "run", readonly fn: (self: State<L>) => void } |
	{ readonly k: "when", readonly cond: Cond<L>, readonly then: Stmt<L>[], readonly otherwise: Stmt<L>[] } |
	{ readonly k: "loop", readonly cond: Cond<L>, readonly body: Stmt<L>[] } |
	{ readonly k: "suspend", readonly rc: typeof YIELDED | typeof WAITING } |
	{ readonly k: "await", readonly call: Call<L> } |
	{ readonly k: "fail", readonly name: string, readonly msg: (self: State<L>) => string } |
	{ readonly k: "done" }

// Stmt without "when" and "loop", which compile to jumps
type Op<L extends object> =
	{ readonly k: "run", readonly fn: (self: State<L>) => void } |
	{ readonly k: "jump", readonly to: number } |
	{ readonly k: "jumpUnless", readonly cond: Cond<L>, readonly to: number } |
	{ readonly k: "suspend", readonly rc: typeof YIELDED | typeof WAITING } |
	{ readonly k: "await", readonly call: Call<L> } |
	{ readonly k: "fail", readonly name: string, readonly msg: (self: State<L>) => string } |
	{ readonly k: "done" }

export type Extern<L extends object> = (proc: Process, self: State<L>) => Result


/* === Co class ============================================================= */

/**
 * Statement builder handed to define()
 * @template L - the locals of the procedure being defined
 */
export class Co<L extends object> {

	run(fn: (self: State<L>) => void): Stmt<L> {
		return { k: "run", fn }
	}

	when(cond: Cond<L>, then: Stmt<L>[], otherwise: Stmt<L>[] = []): Stmt<L> {
		return { k: "when", cond, then, otherwise }
	}

	loop(cond: Cond<L>, body: Stmt<L>[]): Stmt<L> {
		return { k: "loop", cond, body }
	}

	yield(): Stmt<L> {
		return { k: "suspend", rc: YIELDED }
	}

	wait(): Stmt<L> {
		return { k: "suspend", rc: WAITING }
	}

	/**
	 * Runs the child on the state `pick` selects, under the same root process.
	 * ERROR, SCHEDULED and WAITING are returned upward as they are; COMPLETE
	 * and YIELDED let this body carry on in the same step.
	 */
	await<C extends object>(child: Entry<C>, pick: (self: State<L>) => State<C>): Stmt<L> {
		return {
			k: "await",
			call: (self, proc, op) => {
				const state = pick(self)
				const rc = child(state, proc)
				if (rc === ERROR) {
					self.err = new Err(state.err, op)
				}
				return rc
			},
		}
	}

	/**
	 * Like await() but calls a plain function. It gets the root process, so it
	 * can hand it to a scheduler and return SCHEDULED; it is called again on
	 * resumption until it stops returning a propagating result.
	 */
	awaitExtern(fn: Extern<L>): Stmt<L> {
		return {
			k: "await",
			call: (self, proc, op) => {
				const rc = fn(proc, self)
				if (rc === ERROR) {
					self.err = new Err(self.err, op)
				}
				return rc
			},
		}
	}

	fail(name: string, msg: string | ((self: State<L>) => string) = ""): Stmt<L> {
		if (typeof msg === "string") {
			const text = msg
			return { k: "fail", name, msg: () => text }
		}
		return { k: "fail", name, msg }
	}

	done(): Stmt<L> {
		return { k: "done" }
	}
}


/* === Compiler ============================================================= */

function compile<L extends object>(stmts: Stmt<L>[], ops: Op<L>[] = []): Op<L>[] {
	for (const stmt of stmts) {
		switch (stmt.k) {
			case "when": {
				const branch = ops.length
				ops.push({ k: "jumpUnless", cond: stmt.cond, to: -1 })
				compile(stmt.then, ops)
				if (stmt.otherwise.length === 0) {
					ops[branch] = { k: "jumpUnless", cond: stmt.cond, to: ops.length }
					break
				}
				const skipElse = ops.length
				ops.push({ k: "jump", to: -1 })
				ops[branch] = { k: "jumpUnless", cond: stmt.cond, to: ops.length }
				compile(stmt.otherwise, ops)
				ops[skipElse] = { k: "jump", to: ops.length }
				break
			}
			case "loop": {
				const top = ops.length
				ops.push({ k: "jumpUnless", cond: stmt.cond, to: -1 })
				compile(stmt.body, ops)
				ops.push({ k: "jump", to: top })
				ops[top] = { k: "jumpUnless", cond: stmt.cond, to: ops.length }
				break
			}
			default:
				ops.push(stmt)
		}
	}
	return ops
}


/* === Public functions ===================================================== */

/**
 * Registers the body of a declared procedure and returns its entry point.
 */
export function define<L extends object>(decl: Decl<L>, build: (co: Co<L>) => Stmt<L>[]): Entry<L> {

	const { name } = decl
	const ops = compile(build(new Co<L>()))

	function resumeAt(line: number): number {
		if (line === START) {
			return 0
		}
		if (line === DONE || line === FAILED) {
			throw new EPrecondition(name, `"${name}" already ${line === DONE ? "completed" : "failed"}`)
		}
		const op = ops[line]
		if (op?.k === "suspend") {
			return line + 1
		}
		if (op?.k === "await") {
			return line
		}
		throw new EPrecondition(name, `"${name}" has no suspension site at line ${line}`)
	}

	function entry(self: State<L>, proc: Process): Result {

		let pc = resumeAt(self.line)

		try {
			for (; ;) {
				const op = ops[pc]

				if (op === undefined) {
					self.line = DONE
					return COMPLETE
				}

				switch (op.k) {
					case "run":
						op.fn(self)
						pc++
						break
					case "jump":
						pc = op.to
						break
					case "jumpUnless":
						pc = op.cond(self) ? pc + 1 : op.to
						break
					case "suspend":
						self.line = pc
						return op.rc
					case "await": {
						self.line = pc
						const rc = propagateOrContinue(op.call(self, proc, name))
						if (rc === ERROR) {
							self.line = FAILED
						}
						if (rc !== undefined) {
							return rc
						}
						pc++
						break
					}
					case "fail":
						self.err = E(op.name, name, op.msg(self))
						self.line = FAILED
						return ERROR
					case "done":
						self.line = DONE
						return COMPLETE
				}
			}
		}
		catch (e) {
			if (e instanceof EPrecondition) {
				throw e
			}
			bodyLog("%s threw at line %d: %O", name, pc, e)
			self.err = new Err(e, name)
			self.line = FAILED
			return ERROR
		}
	}

	return Object.assign(entry, { decl })
}
