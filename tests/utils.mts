import { expect } from "vitest"
import { CoE, ERR_TAG, Err } from "../source/errors.mjs"
import { invoke, type Entry } from "../source/process.mjs"
import { type Result, isTerminal } from "../source/result.mjs"
import { type State } from "../source/state.mjs"

/**
 * Invokes until a terminal result, collecting every result on the way.
 * Bails out after `max` steps so a broken body can't hang the suite.
 */
export function drain<L extends object>(entry: Entry<L>, state: State<L>, max = 1000): Result[] {
	const results: Result[] = []
	for (let i = 0; i < max; i++) {
		const rc = invoke(entry, state)
		results.push(rc)
		if (isTerminal(rc)) {
			return results
		}
	}
	throw Error(`"${entry.decl.name}" did not finish in ${max} steps`)
}

export function assertCoE(x: unknown): asserts x is CoE {
	expect(x).toBeInstanceOf(CoE)
}

export function assertErr(x: unknown): asserts x is Err {
	expect(x).toBeInstanceOf(Err)
}

export function checkErrSpec(rec: unknown, spec: NonNullable<unknown>): void {

	if (typeof spec !== "object") {
		expect(rec).toStrictEqual(spec)
		return
	}

	if ("name" in spec && spec.name === "Error") {
		expect(rec).toBeInstanceOf(Error)
		expect(rec).not.toBeInstanceOf(CoE)
		assertHasK(rec, "message")
		expect(rec.message).toBe("message" in spec ? spec.message : "")
		return
	}

	if ("_op" in spec) {

		assertCoE(rec)
		expect(rec._op).toBe(spec._op)
		expect(rec[ERR_TAG]).toBe(1)
		expect(rec.name).toBe("name" in spec ? spec.name : "Err")
		expect(rec.message).toBe("message" in spec ? spec.message : "")

		if ("cause" in spec) {
			assertHasK(rec, "cause")
			checkErrSpec(rec.cause, spec.cause as NonNullable<unknown>)
		}
		else {
			expect(rec.cause).toBeUndefined()
		}
		return
	}

	// .cause is thrown value of not type Error
	expect(rec).toStrictEqual(spec)
}

function assertHasK<K extends string>(x: unknown, k: K): asserts x is { [k in K]: unknown } {
	expect(x).toHaveProperty(k)
}
