/*
Results carry no payload: a procedure that returns ERROR leaves its reason in
state.err, the slot that stands in for an ambient errno.

- fail() records E(name) with _op set to the failing procedure.
- A value thrown from a body is recorded as ::Err, cause = the thrown value.
- A parent whose await sees ERROR records its own ::Err, cause = the child's
	err. Reading .cause from the root's err walks down to the leaf that failed
	(see rootCause()).
*/

// eslint-disable-next-line @typescript-eslint/no-redundant-type-constituents
type CauseErr = CoE | Error | unknown

export const ERR_TAG = "{err!}"

export class CoE<Name extends string = string> implements Error {

	[ERR_TAG] = 1 as const
	declare cause?: CauseErr

	constructor(
		readonly name: Name,
		readonly message: string,
		readonly _op: string,
		cause?: CauseErr,
	) {
		if (cause !== undefined) {
			this.cause = cause
		}
	}

	E<Name extends string>(name: Name, op = "", msg = "") {
		return E(name, op, msg, this)
	}
}

// CoE is a plain class so _op and the tag stay own fields; still an Error
Object.setPrototypeOf(CoE.prototype, Error.prototype)

export type E<Name extends string = string> = Error & CoE<Name>

export function E<Name extends string>(name: Name, op = "", msg = "", cause?: CauseErr): E<Name> {
	return new CoE<Name>(name, msg, op, cause)
}

export class Err extends CoE<"Err"> {
	constructor(cause?: CauseErr, procName = "", msg = "") {
		super("Err", msg, procName, cause)
	}
}

/**
 * Misuse of the invocation protocol (stepping a finished state, a marker
 * that names no suspension site). Thrown, never recorded as ERROR.
 */
export class EPrecondition extends CoE<"Precondition"> {
	constructor(op: string, msg: string) {
		super("Precondition", `resumable: ${msg}`, op)
	}
}


/**
 * Last link of a cause chain: the error recorded where the failure started,
 * or the value that was thrown there.
 */
export function rootCause(err: CoE): unknown {
	let cur: unknown = err
	while (isE(cur) && cur.cause !== undefined) {
		cur = cur.cause
	}
	return cur
}

export function isE(x: unknown): x is CoE {
	return x !== null && typeof x === "object" && ERR_TAG in x
}

type EE = CoE<string>

export function errIsNot<X, T extends Extract<X, EE>["name"]>(x: X, name: T): x is Extract<X, EE> & Exclude<X, CoE<T>> {
	return x instanceof Error && x.name !== name
}

export function errIs<X, T extends Extract<X, EE>["name"]>(x: X, name: T): x is Extract<X, CoE<T>> {
	return x instanceof Error && x.name === name
}
