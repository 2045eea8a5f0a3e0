export {
	COMPLETE,
	ERROR,
	SCHEDULED,
	WAITING,
	YIELDED,
	Result,
	propagateOrContinue,
	isTerminal,
	isSuspended,
	type Propagating,
	type Terminal,
	type Suspended,
} from "./result.mjs"
export { START, DONE, FAILED, declare, init, isTerminated, type State, type StateHead, type Decl } from "./state.mjs"
export { Proc, invoke, resume, type Entry, type Process } from "./process.mjs"
export { Co, define, type Stmt, type Extern } from "./body.mjs"
export { CoE, E, Err, EPrecondition, isE, errIs, errIsNot, rootCause, ERR_TAG } from "./errors.mjs"
