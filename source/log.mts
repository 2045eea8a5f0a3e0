import createDebug from "debug"

// enable with DEBUG=resumable:*
export const log = createDebug("resumable")

export const invokeLog = log.extend("invoke")
export const bodyLog = log.extend("body")
