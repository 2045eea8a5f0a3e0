import { YIELDED, declare, define, init, invoke } from "../source/index.mjs"

/* Counts from 1 to 255, handing back each value with a yield */

const Generator = declare("generator", { i: 0 })

export const generator = define(Generator, co => [
	co.run(g => { g.i = 0 }),
	co.loop(g => g.i !== 255, [
		co.run(g => { g.i++ }),
		co.yield(),
	]),
])

const g = init(Generator)

while (invoke(generator, g) === YIELDED) {
	console.log(`Yielded: ${g.i}`)
}
