import { RandomStream } from './random.js'

// Replays fixed draws so tests can pin every choice the generators make
export class ScriptedRandom implements RandomStream {
	private cursor = 0

	constructor(private readonly values: readonly number[]) {}

	next(): number {
		if (this.cursor >= this.values.length) throw new Error(`scripted random exhausted after ${ this.values.length } draws`)
		return this.values[this.cursor++]
	}

	get remaining() {
		return this.values.length - this.cursor
	}
}

// a draw that lands in the middle of bucket k out of n
export const slot = (k: number, n: number) => (k + 0.5) / n
