import { bisectRight, cumsum, randomLcg } from 'd3'
import { ConfigurationError, EmptyRegistryError } from './errors.js'

/**
 * A stateful source of uniform floats in [0, 1).
 *
 * Generators never create their own source: the caller threads one stream through every call, so the
 * order in which helpers are invoked is part of the output. Each helper below consumes exactly one draw.
 */
export interface RandomStream {
	next(): number
}

export const MAX_SEED = 0xFFFFFFFF

export class SeededRandom implements RandomStream {
	private readonly source: () => number

	constructor(readonly seed: number) {
		if (!Number.isSafeInteger(seed) || seed < 0) throw new ConfigurationError(`seed must be a non-negative integer, got ${ seed }`)
		// randomLcg keeps only the low 32 bits of its seed
		if (seed > MAX_SEED) throw new ConfigurationError(`seed must be at most ${ MAX_SEED }, got ${ seed }`)
		this.source = randomLcg(seed)
	}

	next(): number {
		return this.source()
	}
}

export const randomIndex = (rng: RandomStream, size: number): number => {
	if (size <= 0) throw new EmptyRegistryError('cannot draw from an empty set')
	return Math.min(Math.floor(rng.next() * size), size - 1)
}

// inclusive on both ends
export const randomInt = (rng: RandomStream, min: number, max: number): number => {
	if (max < min) throw new ConfigurationError(`invalid range [${ min }, ${ max }]`)
	return min + randomIndex(rng, max - min + 1)
}

export const randomBool = (rng: RandomStream): boolean => rng.next() < 0.5

export const chance = (rng: RandomStream, probability: number): boolean => rng.next() < probability

export const pick = <T>(rng: RandomStream, items: readonly T[]): T => {
	const index = randomIndex(rng, items.length)
	const item = items[index]
	if (item === undefined) throw new EmptyRegistryError('cannot draw from an empty set')
	return item
}

export type WeightedEntry<T> = readonly [value: T, weight: number]

export const pickWeighted = <T>(rng: RandomStream, entries: readonly WeightedEntry<T>[]): T => {
	if (entries.some(([, weight]) => !Number.isFinite(weight) || weight < 0)) throw new ConfigurationError('weights must be finite and non-negative')
	const cumulative = cumsum(entries, ([, weight]) => weight)
	const total = cumulative.length === 0 ? 0 : cumulative[cumulative.length - 1]
	if (!(total > 0)) throw new ConfigurationError('weights must sum to a positive total')
	// first entry whose cumulative weight exceeds the target, so zero weights are skipped
	const index = Math.min(bisectRight(cumulative, rng.next() * total), entries.length - 1)
	return entries[index][0]
}
