import { OPERATORS, Operator } from './types.js'
import { WeightedEntry } from './random.js'
import { assertNever } from './utils.js'

export const FAMILY_NAMES = ['uniform', 'and_or', 'xor_rich', 'inverter_rich', 'nand_style'] as const
export type FamilyName = typeof FAMILY_NAMES[number]

export const isFamilyName = (name: string): name is FamilyName => FAMILY_NAMES.some((x) => x === name)

export type OperatorSelection =
	| { mode: 'uniform', operators: readonly Operator[] }
	| { mode: 'weighted', weights: readonly WeightedEntry<Operator>[] }

export type Family = {
	name: FamilyName
	tag: string // goes into gate names, alphanumeric only
	selection: OperatorSelection
	idiomProbability: number // chance of appending AND + NOT after each gate
}

export const UNIFORM_SELECTION: OperatorSelection = { mode: 'uniform', operators: OPERATORS }

const weighted = (weights: Record<Operator, number>): OperatorSelection => ({
	mode: 'weighted',
	weights: OPERATORS.map((operator) => [operator, weights[operator]] as const),
})

export const getFamily = (name: FamilyName): Family => {
	switch (name) {
		case 'uniform': return { name, tag: 'uni', selection: UNIFORM_SELECTION, idiomProbability: 0 }
		case 'and_or': return { name, tag: 'andor', selection: weighted({ AND: 4, OR: 4, XOR: 1, XNOR: 1, NOT: 1, BUF: 0 }), idiomProbability: 0 }
		case 'xor_rich': return { name, tag: 'xor', selection: weighted({ AND: 1, OR: 1, XOR: 4, XNOR: 3, NOT: 1, BUF: 0 }), idiomProbability: 0 }
		case 'inverter_rich': return { name, tag: 'inv', selection: weighted({ AND: 2, OR: 2, XOR: 1, XNOR: 1, NOT: 3, BUF: 2 }), idiomProbability: 0 }
		case 'nand_style': return { name, tag: 'nand', selection: weighted({ AND: 5, OR: 1, XOR: 0, XNOR: 0, NOT: 4, BUF: 0 }), idiomProbability: 0.3 }
		default: return assertNever(name)
	}
}
