#!/usr/bin/env node
import * as fs from 'fs'
import { join } from 'path'
import { USAGE, parseCliArgs } from './config.js'
import { generateCorpus, verifyCorpus } from './corpus.js'
import { ConfigurationError } from './errors.js'
import { MANIFEST_FILE, closeManifest, openManifest, storeManifest, toManifestRow } from './manifest.js'
import { SeededRandom } from './random.js'
import { logTimed } from './utils.js'

const run = async (argv: string[]) => {
	const options = parseCliArgs(argv)
	const { outDir } = options.corpus
	if (options.force) fs.rmSync(outDir, { recursive: true, force: true })
	logTimed(`Started generating corpus ${ outDir } with seed ${ options.seed }`)
	const result = generateCorpus(new SeededRandom(options.seed), options.corpus)
	if (options.verify) verifyCorpus(outDir, result.entries)
	if (options.manifest) {
		const db = await openManifest(join(outDir, MANIFEST_FILE))
		try {
			await storeManifest(db, result.entries.map(toManifestRow))
		} finally {
			await closeManifest(db)
		}
	}
	console.log(`generated bench=${ result.flattened.length } aag=${ result.entries.filter((x) => x.format === 'aag').length } seed=${ options.seed }`)
	console.log(`subset ${ options.corpus.subset.dirName }=${ result.subset.length }`)
}

run(process.argv.slice(2)).catch((error: unknown) => {
	console.error(error)
	if (error instanceof ConfigurationError) console.error(USAGE)
	process.exit(1)
})
