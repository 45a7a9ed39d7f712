import sqlite3 from 'sqlite3'
import { CorpusEntry, CorpusFormat } from './corpus.js'
import { FamilyName, isFamilyName } from './families.js'
import { logTimed } from './utils.js'

export const MANIFEST_FILE = 'manifest.sqlite'

export type ManifestRow = {
	path: string
	format: CorpusFormat
	family: FamilyName | null
	inputs: number
	gates: number
	coneInputs: number
	deadGates: number
}

const run = (db: sqlite3.Database, sql: string, params: unknown[] = []) => {
	return new Promise<void>((resolve, reject) => {
		db.run(sql, params, (err: Error | null) => {
			if (err) {
				reject(err)
			} else {
				resolve()
			}
		})
	})
}

export const openManifest = async (filename: string) => {
	const db = await new Promise<sqlite3.Database>((resolve, reject) => {
		const database = new sqlite3.Database(filename, (err: Error | null) => {
			if (err) {
				reject(err)
			} else {
				resolve(database)
			}
		})
	})
	await run(db, `
		CREATE TABLE IF NOT EXISTS Instances (
			path TEXT PRIMARY KEY,
			format TEXT NOT NULL,
			family TEXT,
			inputs INTEGER NOT NULL,
			gates INTEGER NOT NULL,
			cone_inputs INTEGER NOT NULL,
			dead_gates INTEGER NOT NULL
		);
	`)
	return db
}

export const closeManifest = (db: sqlite3.Database) => {
	return new Promise<void>((resolve, reject) => {
		db.close((err: Error | null) => {
			if (err) {
				reject(err)
			} else {
				resolve()
			}
		})
	})
}

export const toManifestRow = (entry: CorpusEntry): ManifestRow => ({
	path: entry.path,
	format: entry.format,
	family: entry.family,
	inputs: entry.inputs,
	gates: entry.gates,
	coneInputs: entry.coneInputs,
	deadGates: entry.deadGates,
})

export const storeManifest = async (db: sqlite3.Database, rows: ManifestRow[]) => {
	logTimed(`storing ${ rows.length } manifest rows`)
	await run(db, 'BEGIN TRANSACTION')
	try {
		for (const row of rows) {
			await run(db, 'INSERT INTO Instances (path, format, family, inputs, gates, cone_inputs, dead_gates) VALUES (?, ?, ?, ?, ?, ?, ?)', [
				row.path, row.format, row.family, row.inputs, row.gates, row.coneInputs, row.deadGates
			])
		}
		await run(db, 'COMMIT')
	} catch (err: unknown) {
		await run(db, 'ROLLBACK')
		throw err
	}
}

const isRecord = (value: unknown): value is Record<string, unknown> => typeof value === 'object' && value !== null

const parseFormat = (value: unknown, path: string): CorpusFormat => {
	if (value === 'bench' || value === 'aag') return value
	throw new Error(`manifest row ${ path } has invalid format`)
}

const parseFamily = (value: unknown, path: string): FamilyName | null => {
	if (value === null) return null
	if (typeof value === 'string' && isFamilyName(value)) return value
	throw new Error(`manifest row ${ path } has invalid family`)
}

const parseCount = (value: unknown, path: string): number => {
	if (typeof value === 'number') return value
	throw new Error(`manifest row ${ path } has invalid counts`)
}

const parseRow = (value: unknown): ManifestRow => {
	if (!isRecord(value)) throw new Error('manifest row is not an object')
	const path = value.path
	if (typeof path !== 'string') throw new Error('manifest row has no path')
	return {
		path,
		format: parseFormat(value.format, path),
		family: parseFamily(value.family, path),
		inputs: parseCount(value.inputs, path),
		gates: parseCount(value.gates, path),
		coneInputs: parseCount(value.cone_inputs, path),
		deadGates: parseCount(value.dead_gates, path),
	}
}

export const readManifest = (db: sqlite3.Database) => {
	return new Promise<ManifestRow[]>((resolve, reject) => {
		db.all('SELECT * FROM Instances ORDER BY path', [], (err: Error | null, rows: unknown[]) => {
			if (err) {
				reject(err)
				return
			}
			try {
				resolve(rows.map(parseRow))
			} catch (parseError: unknown) {
				reject(parseError)
			}
		})
	})
}
