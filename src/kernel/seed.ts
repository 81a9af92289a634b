import { existsSync } from 'fs'
import { readFile } from 'fs/promises'
import { dirname, join } from 'path'

// Same answer from src/ under ts-jest and from dist/src/ after a build
function findPackageRoot(start: string): string {
	let dir = start
	while (!existsSync(join(dir, 'package.json'))) {
		const parent = dirname(dir)
		if (parent === dir) throw new Error(`No package.json found above ${start}`)
		dir = parent
	}
	return dir
}

export const SEED_PATH = join(findPackageRoot(__dirname), 'seed', 'duet.ts')

/** The bundled initial document, written when the configured document does not exist yet. */
export function readSeed(): Promise<string> {
	return readFile(SEED_PATH, 'utf-8')
}
