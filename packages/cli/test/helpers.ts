import { mkdtemp, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'

export class StringSink {
	text = ''

	write(chunk: string): boolean {
		this.text += chunk
		return true
	}
}

export class TempDir {
	private constructor(readonly path: string) {}

	static async create(): Promise<TempDir> {
		return new TempDir(await mkdtemp(join(tmpdir(), 'corvid-')))
	}

	async file(name: string, content: string): Promise<string> {
		const path = join(this.path, name)
		await writeFile(path, content)
		return path
	}

	resolve(name: string): string {
		return join(this.path, name)
	}

	async remove(): Promise<void> {
		await rm(this.path, { force: true, recursive: true })
	}
}
