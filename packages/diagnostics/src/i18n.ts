/**
 * Message localization.
 *
 * Resources are JSON objects whose nested keys flatten to dotted keys:
 * `{ "lexer": { "invalid_character": { "help": "..." } } }` provides
 * `lexer.invalid_character.help`. Lookups fall back to English, then to ''.
 */

import { existsSync, readFileSync } from 'node:fs'
import { basename, join } from 'node:path'
import { fileURLToPath } from 'node:url'
import { type ErrorCode, ErrorRegistry } from './error-code.ts'
import { interpolateMessage } from './interpolate.ts'
import { Message } from './message.ts'

export const Locale = {
	En: 'en',
	Ja: 'ja',
	ZhCN: 'zh-CN',
	ZhTW: 'zh-TW',
} as const

export type Locale = (typeof Locale)[keyof typeof Locale]

const LOCALES: readonly Locale[] = Object.values(Locale)

export function isLocale(value: string): value is Locale {
	return LOCALES.some((locale) => locale === value)
}

/**
 * Map a locale tag (`en_US`, `zh-Hans`, `ja_JP.UTF-8`, ...) to a supported locale.
 * Unknown tags map to English.
 */
export function parseLocale(tag: string): Locale {
	const lower = tag.trim().replace(/_/g, '-').toLowerCase()
	if (lower === 'zh' || lower.startsWith('zh-cn') || lower.startsWith('zh-hans')) return Locale.ZhCN
	if (lower.startsWith('zh-tw') || lower.startsWith('zh-hant')) return Locale.ZhTW
	if (lower === 'ja' || lower.startsWith('ja-')) return Locale.Ja
	return Locale.En
}

function flatten(value: unknown, prefix: string, out: Map<string, string>): void {
	if (typeof value === 'string') {
		if (prefix !== '') out.set(prefix, value)
		return
	}
	if (typeof value !== 'object' || value === null || Array.isArray(value)) return
	for (const [key, child] of Object.entries(value)) {
		flatten(child, prefix === '' ? key : `${prefix}.${key}`, out)
	}
}

export class Translator {
	private locale: Locale = Locale.En
	private readonly tables: Map<Locale, Map<string, string>> = new Map()

	get currentLocale(): Locale {
		return this.locale
	}

	setLocale(locale: Locale): void {
		this.locale = locale
	}

	/** Merge a JSON resource into `locale`'s table. Returns false when the JSON is malformed. */
	loadFromString(json: string, locale: Locale): boolean {
		let parsed: unknown
		try {
			parsed = JSON.parse(json)
		} catch {
			return false
		}
		const table = this.tables.get(locale) ?? new Map<string, string>()
		flatten(parsed, '', table)
		this.tables.set(locale, table)
		return true
	}

	/**
	 * Load `<dir>/<locale>.json`. The locale defaults to the file's base name.
	 * Returns false when the file is absent, unnamed for a locale, or malformed.
	 */
	loadFromFile(path: string, locale?: Locale): boolean {
		const name = basename(path, '.json')
		const target = locale ?? (isLocale(name) ? name : undefined)
		if (target === undefined || !existsSync(path)) return false
		return this.loadFromString(readFileSync(path, 'utf-8'), target)
	}

	/** Load every `<locale>.json` found in `dir`. Returns the number of files loaded. */
	loadFromDirectory(dir: string): number {
		let loaded = 0
		for (const locale of LOCALES) {
			if (this.loadFromFile(join(dir, `${locale}.json`), locale)) loaded++
		}
		return loaded
	}

	get(key: string): string {
		return this.tables.get(this.locale)?.get(key) ?? this.tables.get(Locale.En)?.get(key) ?? ''
	}

	getOr(key: string, fallback: string): string {
		const value = this.get(key)
		return value === '' ? fallback : value
	}

	/** Look up `key` and substitute `{0}`, `{1}`, ... placeholders. */
	format(key: string, ...args: (string | number)[]): string {
		return interpolateMessage(this.get(key), args)
	}

	getErrorBrief(code: ErrorCode, registry: ErrorRegistry = ErrorRegistry.global()): string {
		const entry = registry.lookup(code)
		if (entry === undefined) return ''
		return entry.explanationKey === '' ? entry.brief : this.getOr(`${entry.explanationKey}.brief`, entry.brief)
	}

	getErrorExplanation(code: ErrorCode, registry: ErrorRegistry = ErrorRegistry.global()): Message {
		const entry = registry.lookup(code)
		if (entry === undefined || entry.explanationKey === '') return new Message('')
		return new Message(this.get(`${entry.explanationKey}.explanation`))
	}
}

/**
 * Temporarily switches a translator's locale; `restore` puts the previous one back.
 */
export class TranslationScope {
	private readonly translator: Translator
	private readonly previous: Locale
	private restored = false

	constructor(translator: Translator, locale: Locale) {
		this.translator = translator
		this.previous = translator.currentLocale
		translator.setLocale(locale)
	}

	restore(): void {
		if (this.restored) return
		this.translator.setLocale(this.previous)
		this.restored = true
	}
}

/** Run `fn` with `locale` active, restoring the previous locale however `fn` exits. */
export function withLocale<T>(translator: Translator, locale: Locale, fn: () => T): T {
	const scope = new TranslationScope(translator, locale)
	try {
		return fn()
	} finally {
		scope.restore()
	}
}

// =============================================================================
// RESOURCE DISCOVERY
// =============================================================================

const BUNDLED_RESOURCES = fileURLToPath(new URL('../../../resources/i18n', import.meta.url))

/** Directories searched for `en.json`, in order. */
export function defaultSearchPaths(cwd: string = process.cwd()): string[] {
	return [
		BUNDLED_RESOURCES,
		join(cwd, 'resources/i18n'),
		join(cwd, '../resources/i18n'),
		join(cwd, '../../resources/i18n'),
	]
}

export function findResourceDirectory(searchPaths: readonly string[] = defaultSearchPaths()): string | undefined {
	return searchPaths.find((dir) => existsSync(join(dir, `${Locale.En}.json`)))
}

/**
 * Load the first resource directory found. Returns its path, or undefined when
 * none exists (lookups then return '').
 */
export function loadDefaultResources(
	translator: Translator,
	searchPaths: readonly string[] = defaultSearchPaths()
): string | undefined {
	const dir = findResourceDirectory(searchPaths)
	if (dir !== undefined) translator.loadFromDirectory(dir)
	return dir
}
