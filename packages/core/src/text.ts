/**
 * @title Text Lookup
 * @description Translation hook for display text.
 *
 * Labels, plurals, descriptions and validation messages are stored as keys
 * and passed through a translator each time they are read.
 *
 * @module text
 */

/**
 * Resolve a text key to display text.
 */
export type Translator = (key: string) => string;

/**
 * Translator that returns the key unchanged.
 */
export const identityTranslator: Translator = (key) => key;

/**
 * Translate an optional key, keeping absent values absent.
 */
export function translateOptional(gettext: Translator, key: string | undefined): string | undefined {
	return key === undefined ? undefined : gettext(key);
}
