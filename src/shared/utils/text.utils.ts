/**
 * ============================================================================
 * UTILITAIRES TEXTE - Manipulation et nettoyage de chaînes
 * ============================================================================
 *
 * Ce module contient les fonctions utilitaires pour manipuler le texte
 * extrait des documents Word.
 *
 * PROBLÈMES COURANTS RÉSOLUS :
 * - Les espaces insécables (non-breaking spaces) de Word
 * - Les caractères spéciaux de la Private Use Area (puces, symboles)
 * - Les caractères de contrôle invisibles (dont les tabulations)
 *
 * @version 1.0.0
 */

// ============================================================================
// NORMALISATION DU TEXTE
// ============================================================================

/**
 * Normalise le texte en supprimant les caractères spéciaux Word.
 *
 * CARACTÈRES SUPPRIMÉS OU REMPLACÉS :
 * - Private Use Area (U+E000-U+F8FF) : puces personnalisées, symboles Word
 * - Caractères de contrôle (U+0000-U+001F) : tabulations, sauts de ligne
 * - Espaces insécables (U+00A0) : remplacés par des espaces normaux
 * - Espaces multiples : réduits à un seul espace
 *
 * @example
 * normalizeText('\tIl était  une fois');  // "Il était une fois"
 */
export function normalizeText(text: string): string {
	return text
		.replace(/[\uE000-\uF8FF]/g, '')
		.replace(/[\u0000-\u001F]/g, ' ')
		.replace(/\u00A0/g, ' ')
		.replace(/\s+/g, ' ')
		.trim();
}

/**
 * Vérifie si un texte contient au moins un caractère visible.
 */
export function hasVisibleText(text: string): boolean {
	return normalizeText(text).length > 0;
}

// ============================================================================
// COMPTAGE
// ============================================================================

/**
 * Compte les mots dans un texte.
 *
 * @example
 * countWords('  Il était   une fois '); // 4
 */
export function countWords(text: string): number {
	const normalized = normalizeText(text);
	return normalized ? normalized.split(' ').length : 0;
}

/**
 * Accorde un nom avec un nombre ("1 paragraph", "3 paragraphs").
 */
export function pluralize(count: number, singular: string, plural: string = `${singular}s`): string {
	return `${count} ${count === 1 ? singular : plural}`;
}
