/**
 * ============================================================================
 * DÉTECTEUR DE STYLES - Titres et structure du document
 * ============================================================================
 *
 * Ce fichier contient les utilitaires pour détecter les titres d'un document
 * DOCX à partir des marqueurs déjà présents dans le XML. Aucun titre n'est
 * deviné à partir du texte.
 *
 * POUR LES DÉVELOPPEURS JUNIORS :
 * - Word utilise des styles prédéfinis (Heading1, Heading2, etc.)
 * - Ces styles sont stockés dans <w:pStyle w:val="...">
 * - Un niveau de plan <w:outlineLvl w:val="0"/> fait aussi d'un paragraphe
 *   un titre de niveau 1 (val + 1)
 * - Les styles Title / Subtitle ne sont pas des niveaux de titre
 *
 * @version 1.0.0
 */

import { findChild, getIntAttribute } from './xml.utils';

// ============================================================================
// DÉTECTION DES TITRES
// ============================================================================

/**
 * Motif des styles de titre numérotés, anglais, français et allemands.
 * Le niveau n'est pas borné : "Heading12" est un titre de niveau 12.
 */
const HEADING_STYLE_PATTERN = /^(?:heading|titre|überschrift)[\s\-_]?(\d+)$/i;

/**
 * Styles de titre de document (page de titre), sans niveau.
 */
const TITLE_STYLES = new Set(['title', 'subtitle', 'titre', 'sous-titre', 'titel', 'untertitel']);

/** Niveau de plan maximal reconnu par Word (0..8) */
const MAX_OUTLINE_LEVEL = 8;

/**
 * Détecte le niveau de titre depuis le style Word.
 *
 * @param styleId - ID du style Word (ex: "Heading1", "Titre2")
 * @returns Niveau de titre (1..N) ou null si pas un titre
 *
 * @example
 * detectHeadingFromStyle('Heading2'); // 2
 * detectHeadingFromStyle('heading 3'); // 3
 * detectHeadingFromStyle('Normal');   // null
 */
export function detectHeadingFromStyle(styleId: string): number | null {
	const match = styleId.trim().match(HEADING_STYLE_PATTERN);
	if (!match) {
		return null;
	}

	const level = parseInt(match[1], 10);
	return level >= 1 ? level : null;
}

/**
 * Vérifie si un style est un style de titre de document (Title, Subtitle).
 */
export function isTitleStyle(styleId: string | null): boolean {
	return styleId !== null && TITLE_STYLES.has(styleId.trim().toLowerCase());
}

/**
 * Extrait le style ID d'un paragraphe depuis ses propriétés.
 *
 * @returns ID du style ou null
 */
export function extractStyleId(pPr: Element | null): string | null {
	const pStyle = pPr ? findChild(pPr, 'w:pStyle') : null;
	return pStyle ? pStyle.getAttribute('w:val') || null : null;
}

/**
 * Détecte le niveau de titre d'un paragraphe : style d'abord, puis niveau de plan.
 *
 * @param pPr - Propriétés du paragraphe (<w:pPr>) ou null
 * @returns Niveau de titre (1..N) ou null
 */
export function detectHeadingLevel(pPr: Element | null): number | null {
	const styleId = extractStyleId(pPr);
	if (styleId) {
		const fromStyle = detectHeadingFromStyle(styleId);
		if (fromStyle !== null) {
			return fromStyle;
		}
	}

	const outline = pPr ? findChild(pPr, 'w:outlineLvl') : null;
	const outlineLevel = outline ? getIntAttribute(outline, 'w:val') : null;
	if (outlineLevel !== null && outlineLevel >= 0 && outlineLevel <= MAX_OUTLINE_LEVEL) {
		return outlineLevel + 1;
	}

	return null;
}

// ============================================================================
// TABLE DES MATIÈRES
// ============================================================================

/**
 * Vérifie si un code de champ Word est un champ de table des matières.
 *
 * @example
 * isTocFieldCode(' TOC \\o "1-3" \\h \\z \\u '); // true
 * isTocFieldCode(' PAGE ');                     // false
 */
export function isTocFieldCode(instruction: string): boolean {
	return /^TOC\b/i.test(instruction.trim());
}
