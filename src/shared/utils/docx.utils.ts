/**
 * ============================================================================
 * UTILITAIRES DOCX - Propriétés de paragraphe Word
 * ============================================================================
 *
 * Ce module contient les fonctions de haut niveau pour lire et écrire les
 * propriétés de paragraphe (<w:pPr>) : retrait, interligne, saut de page.
 * Il s'appuie sur xml.utils.
 *
 * UNITÉS WORD (pour les développeurs juniors) :
 * ----------------------------------------------
 * - Retraits (<w:ind>) : en twips, 1440 twips = 1 pouce
 * - Interligne (<w:spacing w:line>) avec w:lineRule="auto" : en 240èmes
 *   de ligne, donc 240 = simple, 276 = 1.15, 480 = double
 * - Avec w:lineRule="exact" ou "atLeast" : w:line est en twips
 *
 * @version 1.0.0
 */

import { LINE_UNITS_PER_LINE, TWIPS_PER_INCH } from '../constants';
import type { LineRule, LineSpacing } from '../types';
import {
	createWordElement,
	elementChildren,
	findChild,
	findChildren,
	getAttribute,
	getIntAttribute,
	walkElements,
} from './xml.utils';

// ============================================================================
// CONVERSIONS D'UNITÉS
// ============================================================================

/**
 * Convertit des twips en pouces.
 *
 * @example
 * twipsToInches(720); // 0.5
 */
export function twipsToInches(twips: number): number {
	return twips / TWIPS_PER_INCH;
}

/**
 * Formate un interligne pour l'affichage.
 *
 * @example
 * formatLineSpacing({ rule: 'auto', line: 276 });  // "1.15"
 * formatLineSpacing({ rule: 'exact', line: 240 }); // "exactly 12pt"
 */
export function formatLineSpacing(spacing: LineSpacing): string {
	if (spacing.rule === 'auto') {
		return String(Math.round((spacing.line / LINE_UNITS_PER_LINE) * 100) / 100);
	}

	const points = Math.round((spacing.line / 20) * 10) / 10;
	return spacing.rule === 'exact' ? `exactly ${points}pt` : `at least ${points}pt`;
}

/**
 * Compare deux interlignes.
 */
export function sameLineSpacing(a: LineSpacing | null, b: LineSpacing | null): boolean {
	if (a === null || b === null) {
		return a === b;
	}
	return a.rule === b.rule && a.line === b.line;
}

// ============================================================================
// LECTURE DES PROPRIÉTÉS
// ============================================================================

/**
 * Retourne le <w:pPr> d'un paragraphe, ou null.
 */
export function getParagraphProperties(paragraph: Element): Element | null {
	return findChild(paragraph, 'w:pPr');
}

/**
 * Lit le retrait de première ligne en twips.
 *
 * <w:ind w:hanging="360"/> est un retrait suspendu : il est retourné en négatif.
 *
 * @returns Le retrait en twips, ou null si aucun retrait de première ligne n'est défini
 */
export function readFirstLineIndent(pPr: Element | null): number | null {
	const ind = pPr ? findChild(pPr, 'w:ind') : null;
	if (!ind) {
		return null;
	}

	const hanging = getIntAttribute(ind, 'w:hanging');
	if (hanging !== null && hanging > 0) {
		return -hanging;
	}

	return getIntAttribute(ind, 'w:firstLine');
}

/**
 * Lit l'interligne explicite d'un paragraphe.
 *
 * @returns L'interligne, ou null si w:line est absent (interligne par défaut)
 */
export function readLineSpacing(pPr: Element | null): LineSpacing | null {
	const spacing = pPr ? findChild(pPr, 'w:spacing') : null;
	if (!spacing) {
		return null;
	}

	const line = getIntAttribute(spacing, 'w:line');
	if (line === null) {
		return null;
	}

	return { rule: parseLineRule(getAttribute(spacing, 'w:lineRule')), line };
}

function parseLineRule(value: string | null): LineRule {
	if (value === 'exact' || value === 'atLeast') {
		return value;
	}
	return 'auto';
}

// ============================================================================
// ÉCRITURE DES PROPRIÉTÉS
// ============================================================================

/**
 * Ordre des enfants de <w:pPr> imposé par le schéma (CT_PPr).
 *
 * Word refuse parfois d'ouvrir un document dont les propriétés ne respectent
 * pas cet ordre : les nouveaux éléments sont donc insérés à leur place.
 */
const PPR_CHILD_ORDER = [
	'w:pStyle',
	'w:keepNext',
	'w:keepLines',
	'w:pageBreakBefore',
	'w:framePr',
	'w:widowControl',
	'w:numPr',
	'w:suppressLineNumbers',
	'w:pBdr',
	'w:shd',
	'w:tabs',
	'w:suppressAutoHyphens',
	'w:kinsoku',
	'w:wordWrap',
	'w:overflowPunct',
	'w:topLinePunct',
	'w:autoSpaceDE',
	'w:autoSpaceDN',
	'w:bidi',
	'w:adjustRightInd',
	'w:snapToGrid',
	'w:spacing',
	'w:ind',
	'w:contextualSpacing',
	'w:mirrorIndents',
	'w:suppressOverlap',
	'w:jc',
	'w:textDirection',
	'w:textAlignment',
	'w:textboxTightWrap',
	'w:outlineLvl',
	'w:divId',
	'w:cnfStyle',
	'w:rPr',
	'w:sectPr',
	'w:pPrChange',
];

/**
 * Retourne le <w:pPr> d'un paragraphe, en le créant comme premier enfant si besoin.
 */
export function ensureParagraphProperties(paragraph: Element): Element {
	const existing = getParagraphProperties(paragraph);
	if (existing) {
		return existing;
	}

	const pPr = createWordElement(paragraph, 'w:pPr');
	paragraph.insertBefore(pPr, elementChildren(paragraph)[0] ?? null);
	return pPr;
}

/**
 * Retourne l'enfant de <w:pPr> portant ce nom, en le créant à sa place
 * dans l'ordre du schéma si besoin.
 *
 * @example
 * const ind = ensurePropertyElement(pPr, 'w:ind');
 */
export function ensurePropertyElement(pPr: Element, name: string): Element {
	const existing = findChild(pPr, name);
	if (existing) {
		return existing;
	}

	const element = createWordElement(pPr, name);
	const rank = PPR_CHILD_ORDER.indexOf(name);
	const next = elementChildren(pPr).find((child) => {
		const childRank = PPR_CHILD_ORDER.indexOf(child.nodeName);
		return childRank > rank;
	});

	pPr.insertBefore(element, next ?? null);
	return element;
}

/**
 * Compte les enfants de <w:pPr> portant ce nom (détection des doublons).
 */
export function countPropertyElements(pPr: Element, name: string): number {
	return findChildren(pPr, name).length;
}

// ============================================================================
// RUNS
// ============================================================================

/**
 * Conteneurs inline dans lesquels un paragraphe peut placer ses runs
 * (liens, révisions, champs simples, balises, contrôles de contenu, sens du texte).
 */
const INLINE_RUN_CONTAINERS = new Set([
	'w:hyperlink',
	'w:ins',
	'w:moveTo',
	'w:smartTag',
	'w:fldSimple',
	'w:customXml',
	'w:sdt',
	'w:sdtContent',
	'w:dir',
	'w:bdo',
]);

/**
 * Enfants d'un run qui ne portent aucun contenu visible.
 */
const NON_CONTENT_RUN_CHILDREN = new Set(['w:rPr', 'w:lastRenderedPageBreak']);

/**
 * Retourne les runs d'un paragraphe dans l'ordre du document.
 *
 * Les runs directs et ceux des conteneurs inline (w:hyperlink, w:ins...) sont
 * inclus ; les runs des paragraphes imbriqués (zones de texte) ne le sont pas.
 */
export function collectParagraphRuns(paragraph: Element): Element[] {
	const runs: Element[] = [];

	walkElements(paragraph, (element) => {
		if (element.nodeName === 'w:r') {
			runs.push(element);
			return false;
		}
		return INLINE_RUN_CONTAINERS.has(element.nodeName);
	});

	return runs;
}

/**
 * Retourne les enfants "contenu" d'un run (texte, tabulation, saut, dessin...).
 *
 * Un <w:t> vide n'est pas un contenu.
 */
export function runContentElements(run: Element): Element[] {
	return elementChildren(run).filter((child) => {
		if (NON_CONTENT_RUN_CHILDREN.has(child.nodeName)) {
			return false;
		}
		if (child.nodeName === 'w:t') {
			return (child.textContent ?? '') !== '';
		}
		return true;
	});
}

/**
 * Vérifie si le premier contenu d'un run est une tabulation :
 * un élément <w:tab/> ou un <w:t> qui commence par "\t".
 */
export function runStartsWithTab(run: Element): boolean {
	const first = runContentElements(run)[0];
	if (!first) {
		return false;
	}

	if (first.nodeName === 'w:tab') {
		return true;
	}

	return first.nodeName === 'w:t' && (first.textContent ?? '').startsWith('\t');
}

/**
 * Retourne le premier run qui porte un contenu, ou null.
 */
export function firstContentRun(runs: Element[]): Element | null {
	return runs.find((run) => runContentElements(run).length > 0) ?? null;
}

/**
 * Texte d'un run : les <w:t> concaténés, chaque <w:tab/> valant "\t".
 */
export function runText(run: Element): string {
	return elementChildren(run)
		.map((child) => {
			if (child.nodeName === 'w:t') {
				return child.textContent ?? '';
			}
			return child.nodeName === 'w:tab' ? '\t' : '';
		})
		.join('');
}
