/**
 * ============================================================================
 * SERVICE CLASSIFIER - Classification des paragraphes
 * ============================================================================
 *
 * Calcule, pour chaque paragraphe, les drapeaux utilisés par le rapport et
 * par les corrections, ainsi que les indicateurs de niveau document.
 *
 * Le résultat (Classification) est une valeur : il est passé tel quel aux
 * corrections, aucun état n'est partagé entre les services.
 *
 * @version 1.0.0
 */

import { KDP_RULES } from '../../shared/constants';
import type { KdpRules } from '../../shared/constants';
import type { Classification, ContentTree, LineSpacing, ParagraphFlags, ParagraphNode } from '../../shared/types';
import { hasVisibleText, sameLineSpacing } from '../../shared/utils';

interface SpacingTally {
	value: LineSpacing;
	count: number;
}

// ============================================================================
// RÈGLES PAR PARAGRAPHE
// ============================================================================

/**
 * Paragraphe de texte courant : texte visible, pas un titre, pas dans un
 * tableau et pas indenté par tabulation.
 */
export function isBodyText(paragraph: ParagraphNode): boolean {
	return (
		hasVisibleText(paragraph.text) &&
		paragraph.headingLevel === null &&
		!paragraph.isTitleStyle &&
		!paragraph.inTableCell &&
		!paragraph.startsWithTab
	);
}

/**
 * Le retrait de première ligne est-il suffisant ?
 */
export function hasFirstLineIndent(paragraph: ParagraphNode, rules: KdpRules = KDP_RULES): boolean {
	return paragraph.firstLineIndent !== null && paragraph.firstLineIndent >= rules.minimumIndentTwips;
}

/**
 * Interligne le plus fréquent parmi les interlignes explicites.
 *
 * L'interligne cible est exclu du décompte. En cas d'égalité, la valeur
 * rencontrée en premier dans le document l'emporte.
 *
 * @returns L'interligne majoritaire, ou null si aucun paragraphe n'en définit
 *
 * @example
 * // 1.0, 1.5, 1.0, 1.5 → 1.0 (égalité, vu en premier)
 */
export function computeSpacingMode(
	paragraphs: ParagraphNode[],
	target: LineSpacing = KDP_RULES.lineSpacing
): LineSpacing | null {
	const tallies = paragraphs.reduce<SpacingTally[]>((acc, paragraph) => {
		const spacing = paragraph.lineSpacing;
		if (spacing === null || sameLineSpacing(spacing, target)) {
			return acc;
		}

		const existing = acc.find((tally) => sameLineSpacing(tally.value, spacing));
		if (existing) {
			existing.count++;
		} else {
			acc.push({ value: spacing, count: 1 });
		}
		return acc;
	}, []);

	const winner = tallies.reduce<SpacingTally | null>(
		(best, tally) => (best === null || tally.count > best.count ? tally : best),
		null
	);

	return winner ? winner.value : null;
}

// ============================================================================
// CLASSIFICATION
// ============================================================================

/**
 * Classe tous les paragraphes d'un document.
 */
export function classifyParagraphs(tree: ContentTree, rules: KdpRules = KDP_RULES): Classification {
	const { paragraphs } = tree;
	const spacingMode = computeSpacingMode(paragraphs, rules.lineSpacing);

	const flags = paragraphs.map(
		(paragraph): ParagraphFlags => ({
			index: paragraph.index,
			tabIndented: paragraph.startsWithTab,
			missingFirstLineIndent: isBodyText(paragraph) && !hasFirstLineIndent(paragraph, rules),
			inconsistentSpacing: isInconsistentSpacing(paragraph.lineSpacing, spacingMode, rules.lineSpacing),
		})
	);

	const headings = paragraphs.filter((paragraph) => paragraph.headingLevel !== null);

	return {
		paragraphs: flags,
		spacingMode,
		hasHeadings: headings.length > 0,
		headingCount: headings.length,
		hasPageBreakBeforeHeading: headings.some((heading) => isPrecededByPageBreak(heading, paragraphs)),
		hasTableOfContents: tree.hasTableOfContents,
		imageCount: tree.stats.images,
	};
}

function isInconsistentSpacing(
	spacing: LineSpacing | null,
	mode: LineSpacing | null,
	target: LineSpacing
): boolean {
	return spacing !== null && !sameLineSpacing(spacing, target) && !sameLineSpacing(spacing, mode);
}

/**
 * Un titre est précédé d'un saut de page s'il commence par un saut
 * ou si le paragraphe précédent se termine par un saut.
 */
function isPrecededByPageBreak(heading: ParagraphNode, paragraphs: ParagraphNode[]): boolean {
	if (heading.pageBreakAtStart) {
		return true;
	}

	const previous = paragraphs[heading.index - 1];
	return previous !== undefined && previous.pageBreakAtEnd;
}
