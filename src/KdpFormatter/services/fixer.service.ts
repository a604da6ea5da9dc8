/**
 * ============================================================================
 * SERVICE FIXER - Corrections automatiques
 * ============================================================================
 *
 * Applique jusqu'à trois corrections aux paragraphes signalés par la
 * classification, directement sur le DOM de word/document.xml :
 *
 * 1. removeTabs       : supprime les tabulations de début de paragraphe et
 *                       pose un retrait de première ligne
 * 2. applyIndent      : pose un retrait de première ligne de 0.5"
 * 3. normalizeSpacing : applique l'interligne 1.15
 *
 * Une nouvelle analyse du document corrigé ne signale plus rien dans ces
 * trois catégories : une deuxième passe ne modifie plus rien.
 *
 * Les paragraphes de structure inattendue (voir StructureIssue) ne sont
 * jamais modifiés ; ils sont comptés dans FixResult.skipped.
 *
 * @version 1.0.0
 */

import { KDP_RULES } from '../../shared/constants';
import type { KdpRules } from '../../shared/constants';
import type {
	Classification,
	ContentTree,
	Finding,
	FixAction,
	FixKind,
	FixResult,
	ParagraphFlags,
	ParagraphNode,
} from '../../shared/types';
import {
	collectParagraphRuns,
	elementChildren,
	ensureParagraphProperties,
	ensurePropertyElement,
	firstContentRun,
	formatLineSpacing,
	getParagraphProperties,
	pluralize,
	readFirstLineIndent,
	removeWordAttribute,
	runContentElements,
	runStartsWithTab,
	setWordAttribute,
} from '../../shared/utils';

/** Attributs de <w:ind> incompatibles avec un retrait de première ligne en twips */
const CONFLICTING_INDENT_ATTRIBUTES = ['w:hanging', 'w:firstLineChars', 'w:hangingChars'];

/** Enfants de run sans contenu, ignorés lors de la suppression des tabulations */
const SKIPPED_RUN_CHILDREN = new Set(['w:rPr', 'w:lastRenderedPageBreak']);

interface FixPass {
	kind: FixKind;
	applies: (flags: ParagraphFlags) => boolean;
	apply: (paragraph: ParagraphNode, rules: KdpRules) => number;
}

const FIX_PASSES: FixPass[] = [
	{
		kind: 'removeTabs',
		applies: (flags) => flags.tabIndented,
		apply: (paragraph, rules) => {
			const removed = removeLeadingTabs(paragraph.element);
			ensureFirstLineIndent(paragraph.element, rules);
			return removed;
		},
	},
	{
		kind: 'applyIndent',
		applies: (flags) => flags.missingFirstLineIndent,
		apply: (paragraph, rules) => {
			setFirstLineIndent(paragraph.element, rules.paragraphIndentTwips);
			return 1;
		},
	},
	{
		kind: 'normalizeSpacing',
		applies: (flags) => flags.inconsistentSpacing,
		apply: (paragraph, rules) => {
			setLineSpacing(paragraph.element, rules);
			return 1;
		},
	},
];

/** Toutes les corrections, dans leur ordre d'application */
export const FIX_KINDS: readonly FixKind[] = FIX_PASSES.map((pass) => pass.kind);

// ============================================================================
// ORCHESTRATION DES CORRECTIONS
// ============================================================================

/**
 * Applique les corrections au ContentTree (modifie le DOM en place).
 *
 * Seules les corrections listées dans kinds sont appliquées, toujours dans
 * l'ordre de FIX_KINDS ; les autres n'ont ni action ni constat.
 *
 * @param tree - Le document parsé
 * @param classification - La classification issue de l'analyse du même document
 * @param kinds - Les corrections à appliquer (défaut: toutes)
 * @returns Les actions réalisées, les paragraphes ignorés et les constats associés
 */
export function applyFixes(
	tree: ContentTree,
	classification: Classification,
	rules: KdpRules = KDP_RULES,
	kinds: readonly FixKind[] = FIX_KINDS
): FixResult {
	const skipped = new Set<number>();
	let tabsRemoved = 0;

	const passes = FIX_PASSES.filter((pass) => kinds.includes(pass.kind));
	const actions = passes.map(({ kind, applies, apply }): FixAction => {
		const paragraphIndexes: number[] = [];

		for (const flags of classification.paragraphs) {
			if (!applies(flags)) {
				continue;
			}

			const paragraph = tree.paragraphs[flags.index];
			if (!paragraph || paragraph.structureIssue !== null) {
				skipped.add(flags.index);
				continue;
			}

			const changes = apply(paragraph, rules);
			if (kind === 'removeTabs') {
				tabsRemoved += changes;
			}
			paragraphIndexes.push(flags.index);
		}

		return { kind, count: paragraphIndexes.length, paragraphIndexes };
	});

	const skippedIndexes = [...skipped].sort((a, b) => a - b);

	return {
		actions,
		skipped: skippedIndexes,
		findings: buildFixFindings(actions, tabsRemoved, skippedIndexes.length, rules),
		changed: actions.some((action) => action.count > 0),
	};
}

function buildFixFindings(
	actions: FixAction[],
	tabsRemoved: number,
	skippedCount: number,
	rules: KdpRules
): Finding[] {
	const findings: Finding[] = actions.map((action): Finding => {
		switch (action.kind) {
			case 'removeTabs':
				return {
					category: 'fixes',
					severity: 'success',
					message: `Removed ${pluralize(tabsRemoved, 'tab character')}`,
					count: action.count,
					detail: `Tabs removed from ${pluralize(action.count, 'paragraph')}`,
				};
			case 'applyIndent':
				return {
					category: 'fixes',
					severity: 'success',
					message: `Applied first-line indentation to ${pluralize(action.count, 'paragraph')}`,
					count: action.count,
				};
			case 'normalizeSpacing':
				return {
					category: 'fixes',
					severity: 'success',
					message: `Applied consistent line spacing to ${pluralize(action.count, 'paragraph')}`,
					count: action.count,
					detail: `Line spacing set to ${formatLineSpacing(rules.lineSpacing)}`,
				};
		}
	});

	if (skippedCount > 0) {
		findings.push({
			category: 'fixes',
			severity: 'warning',
			message: `Skipped ${pluralize(skippedCount, 'paragraph')} due to unexpected structure`,
			count: skippedCount,
			remediation: 'Review these paragraphs manually in Word',
		});
	}

	return findings;
}

// ============================================================================
// TABULATIONS
// ============================================================================

/**
 * Supprime les tabulations en début de paragraphe.
 *
 * Les <w:tab/> de tête et les "\t" de tête des <w:t> sont retirés ; les <w:t>
 * devenus vides et les runs sans contenu sont supprimés. L'opération se
 * répète sur le run suivant tant que le paragraphe commence par une tabulation.
 *
 * @returns Le nombre de tabulations supprimées
 */
export function removeLeadingTabs(paragraph: Element): number {
	let removed = 0;

	for (;;) {
		const run = firstContentRun(collectParagraphRuns(paragraph));
		if (!run || !runStartsWithTab(run)) {
			return removed;
		}

		removed += stripLeadingTabsFromRun(run);

		if (runContentElements(run).length === 0) {
			run.parentNode?.removeChild(run);
		}
	}
}

function stripLeadingTabsFromRun(run: Element): number {
	let removed = 0;

	for (const child of elementChildren(run)) {
		if (SKIPPED_RUN_CHILDREN.has(child.nodeName)) {
			continue;
		}

		if (child.nodeName === 'w:tab') {
			run.removeChild(child);
			removed++;
			continue;
		}

		if (child.nodeName !== 'w:t') {
			break;
		}

		const text = child.textContent ?? '';
		const stripped = text.replace(/^\t+/, '');
		removed += text.length - stripped.length;

		if (stripped === '') {
			run.removeChild(child);
			continue;
		}

		if (stripped !== text) {
			child.textContent = stripped;
		}
		break;
	}

	return removed;
}

// ============================================================================
// PROPRIÉTÉS DE PARAGRAPHE
// ============================================================================

/**
 * Pose le retrait cible si le retrait actuel est absent ou insuffisant.
 */
function ensureFirstLineIndent(paragraph: Element, rules: KdpRules): void {
	const current = readFirstLineIndent(getParagraphProperties(paragraph));

	if (current === null || current < rules.minimumIndentTwips) {
		setFirstLineIndent(paragraph, rules.paragraphIndentTwips);
	}
}

/**
 * Définit <w:ind w:firstLine="..."/> et retire les attributs concurrents.
 */
export function setFirstLineIndent(paragraph: Element, twips: number): void {
	const ind = ensurePropertyElement(ensureParagraphProperties(paragraph), 'w:ind');

	for (const attribute of CONFLICTING_INDENT_ATTRIBUTES) {
		removeWordAttribute(ind, attribute);
	}
	setWordAttribute(ind, 'w:firstLine', String(twips));
}

/**
 * Définit l'interligne cible. Les autres attributs de <w:spacing>
 * (before, after...) sont conservés.
 */
export function setLineSpacing(paragraph: Element, rules: KdpRules): void {
	const spacing = ensurePropertyElement(ensureParagraphProperties(paragraph), 'w:spacing');

	setWordAttribute(spacing, 'w:line', String(rules.lineSpacing.line));
	setWordAttribute(spacing, 'w:lineRule', rules.lineSpacing.rule);
}
