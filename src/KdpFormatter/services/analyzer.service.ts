/**
 * ============================================================================
 * SERVICE ANALYZER - Vérifications et rapport
 * ============================================================================
 *
 * Transforme une Classification en constats (Finding) et les ordonne :
 * critical, puis warning, puis info, chacun dans l'ordre des vérifications,
 * puis un constat "success" pour chaque vérification sans problème.
 *
 * ORDRE DES VÉRIFICATIONS :
 * -------------------------
 * 1. tabs            (critical)
 * 2. indentation     (warning)
 * 3. headings        (critical)
 * 4. spacing         (warning)
 * 5. pageBreaks      (warning)
 * 6. tableOfContents (warning)
 * 7. images          (info)
 *
 * @version 1.0.0
 */

import { KDP_RULES } from '../../shared/constants';
import type { KdpRules } from '../../shared/constants';
import type {
	Classification,
	ContentTree,
	DocumentStats,
	Finding,
	FindingCategory,
	Report,
	Severity,
} from '../../shared/types';
import { formatLineSpacing, pluralize, twipsToInches } from '../../shared/utils';
import { classifyParagraphs } from './paragraph-classifier.service';

/**
 * Résultat d'une vérification : un problème, ou le message de succès.
 */
type CheckOutcome = { problem: Finding } | { success: string };

type Check = (classification: Classification, rules: KdpRules) => CheckOutcome;

const SEVERITY_ORDER: Record<Severity, number> = {
	critical: 0,
	warning: 1,
	info: 2,
	success: 3,
};

// ============================================================================
// VÉRIFICATIONS
// ============================================================================

const CHECKS: Array<{ category: FindingCategory; run: Check }> = [
	{
		category: 'tabs',
		run: (classification) => {
			const count = classification.paragraphs.filter((flags) => flags.tabIndented).length;
			if (count === 0) {
				return { success: 'No tab indentation' };
			}
			return {
				problem: {
					category: 'tabs',
					severity: 'critical',
					message: `Found ${pluralize(count, 'paragraph')} using TAB indentation`,
					count,
					detail: 'Tab characters are lost or misplaced when the book is converted to eBook formats',
					remediation: 'Replace leading tabs with a first-line indent (run with --fix)',
				},
			};
		},
	},
	{
		category: 'indentation',
		run: (classification, rules) => {
			const count = classification.paragraphs.filter((flags) => flags.missingFirstLineIndent).length;
			if (count === 0) {
				return { success: 'First-line indentation is consistent' };
			}
			return {
				problem: {
					category: 'indentation',
					severity: 'warning',
					message: `${pluralize(count, 'paragraph')} missing first-line indentation`,
					count,
					detail: `Body paragraphs should start with a ${formatInches(rules.paragraphIndentTwips)} first-line indent`,
					remediation: `Apply a ${formatInches(rules.paragraphIndentTwips)} first-line indent (run with --fix)`,
				},
			};
		},
	},
	{
		category: 'headings',
		run: (classification) => {
			if (classification.hasHeadings) {
				return { success: `Found ${pluralize(classification.headingCount, 'heading paragraph')}` };
			}
			return {
				problem: {
					category: 'headings',
					severity: 'critical',
					message: 'No heading styles found',
					count: 0,
					detail: 'Chapter titles need a heading style to build the eBook navigation',
					remediation: 'Apply the Heading 1 style to every chapter title',
				},
			};
		},
	},
	{
		category: 'spacing',
		run: (classification, rules) => {
			const count = classification.paragraphs.filter((flags) => flags.inconsistentSpacing).length;
			if (count === 0) {
				return { success: 'Line spacing is consistent' };
			}
			const mode = classification.spacingMode;
			return {
				problem: {
					category: 'spacing',
					severity: 'warning',
					message: `${pluralize(count, 'paragraph')} with inconsistent line spacing`,
					count,
					detail: mode
						? `Most paragraphs use ${formatLineSpacing(mode)} line spacing`
						: 'Paragraphs use different line spacing values',
					remediation: `Apply ${formatLineSpacing(rules.lineSpacing)} line spacing (run with --fix)`,
				},
			};
		},
	},
	{
		category: 'pageBreaks',
		run: (classification) => {
			if (classification.hasPageBreakBeforeHeading) {
				return { success: 'Page breaks precede chapter headings' };
			}
			return {
				problem: {
					category: 'pageBreaks',
					severity: 'warning',
					message: 'No page breaks before chapter headings',
					detail: 'Each chapter should start on a new page',
					remediation: 'Insert a page break before each chapter heading',
				},
			};
		},
	},
	{
		category: 'tableOfContents',
		run: (classification) => {
			if (classification.hasTableOfContents) {
				return { success: 'Table of contents present' };
			}
			return {
				problem: {
					category: 'tableOfContents',
					severity: 'warning',
					message: 'No table of contents detected',
					detail: 'Readers navigate eBooks through the table of contents',
					remediation: 'Insert an automatic table of contents built from heading styles',
				},
			};
		},
	},
	{
		category: 'images',
		run: (classification, rules) => {
			const count = classification.imageCount;
			if (count === 0) {
				return { success: 'No embedded images to check' };
			}
			return {
				problem: {
					category: 'images',
					severity: 'info',
					message: `Found ${pluralize(count, 'image')}`,
					count,
					detail: 'Image resolution is not inspected',
					remediation: `Check manually that every image is at least ${rules.imageDpi} DPI`,
				},
			};
		},
	},
];

// ============================================================================
// RAPPORT
// ============================================================================

/**
 * Analyse un ContentTree : classification puis rapport.
 */
export function analyzeContentTree(
	tree: ContentTree,
	rules: KdpRules = KDP_RULES
): { classification: Classification; report: Report } {
	const classification = classifyParagraphs(tree, rules);
	return { classification, report: buildReport(classification, tree.stats, rules) };
}

/**
 * Construit le rapport ordonné à partir d'une classification.
 */
export function buildReport(
	classification: Classification,
	stats: DocumentStats,
	rules: KdpRules = KDP_RULES
): Report {
	const findings = CHECKS.map(({ category, run }): Finding => {
		const outcome = run(classification, rules);
		return 'problem' in outcome ? outcome.problem : { category, severity: 'success', message: outcome.success };
	});

	return freezeReport(orderFindings(findings), stats);
}

/**
 * Retourne un nouveau rapport avec des constats ajoutés à la fin.
 */
export function appendFindings(report: Report, findings: readonly Finding[]): Report {
	return freezeReport([...report.findings, ...findings], report.stats);
}

/**
 * Trie les constats par gravité. Le tri est stable : l'ordre des
 * vérifications est conservé à gravité égale.
 */
export function orderFindings(findings: readonly Finding[]): Finding[] {
	return [...findings].sort((a, b) => SEVERITY_ORDER[a.severity] - SEVERITY_ORDER[b.severity]);
}

/**
 * Compte les constats d'une gravité donnée.
 */
export function countBySeverity(report: Report, severity: Severity): number {
	return report.findings.filter((finding) => finding.severity === severity).length;
}

function freezeReport(findings: Finding[], stats: DocumentStats): Report {
	return Object.freeze({
		findings: Object.freeze(findings.map((finding) => Object.freeze({ ...finding }))),
		stats: Object.freeze({ ...stats }),
	});
}

function formatInches(twips: number): string {
	return `${twipsToInches(twips)}"`;
}
