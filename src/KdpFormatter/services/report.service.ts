/**
 * ============================================================================
 * SERVICE REPORT - Affichage console du rapport
 * ============================================================================
 *
 * Met en forme un Report pour la console : en-tête avec les statistiques
 * du document, une section par gravité (sections vides omises), puis un
 * verdict.
 *
 * @version 1.0.0
 */

import type { Finding, Report, Severity } from '../../shared/types';

export interface RenderOptions {
	/** Nom du document affiché dans le titre */
	documentName: string;
}

const SEPARATOR = '='.repeat(70);

const SECTIONS: Array<{ severity: Severity; title: string; marker: string }> = [
	{ severity: 'critical', title: '🚫 CRITICAL ISSUES', marker: '❌' },
	{ severity: 'warning', title: '⚠️  WARNINGS', marker: '⚠️ ' },
	{ severity: 'info', title: 'ℹ️  ADDITIONAL INFO', marker: '📷' },
	{ severity: 'success', title: '✅ GOOD PRACTICES', marker: '✓' },
];

/**
 * Rend le rapport sous forme de texte multi-lignes.
 *
 * @example
 * console.log(renderReport(report, { documentName: 'roman.docx' }));
 */
export function renderReport(report: Report, options: RenderOptions): string {
	const { stats } = report;
	const lines: string[] = [
		SEPARATOR,
		`📊 KDP FORMATTING REPORT: ${options.documentName}`,
		SEPARATOR,
		`Paragraphs: ${stats.paragraphs} | Words: ${stats.words} | Headings: ${stats.headings} | Images: ${stats.images}`,
	];

	for (const section of SECTIONS) {
		const findings = report.findings.filter((finding) => finding.severity === section.severity);
		if (findings.length === 0) {
			continue;
		}

		lines.push('', `${section.title}:`);
		for (const finding of findings) {
			lines.push(...renderFinding(finding, section.marker));
		}
	}

	lines.push('', SEPARATOR, renderVerdict(report), SEPARATOR);
	return lines.join('\n');
}

function renderFinding(finding: Finding, marker: string): string[] {
	const lines = [`  ${marker} ${finding.message}`];

	if (finding.detail) {
		lines.push(`     └─ ${finding.detail}`);
	}
	if (finding.remediation) {
		lines.push(`     └─ Fix: ${finding.remediation}`);
	}

	return lines;
}

/**
 * Verdict final selon les constats d'analyse les plus graves.
 */
export function renderVerdict(report: Report): string {
	const analysis = report.findings.filter((finding) => finding.category !== 'fixes');

	if (analysis.some((finding) => finding.severity === 'critical')) {
		return '🚫 Critical issues found: fix them before uploading to KDP';
	}
	if (analysis.some((finding) => finding.severity === 'warning')) {
		return '⚠️  Document is usable, but the warnings above are worth fixing';
	}
	return '🎉 Document looks ready for KDP';
}
