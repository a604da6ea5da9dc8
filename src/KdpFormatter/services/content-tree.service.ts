/**
 * ============================================================================
 * SERVICE CONTENT TREE - Modèle des paragraphes de word/document.xml
 * ============================================================================
 *
 * Parse la partie principale et construit un ParagraphNode par paragraphe
 * de premier niveau. Les ParagraphNode gardent une référence vers leur
 * élément <w:p> : les corrections modifient le DOM, puis le document est
 * resérialisé.
 *
 * @version 1.0.0
 */

import { KdpErrorCode, KdpFormatterError, errorMessage } from '../../shared/errors';
import type { ContentTree, DocumentStats, ParagraphNode, RunNode, StructureIssue } from '../../shared/types';
import {
	collectParagraphRuns,
	countPropertyElements,
	countWords,
	detectHeadingLevel,
	elementChildren,
	extractStyleId,
	findChild,
	findChildren,
	findDescendants,
	getAttribute,
	hasAncestor,
	isOnOffEnabled,
	isTitleStyle,
	isTocFieldCode,
	normalizeText,
	parseXml,
	readFirstLineIndent,
	readLineSpacing,
	runContentElements,
	runStartsWithTab,
	runText,
	serializeXml,
} from '../../shared/utils';

/** Valeur de w:docPartGallery d'un bloc "table des matières" */
const TOC_DOC_PART_GALLERY = 'Table of Contents';

// ============================================================================
// PARSING
// ============================================================================

/**
 * Parse le XML de word/document.xml en ContentTree.
 *
 * @throws KdpFormatterError MALFORMED_CONTENT si le XML est vide, mal formé ou sans <w:body>
 */
export function parseContentTree(xml: string): ContentTree {
	let document: Document;

	try {
		document = parseXml(xml);
	} catch (error) {
		throw new KdpFormatterError(
			`Main document part is not well-formed XML: ${errorMessage(error)}`,
			KdpErrorCode.MALFORMED_CONTENT,
			{ cause: errorMessage(error) }
		);
	}

	const body = findDescendants(document, 'w:body')[0];
	if (!body) {
		throw new KdpFormatterError('Main document part has no <w:body> element', KdpErrorCode.MALFORMED_CONTENT);
	}

	const paragraphs = findDescendants(body, 'w:p')
		.filter((element) => !hasAncestor(element, 'w:p', body))
		.map((element, index) => buildParagraphNode(element, index));

	return {
		document,
		body,
		paragraphs,
		hasTableOfContents: detectTableOfContents(body),
		stats: computeStats(paragraphs),
	};
}

/**
 * Resérialise le document (après corrections).
 */
export function serializeContentTree(tree: ContentTree): string {
	return serializeXml(tree.document);
}

// ============================================================================
// CONSTRUCTION DES NŒUDS
// ============================================================================

/**
 * Construit le ParagraphNode d'un élément <w:p>.
 */
export function buildParagraphNode(element: Element, index: number): ParagraphNode {
	const pPr = findChild(element, 'w:pPr');
	const styleId = extractStyleId(pPr);
	const runs = collectParagraphRuns(element).map(buildRunNode);
	const firstRun = runs.find((run) => run.hasContent);
	const breaks = locatePageBreaks(runs);
	const pageBreakBefore = pPr ? findChild(pPr, 'w:pageBreakBefore') : null;

	return {
		index,
		element,
		styleId,
		headingLevel: detectHeadingLevel(pPr),
		isTitleStyle: isTitleStyle(styleId),
		inTableCell: hasAncestor(element, 'w:tc'),
		firstLineIndent: readFirstLineIndent(pPr),
		lineSpacing: readLineSpacing(pPr),
		runs,
		text: normalizeText(runs.map((run) => run.text).join('')),
		startsWithTab: firstRun !== undefined && firstRun.startsWithTab,
		pageBreakAtStart: (pageBreakBefore !== null && isOnOffEnabled(pageBreakBefore)) || breaks.atStart,
		pageBreakAtEnd: breaks.atEnd,
		mediaCount: countMedia(element),
		structureIssue: detectStructureIssue(element),
	};
}

function buildRunNode(element: Element): RunNode {
	return {
		element,
		text: runText(element),
		startsWithTab: runStartsWithTab(element),
		hasContent: runContentElements(element).length > 0,
	};
}

/**
 * Position des sauts de page par rapport au texte du paragraphe.
 *
 * Un saut de page est "au début" s'il précède tout texte visible et
 * "à la fin" s'il n'est suivi d'aucun texte visible. Un paragraphe qui ne
 * contient qu'un saut de page est dans les deux cas.
 */
function locatePageBreaks(runs: RunNode[]): { atStart: boolean; atEnd: boolean } {
	const tokens: Array<'text' | 'break'> = [];

	for (const run of runs) {
		for (const child of runContentElements(run.element)) {
			if (child.nodeName === 'w:br' && getAttribute(child, 'w:type') === 'page') {
				tokens.push('break');
			} else if (child.nodeName === 'w:t' && normalizeText(child.textContent ?? '') !== '') {
				tokens.push('text');
			}
		}
	}

	return {
		atStart: tokens[0] === 'break',
		atEnd: tokens.length > 0 && tokens[tokens.length - 1] === 'break',
	};
}

/**
 * Compte les images référencées dans un paragraphe.
 *
 * Les images de mc:Fallback doublent celles de mc:Choice : elles sont ignorées.
 */
function countMedia(paragraph: Element): number {
	const blips = findDescendants(paragraph, 'a:blip').filter((blip) => getAttribute(blip, 'r:embed') !== null);
	const legacy = findDescendants(paragraph, 'v:imagedata').filter(
		(imageData) => getAttribute(imageData, 'r:id') !== null
	);

	return [...blips, ...legacy].filter((element) => !hasAncestor(element, 'mc:Fallback', paragraph)).length;
}

/**
 * Détecte les structures que les corrections ne savent pas modifier sans risque.
 */
function detectStructureIssue(paragraph: Element): StructureIssue | null {
	const properties = findChildren(paragraph, 'w:pPr');

	if (properties.length > 1) {
		return 'multiple_ppr';
	}

	const pPr = properties[0];
	if (!pPr) {
		return null;
	}

	if (elementChildren(paragraph)[0] !== pPr) {
		return 'misplaced_ppr';
	}
	if (countPropertyElements(pPr, 'w:ind') > 1) {
		return 'duplicate_ind';
	}
	if (countPropertyElements(pPr, 'w:spacing') > 1) {
		return 'duplicate_spacing';
	}

	return null;
}

// ============================================================================
// NIVEAU DOCUMENT
// ============================================================================

/**
 * Détecte une table des matières : champ TOC (complexe ou simple) ou
 * bloc de construction "Table of Contents".
 */
function detectTableOfContents(body: Element): boolean {
	const instructions = findDescendants(body, 'w:instrText').map((element) => element.textContent ?? '');
	if (instructions.some(isTocFieldCode)) {
		return true;
	}

	// Un code de champ peut être découpé sur plusieurs runs
	for (const paragraph of findDescendants(body, 'w:p')) {
		const joined = findDescendants(paragraph, 'w:instrText')
			.map((element) => element.textContent ?? '')
			.join('');
		if (joined && isTocFieldCode(joined)) {
			return true;
		}
	}

	const simpleFields = findDescendants(body, 'w:fldSimple');
	if (simpleFields.some((field) => isTocFieldCode(getAttribute(field, 'w:instr') ?? ''))) {
		return true;
	}

	return findDescendants(body, 'w:docPartGallery').some(
		(gallery) => getAttribute(gallery, 'w:val') === TOC_DOC_PART_GALLERY
	);
}

function computeStats(paragraphs: ParagraphNode[]): DocumentStats {
	return {
		paragraphs: paragraphs.length,
		words: paragraphs.reduce((total, paragraph) => total + countWords(paragraph.text), 0),
		headings: paragraphs.filter((paragraph) => paragraph.headingLevel !== null).length,
		images: paragraphs.reduce((total, paragraph) => total + paragraph.mediaCount, 0),
	};
}
