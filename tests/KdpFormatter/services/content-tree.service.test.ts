import { describe, expect, it } from 'vitest';
import { parseContentTree, serializeContentTree } from '../../../src/KdpFormatter/services/content-tree.service';
import { KdpErrorCode, KdpFormatterError } from '../../../src/shared/errors';
import {
	PAGE_BREAK,
	TOC_FIELD,
	W_NS,
	documentXml,
	heading,
	imageParagraph,
	paragraph,
	tabParagraph,
} from '../../helpers/docx-fixtures';

function expectMalformed(xml: string): void {
	try {
		parseContentTree(xml);
	} catch (error) {
		expect(error).toBeInstanceOf(KdpFormatterError);
		expect(error instanceof KdpFormatterError ? error.code : null).toBe(KdpErrorCode.MALFORMED_CONTENT);
		return;
	}
	throw new Error('parseContentTree did not throw');
}

describe('content-tree.service', () => {
	describe('parseContentTree', () => {
		it('rejects malformed XML, empty content and documents without a body', () => {
			expectMalformed(`<w:document xmlns:w="${W_NS}"><w:body><w:p></w:body></w:document>`);
			expectMalformed('');
			expectMalformed(`<w:document xmlns:w="${W_NS}"/>`);
		});

		it('maps paragraph properties', () => {
			const tree = parseContentTree(
				documentXml(
					heading('Chapter One', 1) +
						paragraph('Il était une fois.', { firstLine: 360, line: 360 }) +
						paragraph('Suspendu', { hanging: 360, line: 280, lineRule: 'exact' }) +
						paragraph('My Book', { style: 'Title' })
				)
			);

			const [title, body, hanging, bookTitle] = tree.paragraphs;

			expect(title.styleId).toBe('Heading1');
			expect(title.headingLevel).toBe(1);
			expect(body.headingLevel).toBeNull();
			expect(body.firstLineIndent).toBe(360);
			expect(body.lineSpacing).toEqual({ rule: 'auto', line: 360 });
			expect(body.text).toBe('Il était une fois.');
			expect(hanging.firstLineIndent).toBe(-360);
			expect(hanging.lineSpacing).toEqual({ rule: 'exact', line: 280 });
			expect(bookTitle.isTitleStyle).toBe(true);
			expect(bookTitle.headingLevel).toBeNull();
		});

		it('detects leading tabs from w:tab elements and tab characters', () => {
			const tree = parseContentTree(
				documentXml(tabParagraph('Indenté') + paragraph('\tAussi indenté') + paragraph('Pas de\ttabulation'))
			);
			expect(tree.paragraphs.map((p) => p.startsWithTab)).toEqual([true, true, false]);
		});

		it('reads the leading tab from the first run with content', () => {
			const tree = parseContentTree(
				documentXml('<w:p><w:r><w:rPr><w:b/></w:rPr></w:r><w:r><w:tab/><w:t>Texte</w:t></w:r></w:p>')
			);
			const [paragraph] = tree.paragraphs;

			expect(paragraph.runs.map((run) => run.hasContent)).toEqual([false, true]);
			expect(paragraph.startsWithTab).toBe(true);
		});

		it('excludes paragraphs nested in text boxes', () => {
			const tree = parseContentTree(
				documentXml(
					'<w:p><w:r><w:t>Hôte</w:t></w:r><w:r><w:pict><w:txbxContent>' +
						'<w:p><w:r><w:t>Zone de texte</w:t></w:r></w:p>' +
						'</w:txbxContent></w:pict></w:r></w:p>' +
						paragraph('Suivant')
				)
			);
			expect(tree.paragraphs).toHaveLength(2);
			expect(tree.paragraphs[0].text).toBe('Hôte');
			expect(tree.paragraphs[1].index).toBe(1);
		});

		it('marks paragraphs inside table cells', () => {
			const tree = parseContentTree(
				documentXml(`<w:tbl><w:tr><w:tc>${paragraph('Cellule')}</w:tc></w:tr></w:tbl>${paragraph('Corps')}`)
			);
			expect(tree.paragraphs.map((p) => p.inTableCell)).toEqual([true, false]);
		});

		it('locates page breaks at the start and end of paragraphs', () => {
			const tree = parseContentTree(
				documentXml(
					PAGE_BREAK +
						'<w:p><w:r><w:t>Fin</w:t><w:br w:type="page"/></w:r></w:p>' +
						heading('Chapter', 1, { pageBreakBefore: true }) +
						'<w:p><w:r><w:t>Avant</w:t></w:r><w:r><w:br w:type="page"/></w:r><w:r><w:t>Après</w:t></w:r></w:p>'
				)
			);
			const breaks = tree.paragraphs.map((p) => [p.pageBreakAtStart, p.pageBreakAtEnd]);
			expect(breaks).toEqual([
				[true, true],
				[false, true],
				[true, false],
				[false, false],
			]);
		});

		it('counts images once per drawing', () => {
			const alternate =
				'<w:p><w:r><mc:AlternateContent><mc:Choice Requires="wps">' +
				'<w:drawing><a:blip r:embed="rId5"/></w:drawing></mc:Choice>' +
				'<mc:Fallback><w:pict><v:imagedata r:id="rId5"/></w:pict></mc:Fallback>' +
				'</mc:AlternateContent></w:r></w:p>';
			const tree = parseContentTree(documentXml(imageParagraph() + alternate + paragraph('Texte')));

			expect(tree.paragraphs.map((p) => p.mediaCount)).toEqual([1, 1, 0]);
			expect(tree.stats.images).toBe(2);
		});

		it('detects a table of contents field', () => {
			expect(parseContentTree(documentXml(TOC_FIELD)).hasTableOfContents).toBe(true);
			expect(
				parseContentTree(documentXml('<w:p><w:fldSimple w:instr=" TOC \\o &quot;1-3&quot; "/></w:p>'))
					.hasTableOfContents
			).toBe(true);
			expect(parseContentTree(documentXml(paragraph('Table of Contents'))).hasTableOfContents).toBe(false);
		});

		it('detects a table of contents field code split across runs', () => {
			const split =
				'<w:p><w:r><w:instrText xml:space="preserve"> TO</w:instrText></w:r>' +
				'<w:r><w:instrText xml:space="preserve">C \\o </w:instrText></w:r></w:p>';
			expect(parseContentTree(documentXml(split)).hasTableOfContents).toBe(true);
		});

		it('records structural anomalies', () => {
			const tree = parseContentTree(
				documentXml(
					'<w:p><w:pPr/><w:pPr/><w:r><w:t>a</w:t></w:r></w:p>' +
						'<w:p><w:r><w:t>b</w:t></w:r><w:pPr/></w:p>' +
						'<w:p><w:pPr><w:ind w:firstLine="0"/><w:ind w:firstLine="720"/></w:pPr><w:r><w:t>c</w:t></w:r></w:p>' +
						'<w:p><w:pPr><w:spacing w:line="240"/><w:spacing w:line="360"/></w:pPr><w:r><w:t>d</w:t></w:r></w:p>' +
						paragraph('e', { firstLine: 720 })
				)
			);
			expect(tree.paragraphs.map((p) => p.structureIssue)).toEqual([
				'multiple_ppr',
				'misplaced_ppr',
				'duplicate_ind',
				'duplicate_spacing',
				null,
			]);
		});

		it('computes document statistics', () => {
			const tree = parseContentTree(
				documentXml(heading('Chapter One', 1) + paragraph('Il était une fois.') + imageParagraph())
			);
			expect(tree.stats).toEqual({ paragraphs: 3, words: 6, headings: 1, images: 1 });
		});
	});

	it('serializes the parsed document', () => {
		const tree = parseContentTree(documentXml(paragraph('Texte')));
		const again = parseContentTree(serializeContentTree(tree));
		expect(again.paragraphs.map((p) => p.text)).toEqual(['Texte']);
	});
});
