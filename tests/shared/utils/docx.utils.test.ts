import { describe, expect, it } from 'vitest';
import {
	collectParagraphRuns,
	elementChildren,
	ensureParagraphProperties,
	ensurePropertyElement,
	findDescendants,
	firstContentRun,
	formatLineSpacing,
	parseXml,
	readFirstLineIndent,
	readLineSpacing,
	runStartsWithTab,
	runText,
	sameLineSpacing,
	twipsToInches,
} from '../../../src/shared/utils';
import { documentXml } from '../../helpers/docx-fixtures';

function parseParagraph(xml: string): Element {
	const paragraph = findDescendants(parseXml(documentXml(xml)), 'w:p')[0];
	if (!paragraph) {
		throw new Error('paragraph not found');
	}
	return paragraph;
}

function pPrOf(xml: string): Element | null {
	return elementChildren(parseParagraph(xml)).find((child) => child.nodeName === 'w:pPr') ?? null;
}

function names(element: Element): string[] {
	return elementChildren(element).map((child) => child.nodeName);
}

describe('docx.utils', () => {
	it('converts twips to inches', () => {
		expect(twipsToInches(720)).toBe(0.5);
		expect(twipsToInches(432)).toBe(0.3);
	});

	it('formats line spacing for display', () => {
		expect(formatLineSpacing({ rule: 'auto', line: 276 })).toBe('1.15');
		expect(formatLineSpacing({ rule: 'auto', line: 480 })).toBe('2');
		expect(formatLineSpacing({ rule: 'exact', line: 240 })).toBe('exactly 12pt');
		expect(formatLineSpacing({ rule: 'atLeast', line: 300 })).toBe('at least 15pt');
	});

	it('compares line spacing values', () => {
		expect(sameLineSpacing({ rule: 'auto', line: 240 }, { rule: 'auto', line: 240 })).toBe(true);
		expect(sameLineSpacing({ rule: 'auto', line: 240 }, { rule: 'exact', line: 240 })).toBe(false);
		expect(sameLineSpacing(null, null)).toBe(true);
		expect(sameLineSpacing({ rule: 'auto', line: 240 }, null)).toBe(false);
	});

	describe('readFirstLineIndent', () => {
		it('reads firstLine in twips', () => {
			expect(readFirstLineIndent(pPrOf('<w:p><w:pPr><w:ind w:firstLine="360"/></w:pPr></w:p>'))).toBe(360);
		});

		it('reads a hanging indent as negative', () => {
			expect(readFirstLineIndent(pPrOf('<w:p><w:pPr><w:ind w:left="720" w:hanging="360"/></w:pPr></w:p>'))).toBe(
				-360
			);
		});

		it('returns null without an indent', () => {
			expect(readFirstLineIndent(pPrOf('<w:p><w:pPr><w:ind w:left="720"/></w:pPr></w:p>'))).toBeNull();
			expect(readFirstLineIndent(pPrOf('<w:p/>'))).toBeNull();
		});
	});

	describe('readLineSpacing', () => {
		it('defaults the line rule to auto', () => {
			expect(readLineSpacing(pPrOf('<w:p><w:pPr><w:spacing w:line="360"/></w:pPr></w:p>'))).toEqual({
				rule: 'auto',
				line: 360,
			});
		});

		it('keeps exact and atLeast rules', () => {
			expect(
				readLineSpacing(pPrOf('<w:p><w:pPr><w:spacing w:line="280" w:lineRule="exact"/></w:pPr></w:p>'))
			).toEqual({ rule: 'exact', line: 280 });
		});

		it('returns null when only paragraph spacing is set', () => {
			expect(readLineSpacing(pPrOf('<w:p><w:pPr><w:spacing w:after="200"/></w:pPr></w:p>'))).toBeNull();
		});
	});

	describe('property insertion', () => {
		it('creates w:pPr as the first child', () => {
			const paragraph = parseParagraph('<w:p><w:r><w:t>Texte</w:t></w:r></w:p>');
			const pPr = ensureParagraphProperties(paragraph);
			expect(names(paragraph)).toEqual(['w:pPr', 'w:r']);
			expect(ensureParagraphProperties(paragraph)).toBe(pPr);
		});

		it('inserts properties at their schema position', () => {
			const paragraph = parseParagraph('<w:p><w:pPr><w:pStyle w:val="Normal"/><w:jc w:val="both"/></w:pPr></w:p>');
			const pPr = ensureParagraphProperties(paragraph);

			ensurePropertyElement(pPr, 'w:ind');
			ensurePropertyElement(pPr, 'w:spacing');

			expect(names(pPr)).toEqual(['w:pStyle', 'w:spacing', 'w:ind', 'w:jc']);
		});

		it('reuses an existing property element', () => {
			const pPr = ensureParagraphProperties(parseParagraph('<w:p><w:pPr><w:ind w:left="100"/></w:pPr></w:p>'));
			ensurePropertyElement(pPr, 'w:ind');
			expect(names(pPr)).toEqual(['w:ind']);
		});
	});

	describe('runs', () => {
		it('collects runs from inline containers in document order', () => {
			const paragraph = parseParagraph(
				'<w:p><w:r><w:t>a</w:t></w:r><w:hyperlink><w:r><w:t>b</w:t></w:r></w:hyperlink><w:r><w:t>c</w:t></w:r></w:p>'
			);
			expect(collectParagraphRuns(paragraph).map(runText)).toEqual(['a', 'b', 'c']);
		});

		it('collects runs from content controls, moves and text direction containers', () => {
			const paragraph = parseParagraph(
				'<w:p><w:sdt><w:sdtPr><w:alias w:val="Nom"/></w:sdtPr><w:sdtContent><w:r><w:t>a</w:t></w:r></w:sdtContent></w:sdt>' +
					'<w:moveTo><w:r><w:t>b</w:t></w:r></w:moveTo><w:dir w:val="rtl"><w:r><w:t>c</w:t></w:r></w:dir>' +
					'<w:bdo w:val="ltr"><w:r><w:t>d</w:t></w:r></w:bdo></w:p>'
			);
			expect(collectParagraphRuns(paragraph).map(runText)).toEqual(['a', 'b', 'c', 'd']);
		});

		it('skips runs of nested text-box paragraphs', () => {
			const paragraph = parseParagraph(
				'<w:p><w:r><w:pict><w:txbxContent><w:p><w:r><w:t>inner</w:t></w:r></w:p></w:txbxContent></w:pict></w:r></w:p>'
			);
			expect(collectParagraphRuns(paragraph)).toHaveLength(1);
		});

		it('finds the first run with content', () => {
			const paragraph = parseParagraph(
				'<w:p><w:r><w:rPr><w:b/></w:rPr></w:r><w:r><w:t></w:t></w:r><w:r><w:tab/><w:t>x</w:t></w:r></w:p>'
			);
			const run = firstContentRun(collectParagraphRuns(paragraph));
			expect(run ? runText(run) : null).toBe('\tx');
		});

		it('detects runs that begin with a tab', () => {
			const runs = collectParagraphRuns(
				parseParagraph(
					'<w:p><w:r><w:tab/></w:r><w:r><w:t xml:space="preserve">\tx</w:t></w:r><w:r><w:t>x\t</w:t></w:r>' +
						'<w:r><w:rPr><w:i/></w:rPr><w:lastRenderedPageBreak/><w:tab/></w:r></w:p>'
				)
			);
			expect(runs.map(runStartsWithTab)).toEqual([true, true, false, true]);
		});
	});
});
