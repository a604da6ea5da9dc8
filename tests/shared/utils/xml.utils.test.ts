import { describe, expect, it } from 'vitest';
import {
	XmlParseError,
	createWordElement,
	findChild,
	findChildren,
	findDescendants,
	getAttribute,
	getIntAttribute,
	hasAncestor,
	isOnOffEnabled,
	parseXml,
	removeWordAttribute,
	serializeXml,
	setWordAttribute,
	walkElements,
} from '../../../src/shared/utils/xml.utils';
import { W_NS, documentXml } from '../../helpers/docx-fixtures';

function firstElement(xml: string, name: string): Element {
	const element = findDescendants(parseXml(documentXml(xml)), name)[0];
	if (!element) {
		throw new Error(`${name} not found`);
	}
	return element;
}

describe('xml.utils', () => {
	describe('parseXml', () => {
		it('parses a well-formed document', () => {
			const document = parseXml(documentXml('<w:p/>'));
			expect(document.documentElement.nodeName).toBe('w:document');
		});

		it('rejects empty input', () => {
			expect(() => parseXml('   ')).toThrow(XmlParseError);
		});

		it('rejects mismatched end tags', () => {
			expect(() => parseXml(`<w:document xmlns:w="${W_NS}"><w:body><w:p></w:body></w:document>`)).toThrow(
				XmlParseError
			);
		});

		it('rejects an unclosed paragraph instead of repairing it', () => {
			const xml = `<w:document xmlns:w="${W_NS}"><w:body><w:p><w:r><w:t>x</w:t></w:r></w:body></w:document>`;
			expect(() => parseXml(xml)).toThrow(XmlParseError);
		});
	});

	it('finds direct children by qualified name', () => {
		const paragraph = firstElement('<w:p><w:pPr/><w:r/><w:r/><w:hyperlink><w:r/></w:hyperlink></w:p>', 'w:p');
		expect(findChildren(paragraph, 'w:r')).toHaveLength(2);
		expect(findChild(paragraph, 'w:pPr')?.nodeName).toBe('w:pPr');
		expect(findChild(paragraph, 'w:ind')).toBeNull();
	});

	it('detects ancestors up to a boundary', () => {
		const run = firstElement('<w:tbl><w:tr><w:tc><w:p><w:r/></w:p></w:tc></w:tr></w:tbl>', 'w:r');
		const paragraph = firstElement('<w:tbl><w:tr><w:tc><w:p><w:r/></w:p></w:tc></w:tr></w:tbl>', 'w:p');
		expect(hasAncestor(run, 'w:tc')).toBe(true);
		expect(hasAncestor(paragraph, 'w:r')).toBe(false);
	});

	it('walks elements in document order and can skip subtrees', () => {
		const paragraph = firstElement('<w:p><w:r><w:t>a</w:t></w:r><w:ins><w:r/></w:ins></w:p>', 'w:p');
		const visited: string[] = [];
		walkElements(paragraph, (element) => {
			visited.push(element.nodeName);
			return element.nodeName !== 'w:r';
		});
		expect(visited).toEqual(['w:r', 'w:ins', 'w:r']);
	});

	it('distinguishes absent attributes from empty ones', () => {
		const ind = firstElement('<w:p><w:pPr><w:ind w:firstLine="" w:hanging="-360"/></w:pPr></w:p>', 'w:ind');
		expect(getAttribute(ind, 'w:left')).toBeNull();
		expect(getAttribute(ind, 'w:firstLine')).toBe('');
		expect(getIntAttribute(ind, 'w:firstLine')).toBeNull();
		expect(getIntAttribute(ind, 'w:hanging')).toBe(-360);
	});

	it('reads on/off properties', () => {
		const enabled = firstElement('<w:p><w:pPr><w:pageBreakBefore/></w:pPr></w:p>', 'w:pageBreakBefore');
		const disabled = firstElement('<w:p><w:pPr><w:pageBreakBefore w:val="false"/></w:pPr></w:p>', 'w:pageBreakBefore');
		expect(isOnOffEnabled(enabled)).toBe(true);
		expect(isOnOffEnabled(disabled)).toBe(false);
	});

	it('creates and edits elements in the WordprocessingML namespace', () => {
		const pPr = firstElement('<w:p><w:pPr><w:ind w:hanging="360"/></w:pPr></w:p>', 'w:pPr');
		const spacing = createWordElement(pPr, 'w:spacing');
		pPr.appendChild(spacing);
		setWordAttribute(spacing, 'w:line', '276');

		const ind = findChild(pPr, 'w:ind');
		expect(ind).not.toBeNull();
		if (ind) {
			setWordAttribute(ind, 'w:hanging', '180');
			expect(getAttribute(ind, 'w:hanging')).toBe('180');
			expect(removeWordAttribute(ind, 'w:hanging')).toBe(true);
			expect(removeWordAttribute(ind, 'w:hanging')).toBe(false);
		}

		expect(spacing.namespaceURI).toBe(W_NS);
		expect(getAttribute(spacing, 'w:line')).toBe('276');

		const reparsed = parseXml(serializeXml(pPr.ownerDocument));
		const line = findDescendants(reparsed, 'w:spacing')[0];
		expect(line?.namespaceURI).toBe(W_NS);
		expect(line ? getAttribute(line, 'w:line') : null).toBe('276');
	});
});
