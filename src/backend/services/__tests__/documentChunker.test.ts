/**
 * Unit tests for the Document Chunker
 *
 * - Chunks are exact slices of the input and never exceed the chunk size
 * - Consecutive chunks overlap by at most the configured overlap, with no gap
 * - Breaks prefer paragraphs, then lines, then spaces
 * - Records carry the document's citation metadata and a relevance tag
 */

import * as fc from 'fast-check';
import {
    DocumentChunker,
    splitIntoChunks,
    validateChunkingConfig,
} from '../documentChunker';
import { RelevanceFilter } from '../relevanceFilter';
import { ConfigurationError } from '../../errors';
import { ExtractedDocument } from '../../extractors/types';

const filter = new RelevanceFilter({
    topics: ['antenna design', 'impedance matching'],
    keywords: ['swr', 'balun'],
});

describe('splitIntoChunks', () => {
    it('should break at a paragraph boundary', () => {
        const text = `${'a'.repeat(50)}\n\n${'b'.repeat(50)}`;
        const chunks = splitIntoChunks(text, { chunkSize: 80, chunkOverlap: 10 });

        expect(chunks.map((chunk) => chunk.content)).toEqual([`${'a'.repeat(50)}\n\n`, 'b'.repeat(50)]);
        expect(chunks.map((chunk) => [chunk.start, chunk.end])).toEqual([
            [0, 52],
            [52, 102],
        ]);
    });

    it('should break between words and not start a chunk mid-word', () => {
        const chunks = splitIntoChunks('alpha beta gamma delta', { chunkSize: 12, chunkOverlap: 4 });

        expect(chunks.map((chunk) => chunk.content)).toEqual(['alpha beta ', 'gamma delta']);
        expect(chunks.map((chunk) => chunk.chunkIndex)).toEqual([0, 1]);
    });

    it('should hard-cut text without any separator', () => {
        const chunks = splitIntoChunks('x'.repeat(25), { chunkSize: 10, chunkOverlap: 2 });

        expect(chunks.map((chunk) => [chunk.start, chunk.end])).toEqual([
            [0, 10],
            [8, 18],
            [16, 25],
        ]);
    });

    it('should return one chunk for short text', () => {
        expect(splitIntoChunks('short text', { chunkSize: 100, chunkOverlap: 10 })).toEqual([
            { content: 'short text', chunkIndex: 0, start: 0, end: 10 },
        ]);
    });

    it('should return no chunks for blank text', () => {
        expect(splitIntoChunks('', { chunkSize: 100, chunkOverlap: 10 })).toEqual([]);
        expect(splitIntoChunks(' \n\n ', { chunkSize: 100, chunkOverlap: 10 })).toEqual([]);
    });

    describe('property: chunks cover the text', () => {
        const textArb = fc
            .stringOf(fc.constantFrom('a', 'b', 'c', ' ', '\n'), { maxLength: 400 })
            .filter((text) => text.trim().length > 0);
        const configArb = fc
            .tuple(fc.integer({ min: 2, max: 60 }), fc.integer({ min: 1, max: 59 }))
            .filter(([size, overlap]) => size > overlap)
            .map(([chunkSize, chunkOverlap]) => ({ chunkSize, chunkOverlap }));

        it('produces bounded exact slices that rebuild the input', () => {
            fc.assert(
                fc.property(textArb, configArb, (text, config) => {
                    const chunks = splitIntoChunks(text, config);

                    expect(chunks[0].start).toBe(0);
                    expect(chunks[chunks.length - 1].end).toBe(text.length);

                    let rebuilt = chunks[0].content;
                    chunks.forEach((chunk, index) => {
                        expect(chunk.chunkIndex).toBe(index);
                        expect(chunk.content).toBe(text.slice(chunk.start, chunk.end));
                        expect(chunk.content.length).toBeLessThanOrEqual(config.chunkSize);

                        if (index > 0) {
                            const previous = chunks[index - 1];
                            expect(chunk.start).toBeLessThanOrEqual(previous.end);
                            expect(previous.end - chunk.start).toBeLessThanOrEqual(config.chunkOverlap);
                            expect(chunk.end).toBeGreaterThan(previous.end);
                            rebuilt += text.slice(previous.end, chunk.end);
                        }
                    });

                    expect(rebuilt).toBe(text);
                })
            );
        });
    });
});

describe('validateChunkingConfig', () => {
    it('should reject an overlap not smaller than the size', () => {
        expect(() => validateChunkingConfig({ chunkSize: 10, chunkOverlap: 10 })).toThrow(ConfigurationError);
    });

    it('should reject a zero overlap', () => {
        expect(() => validateChunkingConfig({ chunkSize: 10, chunkOverlap: 0 })).toThrow(ConfigurationError);
    });

    it('should reject fractional values', () => {
        expect(() => validateChunkingConfig({ chunkSize: 10.5, chunkOverlap: 2 })).toThrow(ConfigurationError);
    });
});

describe('DocumentChunker', () => {
    const chunker = new DocumentChunker(filter, { chunkSize: 1000, chunkOverlap: 200 });

    it('should copy citation metadata onto every record', () => {
        const document: ExtractedDocument = {
            source: 'https://example.com/balun',
            sourceType: 'web',
            title: 'Balun Notes',
            sections: [{ label: 'Balun Notes', text: 'A balun lowers SWR on a dipole.' }],
        };

        expect(chunker.toRecords(document)).toEqual([
            {
                content: 'A balun lowers SWR on a dipole.',
                source: 'https://example.com/balun',
                sourceType: 'web',
                chunkIndex: 0,
                title: 'Balun Notes',
                domainRelevant: true,
            },
        ]);
    });

    it('should mark PDF page boundaries and tag relevance per record', () => {
        const document: ExtractedDocument = {
            source: 'manual.pdf',
            sourceType: 'pdf',
            title: 'manual.pdf',
            sections: [
                { label: 'Page 1', text: 'Warranty information.' },
                { label: 'Page 2', text: '   ' },
            ],
        };

        const records = chunker.toRecords(document);
        expect(records).toHaveLength(1);
        expect(records[0].content).toBe('--- Page 1 ---\n\nWarranty information.');
        expect(records[0].domainRelevant).toBe(false);
    });

    it('should freeze records', () => {
        const [record] = chunker.toRecords({
            source: 'scan.png',
            sourceType: 'image',
            title: 'scan.png',
            sections: [{ label: 'Image', text: 'R1 10k' }],
        });
        expect(Object.isFrozen(record)).toBe(true);
    });

    it('should yield no records for a document without text', () => {
        expect(
            chunker.toRecords({ source: 'blank.pdf', sourceType: 'pdf', title: 'blank.pdf', sections: [] })
        ).toEqual([]);
    });

    it('should reject an invalid configuration at construction', () => {
        expect(() => new DocumentChunker(filter, { chunkSize: 100, chunkOverlap: 200 })).toThrow(ConfigurationError);
    });
});
