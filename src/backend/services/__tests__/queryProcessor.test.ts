/**
 * Unit tests for Query Processor
 *
 * Tests the validateQuery function to ensure it correctly:
 * - Accepts valid queries
 * - Rejects missing, empty and whitespace-only queries
 *
 * Tests prompt assembly and source excerpts:
 * - The question and every record's content reach the prompt
 * - Previews are cut only when content is longer than the limit
 */

import {
    validateQuery,
    buildPrompt,
    formatContext,
    previewContent,
    toSourceExcerpt,
    getPromptHeader,
} from '../queryProcessor';
import { DocumentRecord } from '../../../shared/types';
import * as fc from 'fast-check';

function record(content: string, chunkIndex = 0): DocumentRecord {
    return {
        content,
        source: 'manual.pdf',
        sourceType: 'pdf',
        chunkIndex,
        title: 'manual.pdf',
        domainRelevant: true,
    };
}

describe('validateQuery', () => {
    describe('valid queries', () => {
        it('should accept a simple text query', () => {
            const result = validateQuery('What is the SWR of a 75 ohm load on 50 ohm line?');
            expect(result.valid).toBe(true);
            expect(result.error).toBeUndefined();
        });

        it('should accept a query with leading/trailing spaces (content exists)', () => {
            expect(validateQuery('  How does a balun work?  ').valid).toBe(true);
        });

        it('should accept a single character query', () => {
            expect(validateQuery('?').valid).toBe(true);
        });
    });

    describe('invalid queries', () => {
        it('should reject a missing query', () => {
            expect(validateQuery(undefined)).toEqual({ valid: false, error: 'Query is required' });
            expect(validateQuery(null)).toEqual({ valid: false, error: 'Query is required' });
        });

        it('should reject an empty string', () => {
            expect(validateQuery('')).toEqual({
                valid: false,
                error: 'Query cannot be empty or contain only whitespace',
            });
        });

        it('should reject mixed whitespace', () => {
            expect(validateQuery(' \t \n ').valid).toBe(false);
        });
    });

    describe('property: whitespace-only strings are always rejected', () => {
        it('rejects any string built from whitespace', () => {
            fc.assert(
                fc.property(fc.stringOf(fc.constantFrom(' ', '\t', '\n', '\r')), (query) => {
                    expect(validateQuery(query).valid).toBe(false);
                })
            );
        });

        it('accepts any string with a non-whitespace character', () => {
            fc.assert(
                fc.property(fc.string(), fc.constantFrom('a', '7', '?', 'Ω'), fc.string(), (before, core, after) => {
                    expect(validateQuery(`${before}${core}${after}`).valid).toBe(true);
                })
            );
        });
    });
});

describe('buildPrompt', () => {
    it('should lay out header, context, question and instructions', () => {
        const prompt = buildPrompt('What is 2+2?', [record('Four is the answer.'), record('Second record.', 1)]);

        expect(prompt.startsWith(getPromptHeader())).toBe(true);
        expect(prompt).toContain('\n\nContext: Four is the answer.\n\nSecond record.\n\nQuestion: What is 2+2?\n\n');
        expect(prompt.endsWith('Answer:')).toBe(true);
    });

    it('should insert the question verbatim', () => {
        fc.assert(
            fc.property(fc.string({ minLength: 1 }), (question) => {
                expect(buildPrompt(question, [])).toContain(`Question: ${question}\n\n`);
            })
        );
    });

    it('should frame the model as an RF domain expert', () => {
        expect(getPromptHeader()).toContain('- Antenna theory and design');
        expect(getPromptHeader()).toContain('- Smith Chart calculations');
    });
});

describe('formatContext', () => {
    it('should return an empty string when nothing was retrieved', () => {
        expect(formatContext([])).toBe('');
    });
});

describe('previewContent', () => {
    it('should keep short content unchanged', () => {
        expect(previewContent('short', 200)).toBe('short');
        expect(previewContent('x'.repeat(200), 200)).toBe('x'.repeat(200));
    });

    it('should cut long content and append an ellipsis', () => {
        expect(previewContent('x'.repeat(201), 200)).toBe(`${'x'.repeat(200)}...`);
    });
});

describe('toSourceExcerpt', () => {
    it('should copy every metadata field unchanged', () => {
        const excerpt = toSourceExcerpt(record('Antenna gain is 2.15 dBi.', 3), 10);

        expect(excerpt).toEqual({
            content: 'Antenna ga...',
            metadata: {
                source: 'manual.pdf',
                sourceType: 'pdf',
                chunkIndex: 3,
                title: 'manual.pdf',
                domainRelevant: true,
            },
        });
    });
});
