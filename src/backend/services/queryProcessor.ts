/**
 * Query Processor Service
 *
 * Query validation, prompt assembly and source shaping. It sits between the
 * front ends and the RAG engine.
 *
 * Key responsibilities:
 * - Validate user queries before processing (reject empty/whitespace)
 * - Build the domain-expert prompt from retrieved records
 * - Turn records into cited source excerpts
 */

import { DocumentRecord, SourceExcerpt, ValidationResult } from '../../shared/types';

/**
 * Prompt header framing the model as a domain expert.
 */
const DOMAIN_EXPERT_PROMPT = `You are an expert technical advisor with deep knowledge of:

- RF circuit design and analysis
- Antenna theory and design
- Transmission line theory and impedance matching
- Smith Chart calculations
- Filter design (low-pass, high-pass, band-pass, notch)
- Amplifier design (Class A, B, AB, C, D, E, F)
- Oscillator circuits and frequency synthesis
- Modulation and demodulation techniques
- Microwave and millimeter-wave techniques
- EMC/EMI considerations
- Technical regulations and standards
- Low power techniques
- System design and optimization

Use the following context from technical documentation to answer the question. Be precise, technical, and include relevant formulas, component values, and design considerations when applicable.`;

const ANSWER_INSTRUCTIONS = `Provide a comprehensive technical answer that includes:
1. Direct answer to the question
2. Relevant formulas or calculations if applicable
3. Practical design considerations
4. Component recommendations when appropriate
5. References to standards or common practices
6. Safety considerations if relevant

Answer:`;

/**
 * Validates a user query before processing.
 * Empty and whitespace-only queries never reach the backend.
 */
export function validateQuery(query: string | null | undefined): ValidationResult {
    if (query === null || query === undefined) {
        return {
            valid: false,
            error: 'Query is required',
        };
    }

    // trim() covers spaces, tabs and newlines
    if (query.trim().length === 0) {
        return {
            valid: false,
            error: 'Query cannot be empty or contain only whitespace',
        };
    }

    return {
        valid: true,
    };
}

/**
 * Retrieved record contents separated by blank lines.
 */
export function formatContext(records: DocumentRecord[]): string {
    return records.map((record) => record.content).join('\n\n');
}

/**
 * Full prompt for a question. The question is inserted verbatim.
 */
export function buildPrompt(question: string, records: DocumentRecord[]): string {
    return `${DOMAIN_EXPERT_PROMPT}

Context: ${formatContext(records)}

Question: ${question}

${ANSWER_INSTRUCTIONS}`;
}

/**
 * First `length` characters, with "..." appended only when something was cut.
 */
export function previewContent(content: string, length: number): string {
    return content.length > length ? `${content.slice(0, length)}...` : content;
}

/**
 * Citation for a record: a content preview plus the metadata, unmodified.
 */
export function toSourceExcerpt(record: DocumentRecord, previewLength: number): SourceExcerpt {
    const { content, ...metadata } = record;
    return {
        content: previewContent(content, previewLength),
        metadata,
    };
}

/**
 * Gets the prompt header.
 * Exported for testing purposes.
 */
export function getPromptHeader(): string {
    return DOMAIN_EXPERT_PROMPT;
}
