/**
 * Technical-value extraction for OCR'd diagrams and schematics.
 *
 * A fixed set of labelled matchers pulls component designators with values
 * and electrical readings out of raw OCR text. The result is rendered as an
 * enrichment block appended after the raw text. It gives retrieval more
 * tokens to match on and never replaces the OCR output.
 */

export type TechnicalCategory =
  | 'resistors'
  | 'capacitors'
  | 'inductors'
  | 'frequencies'
  | 'voltages'
  | 'currents'
  | 'power'
  | 'impedance';

/**
 * Matchers run in this order. Each has exactly one capture group holding the
 * value that gets reported.
 */
const TECHNICAL_PATTERNS: ReadonlyArray<readonly [TechnicalCategory, RegExp]> = [
  ['resistors', /R\d+\s*[=:]?\s*(\d+\.?\d*\s*[km]?Ω?)/giu],
  ['capacitors', /C\d+\s*[=:]?\s*(\d+\.?\d*\s*[pnumμ]?F?)/giu],
  ['inductors', /L\d+\s*[=:]?\s*(\d+\.?\d*\s*[pnumμ]?H?)/giu],
  ['frequencies', /(\d+\.?\d*\s*[kmg]?hz)/giu],
  ['voltages', /(\d+\.?\d*\s*[mμnpk]?v)/giu],
  ['currents', /(\d+\.?\d*\s*[mμnpk]?a)/giu],
  ['power', /(\d+\.?\d*\s*[mμnpk]?w)/giu],
  ['impedance', /(\d+\.?\d*\s*Ω)/gu],
];

export const NO_TECHNICAL_VALUES = 'No technical values detected';

export type TechnicalValues = Partial<Record<TechnicalCategory, string[]>>;

/**
 * Runs every matcher over the text. Categories without matches are absent;
 * repeated values are kept in order of appearance.
 */
export function extractTechnicalValues(ocrText: string): TechnicalValues {
  const values: TechnicalValues = {};

  for (const [category, pattern] of TECHNICAL_PATTERNS) {
    const matches: string[] = [];
    for (const match of ocrText.matchAll(pattern)) {
      const value = match[1]?.trim();
      if (value) {
        matches.push(value);
      }
    }
    if (matches.length > 0) {
      values[category] = matches;
    }
  }

  return values;
}

/**
 * Renders extracted values as "category: a, b" lines.
 */
export function formatTechnicalValues(values: TechnicalValues): string {
  const lines: string[] = [];

  for (const [category] of TECHNICAL_PATTERNS) {
    const matches = values[category];
    if (matches && matches.length > 0) {
      lines.push(`${category}: ${matches.join(', ')}`);
    }
  }

  return lines.length > 0 ? lines.join('\n') : NO_TECHNICAL_VALUES;
}

/**
 * Appends the enrichment block to the raw OCR text.
 */
export function enrichOcrText(ocrText: string): string {
  const technicalInfo = formatTechnicalValues(extractTechnicalValues(ocrText));
  return `Image Analysis:\n${ocrText}\n\nTechnical Information:\n${technicalInfo}`;
}
