/**
 * Unit tests for technical-value extraction
 */

import {
    NO_TECHNICAL_VALUES,
    enrichOcrText,
    extractTechnicalValues,
    formatTechnicalValues,
} from '../technicalValues';

const SCHEMATIC_TEXT = 'R1 = 10k C2: 100nF L3 4.7uH tuned to 7.1MHz at 13.8V drawing 2.5A for 100W into 50Ω';

describe('extractTechnicalValues', () => {
    it('should find every category in a schematic label', () => {
        expect(extractTechnicalValues(SCHEMATIC_TEXT)).toEqual({
            resistors: ['10k'],
            capacitors: ['100nF'],
            inductors: ['4.7uH'],
            frequencies: ['7.1MHz'],
            voltages: ['13.8V'],
            currents: ['2.5A'],
            power: ['100W'],
            impedance: ['50Ω'],
        });
    });

    it('should keep repeated designators in order', () => {
        expect(extractTechnicalValues('R1 10k R2 4.7k')).toEqual({ resistors: ['10k', '4.7k'] });
    });

    it('should return no categories for plain text', () => {
        expect(extractTechnicalValues('Hello')).toEqual({});
    });
});

describe('formatTechnicalValues', () => {
    it('should render one line per category in a fixed order', () => {
        expect(formatTechnicalValues(extractTechnicalValues(SCHEMATIC_TEXT))).toBe(
            [
                'resistors: 10k',
                'capacitors: 100nF',
                'inductors: 4.7uH',
                'frequencies: 7.1MHz',
                'voltages: 13.8V',
                'currents: 2.5A',
                'power: 100W',
                'impedance: 50Ω',
            ].join('\n')
        );
    });

    it('should join repeated values with commas', () => {
        expect(formatTechnicalValues({ power: ['5W', '100W'] })).toBe('power: 5W, 100W');
    });

    it('should say so when nothing was found', () => {
        expect(formatTechnicalValues({})).toBe(NO_TECHNICAL_VALUES);
    });
});

describe('enrichOcrText', () => {
    it('should append the enrichment block after the raw text', () => {
        expect(enrichOcrText('R1 10k')).toBe('Image Analysis:\nR1 10k\n\nTechnical Information:\nresistors: 10k');
    });

    it('should keep the raw text when no values are found', () => {
        expect(enrichOcrText('Hello')).toBe(
            'Image Analysis:\nHello\n\nTechnical Information:\nNo technical values detected'
        );
    });
});
