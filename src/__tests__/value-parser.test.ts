import { describe, it, expect } from 'vitest';
import { parseAmount, parseCount, sumCurrencyMentions } from '../extract/value-parser.js';
import { defaultCompiledConfig } from './fixtures.js';

const { sentinels } = defaultCompiledConfig();

describe('parseAmount', () => {
    it('should parse plain and formatted numbers directly', () => {
        expect(parseAmount(50000, { sentinels })).toEqual({ amount: 50000, provenance: 'direct' });
        expect(parseAmount('$250,000', { sentinels })).toEqual({ amount: 250000, provenance: 'direct' });
        expect(parseAmount(' $1,500 ', { sentinels })).toEqual({ amount: 1500, provenance: 'direct' });
        expect(parseAmount('$ 2500.75', { sentinels })).toEqual({ amount: 2500.75, provenance: 'direct' });
        expect(parseAmount('12.5', { sentinels })).toEqual({ amount: 12.5, provenance: 'direct' });
    });

    it('should treat sentinels as zero, case-insensitively', () => {
        expect(parseAmount('NA', { sentinels })).toEqual({ amount: 0, provenance: 'sentinel' });
        expect(parseAmount('n/a', { sentinels })).toEqual({ amount: 0, provenance: 'sentinel' });
        expect(parseAmount('Not applicable', { sentinels })).toEqual({ amount: 0, provenance: 'sentinel' });
        expect(parseAmount('-', { sentinels })).toEqual({ amount: 0, provenance: 'sentinel' });
    });

    it('should sum every currency amount in free text', () => {
        expect(parseAmount('$1,000 cash and $750 travel', { sentinels })).toEqual({
            amount: 1750,
            provenance: 'summed-from-text',
        });
    });

    it('should sum amounts separated only by punctuation or spaces', () => {
        expect(parseAmount('$5,000, $2,500', { sentinels })).toEqual({ amount: 7500, provenance: 'summed-from-text' });
        expect(parseAmount('$5,000 $2,500', { sentinels })).toEqual({ amount: 7500, provenance: 'summed-from-text' });
    });

    it('should not read separated numbers as one direct amount', () => {
        expect(parseAmount('1 500', { sentinels })).toEqual({ amount: 0, provenance: 'defaulted-to-zero' });
        expect(parseAmount('12,34', { sentinels })).toEqual({ amount: 0, provenance: 'defaulted-to-zero' });
    });

    it('should apply magnitude words and suffixes', () => {
        expect(parseAmount('$2.5 million grant from EPA', { sentinels }).amount).toBe(2500000);
        expect(parseAmount('$40K seed award', { sentinels }).amount).toBe(40000);
        expect(parseAmount('15,000 dollars and 5000 USD', { sentinels }).amount).toBe(20000);
    });

    it('should count a $ amount followed by a currency word once', () => {
        expect(parseAmount('$5000 USD from the state', { sentinels }).amount).toBe(5000);
    });

    it('should not take a k or m starting a word as a multiplier', () => {
        expect(parseAmount('$3,000 K-12 outreach grant', { sentinels }).amount).toBe(3000);
        expect(parseAmount('$1,200 M.S. thesis support', { sentinels }).amount).toBe(1200);
        expect(parseAmount('$2m.', { sentinels }).amount).toBe(2);
        expect(parseAmount('$2m award', { sentinels }).amount).toBe(2000000);
    });

    it('should recover a bare number from the adjacent field', () => {
        expect(parseAmount('Follow-on grant awarded', { sentinels, adjacent: '250000' })).toEqual({
            amount: 250000,
            provenance: 'recovered-from-swap',
        });
        expect(parseAmount(null, { sentinels, adjacent: 1200 })).toEqual({
            amount: 1200,
            provenance: 'recovered-from-swap',
        });
    });

    it('should not consult the adjacent field for sentinels', () => {
        expect(parseAmount('NA', { sentinels, adjacent: '100' })).toEqual({ amount: 0, provenance: 'sentinel' });
    });

    it('should ignore adjacent prose', () => {
        expect(parseAmount(null, { sentinels, adjacent: 'Seed grant for 2 students' })).toEqual({
            amount: 0,
            provenance: 'absent',
        });
    });

    it('should scan fallback texts in order for currency amounts', () => {
        expect(parseAmount(null, { sentinels, fallbackTexts: [null, 'Travel award', '$3,500 from WRRC'] })).toEqual({
            amount: 3500,
            provenance: 'summed-from-text',
        });
        expect(parseAmount(null, { sentinels, adjacent: 'Seed grant', fallbackTexts: ['$900 USD', '$100'] })).toEqual({
            amount: 900,
            provenance: 'summed-from-text',
        });
    });

    it('should prefer the adjacent number over fallback texts', () => {
        expect(parseAmount(null, { sentinels, adjacent: '400', fallbackTexts: ['$900'] })).toEqual({
            amount: 400,
            provenance: 'recovered-from-swap',
        });
    });

    it('should default unparseable text to zero', () => {
        expect(parseAmount('pending review', { sentinels })).toEqual({ amount: 0, provenance: 'defaulted-to-zero' });
    });

    it('should report absent input as absent', () => {
        expect(parseAmount(null, { sentinels })).toEqual({ amount: 0, provenance: 'absent' });
        expect(parseAmount('   ', { sentinels })).toEqual({ amount: 0, provenance: 'absent' });
        expect(parseAmount(undefined, { sentinels })).toEqual({ amount: 0, provenance: 'absent' });
    });

    it('should never return a negative amount', () => {
        expect(parseAmount(-500, { sentinels })).toEqual({ amount: 0, provenance: 'defaulted-to-zero' });
        expect(parseAmount('-500', { sentinels })).toEqual({ amount: 0, provenance: 'defaulted-to-zero' });
    });
});

describe('parseCount', () => {
    it('should parse counts and keep fractions', () => {
        expect(parseCount('3', { sentinels })).toEqual({ amount: 3, provenance: 'direct' });
        expect(parseCount(2.5, { sentinels })).toEqual({ amount: 2.5, provenance: 'direct' });
    });

    it('should handle sentinels, prose and absence', () => {
        expect(parseCount('NA', { sentinels })).toEqual({ amount: 0, provenance: 'sentinel' });
        expect(parseCount('three', { sentinels })).toEqual({ amount: 0, provenance: 'defaulted-to-zero' });
        expect(parseCount(null, { sentinels })).toEqual({ amount: 0, provenance: 'absent' });
    });
});

describe('sumCurrencyMentions', () => {
    it('should return null when nothing is mentioned', () => {
        expect(sumCurrencyMentions('no money here')).toBeNull();
    });

    it('should ignore numbers without a currency marker', () => {
        expect(sumCurrencyMentions('2 students and $300 for supplies')).toBe(300);
    });
});
