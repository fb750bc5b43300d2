import { DETECTION_RULES, scanText } from '../regex-detection';
import { PII_CATEGORIES } from '../types';

describe('scanText', () => {
    it('returns an empty list for text without sensitive data', () => {
        expect(scanText('Quarterly report, nothing to see here.')).toEqual([]);
        expect(scanText('')).toEqual([]);
    });

    it('finds a single email with its span', () => {
        expect(scanText('contact: a@b.co')).toEqual([
            { category: 'email', startOffset: 9, endOffset: 15, matchedText: 'a@b.co' },
        ]);
    });

    it('accepts dots, plus and hyphen in the local part', () => {
        const matches = scanText('send to first.last+tag@mail.example-host.org today');
        expect(matches.map((m) => m.matchedText)).toEqual(['first.last+tag@mail.example-host.org']);
    });

    it('requires a top-level domain of at least two letters', () => {
        expect(scanText('a@b.c')).toEqual([]);
    });

    it('finds a hyphenated credit card number', () => {
        expect(scanText('Card: 4111-1111-1111-1111')).toEqual([
            { category: 'credit_card', startOffset: 6, endOffset: 25, matchedText: '4111-1111-1111-1111' },
        ]);
    });

    it('finds space separated and contiguous card numbers', () => {
        expect(scanText('4111 1111 1111 1111').map((m) => m.category)).toEqual(['credit_card']);
        expect(scanText('4111111111111111')).toEqual([
            { category: 'credit_card', startOffset: 0, endOffset: 16, matchedText: '4111111111111111' },
        ]);
    });

    it('accepts mixed spaces and hyphens between card groups', () => {
        expect(scanText('card 4111 1111-1111 1111 on file')).toEqual([
            { category: 'credit_card', startOffset: 5, endOffset: 24, matchedText: '4111 1111-1111 1111' },
        ]);
    });

    it('finds a hyphenated SSN', () => {
        expect(scanText('SSN: 123-45-6789')).toEqual([
            { category: 'ssn', startOffset: 5, endOffset: 16, matchedText: '123-45-6789' },
        ]);
    });

    it('finds a contiguous SSN but not nine digits inside a longer run', () => {
        expect(scanText('id 123456789').map((m) => m.matchedText)).toEqual(['123456789']);
        expect(scanText('4111111111111111', ['ssn'])).toEqual([]);
    });

    it.each([
        '(555) 234-5678',
        '555.234.5678',
        '555-234-5678',
        '+1 555 234 5678',
        '1-800-555-0199',
        '5552345678',
        '+12125551234',
        '12125551234',
        '1(212)555-1234',
    ])(
        'finds the phone number %s',
        (phone) => {
            expect(scanText(phone)).toEqual([
                { category: 'phone', startOffset: 0, endOffset: phone.length, matchedText: phone },
            ]);
        },
    );

    it('finds a prefixed number without a separator inside a sentence', () => {
        expect(scanText('call +12125551234 now')).toEqual([
            { category: 'phone', startOffset: 5, endOffset: 17, matchedText: '+12125551234' },
        ]);
        expect(scanText('call 12125551234 now')).toEqual([
            { category: 'phone', startOffset: 5, endOffset: 16, matchedText: '12125551234' },
        ]);
    });

    it('rejects exchange codes starting with 0 or 1', () => {
        expect(scanText('555-123-4567')).toEqual([]);
    });

    it('orders matches from different categories by start offset', () => {
        const text = 'SSN 123-45-6789, mail bob@example.com, phone 555-234-5678';
        expect(scanText(text).map((m) => [m.category, m.matchedText])).toEqual([
            ['ssn', '123-45-6789'],
            ['email', 'bob@example.com'],
            ['phone', '555-234-5678'],
        ]);
    });

    it('reports overlapping matches of different categories', () => {
        const text = '123-45-6789 0123 4567 8901';
        expect(scanText(text)).toEqual([
            { category: 'ssn', startOffset: 0, endOffset: 11, matchedText: '123-45-6789' },
            { category: 'credit_card', startOffset: 7, endOffset: 26, matchedText: '6789 0123 4567 8901' },
        ]);
    });

    it('only scans the requested categories', () => {
        const text = 'a@b.co 123-45-6789';
        expect(scanText(text, ['ssn']).map((m) => m.category)).toEqual(['ssn']);
        expect(scanText(text, [])).toEqual([]);
    });

    it('finds every non-overlapping occurrence of one rule', () => {
        expect(scanText('x@y.io, x@y.io').map((m) => m.startOffset)).toEqual([0, 8]);
    });

    it('finds nothing in already masked text', () => {
        expect(scanText('[EMAIL MASKED] [PHONE MASKED] [CREDIT CARD MASKED] [SSN MASKED]')).toEqual([]);
    });
});

describe('DETECTION_RULES', () => {
    it('is a frozen table in category declaration order', () => {
        expect(DETECTION_RULES.map((rule) => rule.category)).toEqual([...PII_CATEGORIES]);
        expect(Object.isFrozen(DETECTION_RULES)).toBe(true);
    });

    it('is left untouched by scanning', () => {
        scanText('a@b.co 555-234-5678 4111111111111111 123-45-6789');
        expect(DETECTION_RULES.every((rule) => rule.pattern.lastIndex === 0)).toBe(true);
    });
});
