/**
 * Unit tests for Query Processor
 *
 * Tests the validateQuery function to ensure it correctly:
 * - Accepts valid queries
 * - Rejects missing, non-string, empty, whitespace-only and oversized queries
 *
 * Tests request parsing for training and single-FAQ payloads.
 */

import * as fc from 'fast-check';
import {
    validateQuery,
    buildProfileFromRequest,
    parseFaqInput,
    parseFaqChanges,
} from '../queryProcessor';
import { SchemaError } from '../errors';
import { IndustryFaqTable } from '../profileBridge';

describe('validateQuery', () => {
    describe('valid queries', () => {
        it('should accept a simple text query', () => {
            const result = validateQuery('What are your hours?');
            expect(result.valid).toBe(true);
            expect(result.error).toBeUndefined();
        });

        it('should accept a query with leading/trailing spaces (content exists)', () => {
            expect(validateQuery('  Do you deliver?  ').valid).toBe(true);
        });

        it('should accept a single character query', () => {
            expect(validateQuery('?').valid).toBe(true);
        });

        it('should measure length after trimming', () => {
            expect(validateQuery('  abc  ', 3).valid).toBe(true);
        });
    });

    describe('invalid queries', () => {
        it('should reject a missing query', () => {
            expect(validateQuery(undefined)).toEqual({ valid: false, error: 'Query is required' });
            expect(validateQuery(null)).toEqual({ valid: false, error: 'Query is required' });
        });

        it('should reject a non-string query', () => {
            expect(validateQuery(42)).toEqual({ valid: false, error: 'Query must be a string' });
        });

        it('should reject an empty string', () => {
            expect(validateQuery('')).toEqual({
                valid: false,
                error: 'Query cannot be empty or contain only whitespace',
            });
        });

        it('should reject a query longer than the limit', () => {
            expect(validateQuery('a'.repeat(11), 10)).toEqual({
                valid: false,
                error: 'Query cannot be longer than 10 characters',
            });
        });
    });

    describe('properties', () => {
        it('should reject every whitespace-only string', () => {
            fc.assert(
                fc.property(fc.stringOf(fc.constantFrom(' ', '\t', '\n', '\r')), (query) => {
                    expect(validateQuery(query).valid).toBe(false);
                })
            );
        });

        it('should accept every string with visible content within the limit', () => {
            fc.assert(
                fc.property(
                    fc.string({ minLength: 1, maxLength: 100 }).filter((s) => s.trim().length > 0),
                    (query) => {
                        expect(validateQuery(query).valid).toBe(true);
                    }
                )
            );
        });
    });
});

describe('buildProfileFromRequest', () => {
    const industryFaqs: IndustryFaqTable = {
        retail: [
            { question: 'What are your store hours?', answer: 'Open 9 to 6.', tags: ['hours'] },
            { question: 'Do you offer returns?', answer: 'Within 30 days.' },
        ],
    };

    it('should combine structured FAQs and FAQ text, in that order', () => {
        const profile = buildProfileFromRequest({
            name: ' Corner Shop ',
            faqs: [{ question: ' What are your hours? ', answer: '9-5 Mon-Fri', tags: ['hours'] }],
            faqText: 'Q: Where are you located? A: 123 Main St',
        });

        expect(profile).toEqual({
            name: 'Corner Shop',
            description: '',
            faqs: [
                { question: 'What are your hours?', answer: '9-5 Mon-Fri', tags: ['hours'] },
                { question: 'Where are you located?', answer: '123 Main St' },
            ],
        });
    });

    it('should add industry starters on request', () => {
        const profile = buildProfileFromRequest(
            {
                name: 'Corner Shop',
                description: 'Neighborhood grocery',
                industry: 'retail',
                includeIndustryFaqs: true,
                faqs: [{ question: 'Do you offer returns?', answer: 'No, sorry.' }],
            },
            industryFaqs
        );

        expect(profile.industry).toBe('retail');
        expect(profile.faqs).toEqual([
            { question: 'Do you offer returns?', answer: 'No, sorry.' },
            { question: 'What are your store hours?', answer: 'Open 9 to 6.', tags: ['hours'] },
        ]);
    });

    it('should not add starters unless asked', () => {
        const profile = buildProfileFromRequest(
            { name: 'Corner Shop', industry: 'retail', faqs: [{ question: 'Q', answer: 'A' }] },
            industryFaqs
        );
        expect(profile.faqs).toHaveLength(1);
    });

    it('should accept a profile made only of starters', () => {
        const profile = buildProfileFromRequest(
            { name: 'Corner Shop', industry: 'retail', includeIndustryFaqs: true },
            industryFaqs
        );
        expect(profile.faqs).toHaveLength(2);
    });

    it('should reject a request without FAQs', () => {
        expect(() => buildProfileFromRequest({ name: 'Corner Shop', faqText: 'no pairs here' })).toThrow(
            'Invalid training request: faqs: provide at least one FAQ (faqs, faqText or industry starters)'
        );
    });

    it('should reject a request without a name', () => {
        expect(() => buildProfileFromRequest({ faqs: [{ question: 'Q', answer: 'A' }] })).toThrow(SchemaError);
    });

    it('should reject an FAQ with an empty answer', () => {
        expect(() =>
            buildProfileFromRequest({ name: 'Shop', faqs: [{ question: 'Q', answer: '   ' }] })
        ).toThrow('Invalid training request: faqs.0.answer: answer must not be empty');
    });
});

describe('parseFaqInput', () => {
    it('should trim and return a valid FAQ', () => {
        expect(parseFaqInput({ id: 'parking', question: ' Do you have parking? ', answer: 'Yes' })).toEqual({
            id: 'parking',
            question: 'Do you have parking?',
            answer: 'Yes',
        });
    });

    it('should reject a blank question', () => {
        expect(() => parseFaqInput({ question: '  ', answer: 'Yes' })).toThrow(SchemaError);
    });
});

describe('parseFaqChanges', () => {
    it('should accept a partial update', () => {
        expect(parseFaqChanges({ answer: 'Now 10-6' })).toEqual({ answer: 'Now 10-6' });
    });

    it('should reject an update that changes nothing', () => {
        expect(() => parseFaqChanges({})).toThrow(
            'Invalid FAQ update: body: at least one of question, answer or tags is required'
        );
    });
});
