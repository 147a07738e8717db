/**
 * Query Processor Service
 *
 * Validates what the API layer receives before it reaches a chatbot.
 *
 * Key responsibilities:
 * - Validate user queries before matching (reject empty/whitespace/oversized)
 * - Turn a training request (structured FAQs and/or "Q: ... A: ..." text,
 *   optional industry starters) into a BusinessProfile
 * - Validate single-FAQ payloads
 */

import { z } from 'zod';
import { BusinessProfile, FaqInput, TrainRequest, ValidationResult } from '../../shared/types';
import { DEFAULT_MAX_INPUT_LENGTH } from '../encoders/encoder';
import { SchemaError } from './errors';
import { IndustryFaqTable, parseFaqText, withIndustryFaqs } from './profileBridge';

const faqInputSchema = z.object({
    id: z.string().trim().min(1).optional(),
    question: z.string().trim().min(1, 'question must not be empty'),
    answer: z.string().trim().min(1, 'answer must not be empty'),
    tags: z.array(z.string()).optional(),
});

const faqChangesSchema = z
    .object({
        question: z.string().trim().min(1, 'question must not be empty').optional(),
        answer: z.string().trim().min(1, 'answer must not be empty').optional(),
        tags: z.array(z.string()).optional(),
    })
    .refine((changes) => Object.values(changes).some((v) => v !== undefined), {
        message: 'at least one of question, answer or tags is required',
    });

const trainRequestSchema = z.object({
    name: z.string().trim().min(1, 'name must not be empty'),
    description: z.string().optional(),
    industry: z.string().trim().min(1).optional(),
    includeIndustryFaqs: z.boolean().optional(),
    faqs: z.array(faqInputSchema).optional(),
    faqText: z.string().optional(),
});

function schemaError(prefix: string, error: z.ZodError): SchemaError {
    const issues = error.issues.map((issue) => {
        const where = issue.path.length > 0 ? issue.path.join('.') : 'body';
        return `${where}: ${issue.message}`;
    });
    return new SchemaError(`${prefix}: ${issues.join('; ')}`, issues);
}

/**
 * Validates a user query before processing.
 *
 * @param query - The user's input query string
 * @param maxLength - Longest accepted query, in characters after trimming
 * @returns ValidationResult indicating if the query is valid
 */
export function validateQuery(
    query: unknown,
    maxLength: number = DEFAULT_MAX_INPUT_LENGTH
): ValidationResult {
    if (query === null || query === undefined) {
        return {
            valid: false,
            error: 'Query is required',
        };
    }

    if (typeof query !== 'string') {
        return {
            valid: false,
            error: 'Query must be a string',
        };
    }

    // Using trim() handles spaces, tabs, newlines, and other whitespace chars
    const trimmedQuery = query.trim();

    if (trimmedQuery.length === 0) {
        return {
            valid: false,
            error: 'Query cannot be empty or contain only whitespace',
        };
    }

    if (trimmedQuery.length > maxLength) {
        return {
            valid: false,
            error: `Query cannot be longer than ${maxLength} characters`,
        };
    }

    return {
        valid: true,
    };
}

/**
 * Builds the profile to train from a request body.
 *
 * Structured FAQs come first, then pairs parsed from `faqText`, then (if
 * requested) the industry starter FAQs the business hasn't covered.
 *
 * @throws SchemaError if the body is malformed or yields no FAQs
 */
export function buildProfileFromRequest(
    body: unknown,
    industryFaqs?: IndustryFaqTable
): BusinessProfile {
    const parsed = trainRequestSchema.safeParse(body);
    if (!parsed.success) {
        throw schemaError('Invalid training request', parsed.error);
    }

    const request: TrainRequest = parsed.data;
    const faqs: FaqInput[] = [
        ...(request.faqs ?? []),
        ...(request.faqText ? parseFaqText(request.faqText) : []),
    ];

    let profile: BusinessProfile = {
        name: request.name.trim(),
        description: request.description?.trim() ?? '',
        faqs,
    };
    if (request.industry) {
        profile.industry = request.industry;
    }

    if (request.includeIndustryFaqs && industryFaqs) {
        profile = withIndustryFaqs(profile, industryFaqs);
    }

    if (profile.faqs.length === 0) {
        const issue = 'faqs: provide at least one FAQ (faqs, faqText or industry starters)';
        throw new SchemaError(`Invalid training request: ${issue}`, [issue]);
    }

    return profile;
}

/**
 * Validates a single FAQ payload.
 *
 * @throws SchemaError
 */
export function parseFaqInput(body: unknown): FaqInput {
    const parsed = faqInputSchema.safeParse(body);
    if (!parsed.success) {
        throw schemaError('Invalid FAQ', parsed.error);
    }
    return parsed.data;
}

/**
 * Validates a partial FAQ update.
 *
 * @throws SchemaError
 */
export function parseFaqChanges(body: unknown): Partial<Pick<FaqInput, 'question' | 'answer' | 'tags'>> {
    const parsed = faqChangesSchema.safeParse(body);
    if (!parsed.success) {
        throw schemaError('Invalid FAQ update', parsed.error);
    }
    return parsed.data;
}
