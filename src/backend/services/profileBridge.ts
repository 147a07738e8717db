/**
 * Profile Bridge
 *
 * Converts a BusinessProfile to and from the portable export record, and
 * handles the other ways FAQs arrive: "Q: ... A: ..." free text, and
 * industry starter FAQs.
 *
 * The portable record is plain JSON so it can be diffed and edited by hand.
 * It never carries embeddings: encoders change between exports, so
 * embeddings are always recomputed from question text after import.
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { BusinessProfile, FaqInput, PortableProfile } from '../../shared/types';
import { normalizeText } from '../encoders/encoder';
import { SchemaError } from './errors';
import { normalizeTags } from './faqIndex';

export const EXPORT_FORMAT_VERSION = '1.0';

/**
 * Default location of the industry starter FAQ table.
 */
export const DEFAULT_INDUSTRY_FAQS_PATH = path.join(__dirname, '..', '..', '..', 'data', 'industries.json');

// Unknown keys are stripped.
const portableFaqSchema = z.object({
    question: z.string(),
    answer: z.string(),
    tags: z.array(z.string()).optional().default([]),
});

const portableProfileSchema = z.object({
    business_name: z.string().trim().min(1, 'business_name must not be empty'),
    description: z.string().optional().default(''),
    industry: z.string().optional(),
    faqs: z.array(portableFaqSchema),
    metadata: z
        .object({
            created_at: z.string().optional(),
            version: z.string().optional(),
        })
        .optional(),
});

const industryTableSchema = z.record(
    z.array(
        z.object({
            question: z.string().min(1),
            answer: z.string().min(1),
            tags: z.array(z.string()).optional(),
        })
    )
);

export type IndustryFaqTable = z.infer<typeof industryTableSchema>;

function formatIssues(error: z.ZodError): string[] {
    return error.issues.map((issue) => {
        const where = issue.path.length > 0 ? issue.path.join('.') : 'record';
        return `${where}: ${issue.message}`;
    });
}

function hasContent(faq: { question: string; answer: string }): boolean {
    return faq.question.trim().length > 0 && faq.answer.trim().length > 0;
}

/**
 * Build the portable record for a profile.
 *
 * @param now - Timestamp for metadata.created_at (defaults to the current time)
 */
export function exportProfile(profile: BusinessProfile, now: Date = new Date()): PortableProfile {
    const record: PortableProfile = {
        business_name: profile.name,
        description: profile.description,
        faqs: profile.faqs.map((faq) => ({
            question: faq.question,
            answer: faq.answer,
            tags: normalizeTags(faq.tags),
        })),
        metadata: {
            created_at: now.toISOString(),
            version: EXPORT_FORMAT_VERSION,
        },
    };
    if (profile.industry) {
        record.industry = profile.industry;
    }
    return record;
}

/**
 * Rebuild a profile from a portable record.
 *
 * FAQ items with a blank question or answer are skipped, as long as at
 * least one complete FAQ remains. No partial profile is ever returned.
 *
 * @throws SchemaError if required fields are missing or malformed, or no
 *         FAQ has both a question and an answer
 */
export function importProfile(record: unknown): BusinessProfile {
    const parsed = portableProfileSchema.safeParse(record);
    if (!parsed.success) {
        const issues = formatIssues(parsed.error);
        throw new SchemaError(`Invalid chatbot export: ${issues.join('; ')}`, issues);
    }

    const data = parsed.data;
    const faqs: FaqInput[] = data.faqs.filter(hasContent).map((faq) => ({
        question: faq.question,
        answer: faq.answer,
        tags: normalizeTags(faq.tags),
    }));

    if (faqs.length === 0) {
        const issue = 'faqs: at least one FAQ with a nonempty question and answer is required';
        throw new SchemaError(`Invalid chatbot export: ${issue}`, [issue]);
    }

    const profile: BusinessProfile = {
        name: data.business_name,
        description: data.description,
        faqs,
    };
    if (data.industry) {
        profile.industry = data.industry;
    }
    return profile;
}

/**
 * Serialize a profile to the textual export format.
 */
export function serializeProfile(profile: BusinessProfile, now?: Date): string {
    return `${JSON.stringify(exportProfile(profile, now), null, 2)}\n`;
}

/**
 * Parse export text back into a profile.
 *
 * @throws SchemaError on invalid JSON or an invalid record
 */
export function parseProfileJson(text: string): BusinessProfile {
    let record: unknown;
    try {
        record = JSON.parse(text);
    } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        throw new SchemaError(`Chatbot export is not valid JSON: ${message}`, [message]);
    }
    return importProfile(record);
}

/**
 * Write the export of a profile to disk.
 *
 * Writes to a temp file, then renames it into place.
 */
export async function saveProfileToFile(filePath: string, profile: BusinessProfile, now?: Date): Promise<string> {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    const tempPath = `${filePath}.tmp`;
    fs.writeFileSync(tempPath, serializeProfile(profile, now));
    fs.renameSync(tempPath, filePath);
    return filePath;
}

/**
 * Read and validate an export file.
 */
export async function loadProfileFromFile(filePath: string): Promise<BusinessProfile> {
    return parseProfileJson(fs.readFileSync(filePath, 'utf-8'));
}

/**
 * Parse FAQs written as free text, one pair per line:
 *
 *   Q: What are your hours? A: 9-5 Monday to Friday
 *
 * Lines without both markers, or with an empty side, are ignored.
 */
export function parseFaqText(rawText: string): FaqInput[] {
    const pairs: FaqInput[] = [];
    for (const line of rawText.split(/\r?\n/)) {
        const match = /Q:\s*(.*?)\s*A:\s*(.*)$/.exec(line);
        const question = match?.[1]?.trim();
        const answer = match?.[2]?.trim();
        if (question && answer) {
            pairs.push({ question, answer });
        }
    }
    return pairs;
}

/**
 * Load the industry starter FAQ table.
 *
 * @throws SchemaError if the file doesn't match the expected shape
 */
export function loadIndustryFaqs(filePath: string = DEFAULT_INDUSTRY_FAQS_PATH): IndustryFaqTable {
    let raw: unknown;
    try {
        raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
    } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        throw new SchemaError(`Cannot read industry FAQs from ${filePath}: ${message}`, [message]);
    }

    const parsed = industryTableSchema.safeParse(raw);
    if (!parsed.success) {
        const issues = formatIssues(parsed.error);
        throw new SchemaError(`Invalid industry FAQ table: ${issues.join('; ')}`, issues);
    }
    return parsed.data;
}

/**
 * Append the starter FAQs for the profile's industry.
 *
 * Starters whose question the business already answers (compared after
 * normalization) are skipped. Unknown or missing industries leave the
 * profile unchanged.
 */
export function withIndustryFaqs(profile: BusinessProfile, table: IndustryFaqTable): BusinessProfile {
    const key = profile.industry?.trim().toLowerCase();
    const starters = key !== undefined && Object.hasOwn(table, key) ? table[key] : undefined;
    if (!starters || starters.length === 0) {
        return profile;
    }

    const known = new Set(profile.faqs.map((faq) => normalizeText(faq.question)));
    const additions = starters
        .filter((starter) => !known.has(normalizeText(starter.question)))
        .map((starter) => ({
            question: starter.question,
            answer: starter.answer,
            tags: normalizeTags(starter.tags),
        }));

    return { ...profile, faqs: [...profile.faqs, ...additions] };
}
