/**
 * Note Extraction Service
 *
 * Sends a caregiver note to OpenAI and turns the JSON reply into checklist and
 * plan items the actionable-step processor can persist.
 */

import axios, { AxiosInstance } from 'axios';
import * as functions from 'firebase-functions';
import { z } from 'zod';
import { openAIConfig } from '../config';
import { isTransientHttpError, withRetry } from '../utils/retryUtils';
import { safeParseJson } from './openai/jsonParser';
import { validateScheduleDefinition } from './scheduleDefinition';
import { ScheduleValidationError } from './scheduleErrors';
import type { ActionableStepsInput, ChecklistItem, PlanItem } from '../types/schedule';

const BASE_URL = 'https://api.openai.com/v1';

export const NOTE_EXTRACTION_SYSTEM_PROMPT = [
    'You are a medical assistant that extracts actionable steps from a caregiver note.',
    "Return a JSON object with a 'checklist' (list of one-time tasks) and a 'plan' (list of recurring tasks).",
    '',
    'Checklist tasks have:',
    "  - 'description': a brief description of the task",
    "  - 'priority': High, Medium or Low",
    '',
    'Plan tasks have:',
    "  - 'description': e.g. \"Take 500mg of Paracetamol\"",
    "  - 'start_date': YYYY-MM-DD",
    "  - 'duration': number of days the plan runs",
    "  - 'frequency': fixed_time, interval_based or frequency_based",
    "  - 'specific_times': HH:MM times for fixed_time (e.g. [\"08:00\", \"20:00\"])",
    "  - 'interval_hours': hours between occurrences for interval_based",
    "  - 'times_per_day': occurrences per day for frequency_based",
    '',
    'Medication descriptions include the drug name and dosage.',
    'Respond with JSON only, no markdown code fences.',
].join('\n');

export class NoteExtractionError extends Error {
    readonly code = 'extraction_failed' as const;

    constructor(message: string) {
        super(message);
        this.name = 'NoteExtractionError';
    }
}

export type NoteInput = {
    noteId: string;
    patientId: string;
    content: string;
};

const extractedChecklistItemSchema = z.object({
    description: z.string().trim().min(1),
    priority: z.enum(['High', 'Medium', 'Low']).optional(),
});

const extractedPlanItemSchema = z.object({
    description: z.string().trim().min(1),
    start_date: z
        .string()
        .regex(/^\d{4}-\d{2}-\d{2}$/)
        .nullish(),
    duration: z.number(),
    frequency: z.enum(['fixed_time', 'interval_based', 'frequency_based']),
    specific_times: z.array(z.string()).nullish(),
    interval_hours: z.number().nullish(),
    times_per_day: z.number().nullish(),
});

const extractionResponseSchema = z.object({
    checklist: z.array(extractedChecklistItemSchema),
    plan: z.array(extractedPlanItemSchema),
});

type ExtractedPlanItem = z.infer<typeof extractedPlanItemSchema>;

function toScheduleCandidate(item: ExtractedPlanItem): Record<string, unknown> {
    switch (item.frequency) {
        case 'fixed_time':
            return { type: item.frequency, duration: item.duration, specificTimes: item.specific_times };
        case 'interval_based':
            return { type: item.frequency, duration: item.duration, intervalHours: item.interval_hours };
        case 'frequency_based':
            return { type: item.frequency, duration: item.duration, timesPerDay: item.times_per_day };
    }
}

/**
 * Maps a parsed extraction payload onto checklist and plan items for one note.
 * Schedules are validated here so bad model output never reaches the store.
 */
export function mapExtractionPayload(payload: unknown, note: NoteInput): ActionableStepsInput {
    const parsed = extractionResponseSchema.safeParse(payload);
    if (!parsed.success) {
        const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
        throw new ScheduleValidationError(`Extraction payload for note ${note.noteId} is invalid`, issues);
    }

    const checklist: ChecklistItem[] = parsed.data.checklist.map((item) => ({
        description: item.description,
        priority: item.priority ?? 'Medium',
    }));

    const plan: PlanItem[] = parsed.data.plan.map((item, index) => ({
        description: item.description,
        patientId: note.patientId,
        schedule: validateScheduleDefinition(toScheduleCandidate(item), `plan[${index}].schedule`),
        startDate: item.start_date ? new Date(`${item.start_date}T00:00:00.000Z`) : null,
    }));

    return { noteId: note.noteId, checklist, plan };
}

export class NoteExtractionService {
    private client: AxiosInstance;
    private model: string;

    constructor(apiKey: string, model: string) {
        if (!apiKey) {
            throw new Error('OpenAI API key is not configured');
        }

        this.model = model || 'gpt-4o-mini';

        this.client = axios.create({
            baseURL: BASE_URL,
            headers: {
                Authorization: `Bearer ${apiKey}`,
                'Content-Type': 'application/json',
            },
            timeout: 60000,
        });
    }

    async extract(note: NoteInput): Promise<ActionableStepsInput> {
        if (!note.content || !note.content.trim()) {
            throw new ScheduleValidationError('Note content cannot be empty');
        }

        functions.logger.info(
            `[NoteExtraction] Processing note ${note.noteId} for patient ${note.patientId}`,
        );

        const response = await withRetry(
            () =>
                this.client.post('/chat/completions', {
                    model: this.model,
                    temperature: 0.3,
                    response_format: { type: 'json_object' },
                    messages: [
                        { role: 'system', content: NOTE_EXTRACTION_SYSTEM_PROMPT },
                        {
                            role: 'user',
                            content: `Extract actionable steps from this caregiver note:\n${note.content}`,
                        },
                    ],
                }),
            {
                shouldRetry: isTransientHttpError,
                onRetry: (error, attempt) => {
                    functions.logger.warn(
                        `[NoteExtraction] Attempt ${attempt} failed for note ${note.noteId}, retrying`,
                        error,
                    );
                },
            },
        );

        const content: unknown = response.data?.choices?.[0]?.message?.content;
        if (typeof content !== 'string' || !content.trim()) {
            throw new NoteExtractionError(`OpenAI returned an empty response for note ${note.noteId}`);
        }

        const { data, error } = safeParseJson(content);
        if (error) {
            functions.logger.error('[NoteExtraction] Failed to parse JSON response', { error, content });
            throw new NoteExtractionError('OpenAI returned an invalid JSON response');
        }

        return mapExtractionPayload(data, note);
    }
}

let noteExtractionServiceInstance: NoteExtractionService | null = null;

export const getNoteExtractionService = (): NoteExtractionService => {
    if (!noteExtractionServiceInstance) {
        noteExtractionServiceInstance = new NoteExtractionService(
            openAIConfig.apiKey,
            openAIConfig.model,
        );
    }

    return noteExtractionServiceInstance;
};
