import { z } from "zod";

export const MISSING_WORDS_MESSAGE = "Input must contain a list of words";
export const INVALID_WORDS_MESSAGE = "Words must be provided as a non-empty list of strings";
export const INVALID_TOP_N_MESSAGE = "top_n must be a positive integer";

const WordSchema = z
    .string({ invalid_type_error: INVALID_WORDS_MESSAGE })
    .min(1, INVALID_WORDS_MESSAGE);

const TopNSchema = z
    .number({ invalid_type_error: INVALID_TOP_N_MESSAGE })
    .int(INVALID_TOP_N_MESSAGE)
    .positive(INVALID_TOP_N_MESSAGE);

// Request body for POST /find_common_word; top_n falls back to the configured default
export const FindCommonWordRequestSchema = z.object(
    {
        words: z
            .array(WordSchema, {
                required_error: MISSING_WORDS_MESSAGE,
                invalid_type_error: INVALID_WORDS_MESSAGE
            })
            .min(1, INVALID_WORDS_MESSAGE),
        top_n: TopNSchema.optional()
    },
    {
        required_error: MISSING_WORDS_MESSAGE,
        invalid_type_error: MISSING_WORDS_MESSAGE
    }
);

export type FindCommonWordRequest = z.infer<typeof FindCommonWordRequestSchema>;

export type ParsedRequest =
    | { success: true; data: FindCommonWordRequest }
    | { success: false; message: string };

export function parseFindCommonWordRequest(body: unknown): ParsedRequest {
    const result = FindCommonWordRequestSchema.safeParse(body);
    if (result.success) {
        return { success: true, data: result.data };
    }
    return { success: false, message: result.error.issues[0]?.message ?? MISSING_WORDS_MESSAGE };
}
