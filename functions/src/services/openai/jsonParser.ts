/**
 * JSON Parser Utilities
 *
 * Extracts JSON from LLM responses which may contain code fences,
 * extra text, or malformed output.
 */

/**
 * Extract JSON block from LLM response content.
 * Handles:
 * - JSON wrapped in code fences (```json ... ```)
 * - Raw JSON objects
 * - JSON with leading text
 */
export const extractJsonBlock = (content: string): string => {
    const codeFenceMatch = content.match(/```(?:json)?([\s\S]*?)```/i);
    if (codeFenceMatch) {
        return codeFenceMatch[1].trim();
    }

    const jsonMatch = content.match(/\{[\s\S]*\}$/);
    if (jsonMatch) {
        return jsonMatch[0];
    }

    return content.trim();
};

/**
 * Parse the JSON block of an LLM response without throwing.
 */
export const safeParseJson = (
    content: string,
): { data: unknown; error: string | null } => {
    try {
        return { data: JSON.parse(extractJsonBlock(content)), error: null };
    } catch (error) {
        return {
            data: null,
            error: error instanceof Error ? error.message : 'Unknown parsing error',
        };
    }
};
