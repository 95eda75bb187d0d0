/**
 * Lenient JSON extraction from model output: raw JSON, a fenced code
 * block, or the outermost `{...}` span.
 */
export function extractJSON(text: string): unknown {
  const trimmed = text.trim();
  try {
    return JSON.parse(trimmed);
  } catch {
    const jsonMatch = trimmed.match(/```(?:json)?\s*([\s\S]*?)```/);
    if (jsonMatch && jsonMatch[1]) {
      return JSON.parse(jsonMatch[1].trim());
    }

    const objectMatch = trimmed.match(/\{[\s\S]*\}/);
    if (objectMatch) {
      return JSON.parse(objectMatch[0]);
    }

    throw new Error(`Failed to parse JSON from LLM response: ${trimmed.slice(0, 200)}...`);
  }
}

export const JSON_INSTRUCTIONS = `
IMPORTANT: Respond with valid JSON only. No markdown, no code blocks, just raw JSON.
Do not include any text before or after the JSON object.
`;
