import { ValidationError } from "@/lib/errors";

export function extractJSON(raw: string): string {
  // Try to extract a JSON object from the response (handle markdown code blocks)
  const codeBlockMatch = raw.match(/```(?:json)?\s*([\s\S]*?)```/);
  if (codeBlockMatch) return codeBlockMatch[1].trim();

  // Try to find the outermost object directly
  const objectMatch = raw.match(/\{[\s\S]*\}/);
  if (objectMatch) return objectMatch[0];

  return raw.trim();
}

/**
 * Parse a model response into a plain value. Shape checks happen later,
 * against the report schema.
 */
export function parseLLMResponse(rawResponse: string): unknown {
  const jsonStr = extractJSON(rawResponse);
  try {
    return JSON.parse(jsonStr);
  } catch (error) {
    console.error("[LLM] Failed to parse response:", error instanceof Error ? error.message : error);
    throw new ValidationError("Narrative response is not valid JSON");
  }
}
