import type { JsonObject } from '../types/index.js';

export const DESIGN_SYSTEM_PROMPT = `You turn a building design brief into a structured design specification.

Rules:
1. Reply with a single JSON object and nothing else
2. Include "design_type", "stories", "dimensions" (length, width, height in meters), "rooms" and "materials"
3. Use the context values when present instead of inventing them
4. Keep every value concrete - no placeholders or ranges`;

export function buildDesignPrompt(prompt: string, context: JsonObject): string {
  const contextKeys = Object.keys(context);
  if (contextKeys.length === 0) {
    return `Brief:\n${prompt}`;
  }
  return `Brief:\n${prompt}\n\nContext:\n${JSON.stringify(context, null, 2)}`;
}
