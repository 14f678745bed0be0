import { TemplateError } from "../errors/errors";
import { PromptTemplate, RetrievedContext } from "./types";

export const DEFAULT_CONTEXT_SEPARATOR = "\n\n---\n\n";

export const DEFAULT_PROMPT_TEMPLATE = `You are an assistant that answers questions using only the provided context.

Question:
{question}

Context:
{context}

Instructions:
- If the answer is not in the context, say you don't know.
- Answer in a concise and precise way.
{instructions}

Answer:`;

const REQUIRED_SLOTS = ["question", "context"] as const;
const SLOT_PATTERN = /\{(question|context|instructions)\}/g;

export function assertTemplateSlots(templateText: string): void {
  const missing = REQUIRED_SLOTS.filter((slot) => !templateText.includes(`{${slot}}`));
  if (missing.length > 0) {
    throw new TemplateError(
      `Prompt template is missing required slot(s): ${missing.map((s) => `{${s}}`).join(", ")}`
    );
  }
}

export function buildContextBlock(
  contexts: RetrievedContext[],
  separator: string = DEFAULT_CONTEXT_SEPARATOR,
  maxChars = 0
): string {
  const parts: string[] = [];
  let total = 0;

  for (const context of contexts) {
    const text = context.text.trim();
    if (!text) continue;
    if (maxChars > 0 && total + text.length > maxChars) break;
    parts.push(text);
    total += text.length;
  }

  return parts.join(separator);
}

/**
 * Renders the generation prompt. Pure: same inputs, same string.
 * Slots are filled in one pass so text coming from contexts is never re-expanded.
 */
export function buildPrompt(
  query: string,
  contexts: RetrievedContext[],
  template: PromptTemplate
): string {
  assertTemplateSlots(template.text);

  const values: Record<string, string> = {
    question: query,
    context: buildContextBlock(contexts, template.separator, template.maxContextChars),
    instructions: template.instructions ?? "",
  };

  return template.text.replace(SLOT_PATTERN, (_match, slot: string) => values[slot] ?? "");
}
