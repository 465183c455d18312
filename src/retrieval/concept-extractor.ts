/**
 * Main-concept extraction for incoming questions
 */

import type { CompletionService } from '../services/completion-service.js';

export function buildConceptPrompt(question: string): string {
  return `Extract the main academic concept from this question.
Return ONLY the concept name.

Question: ${question}`;
}

/**
 * Trim the reply and drop wrapping quotes and a trailing period
 */
export function normalizeConcept(reply: string): string {
  let concept = reply.trim();

  const quoted = /^(["'`])(.*)\1$/s.exec(concept);
  if (quoted) {
    concept = quoted[2].trim();
  }

  return concept.replace(/\.$/, '').trim();
}

export class ConceptExtractor {
  private completion: CompletionService;

  constructor(completion: CompletionService) {
    this.completion = completion;
  }

  async extract(question: string, signal?: AbortSignal): Promise<string> {
    const reply = await this.completion.complete(buildConceptPrompt(question), signal);
    return normalizeConcept(reply);
  }
}
