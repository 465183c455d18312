/**
 * Answer synthesis from structured context
 *
 * The prompt restricts the model to the supplied context. Sections with no
 * data are left out entirely so the model is not told that data exists when
 * it does not. The completion text is returned as-is.
 */

import type { StructuredContext } from '../core/types.js';
import type { CompletionService } from '../services/completion-service.js';

export function formatContext(context: StructuredContext): string {
  const sections: string[] = [];

  if (context.concepts.length > 0) {
    sections.push(`Concepts:\n${context.concepts.join(', ')}`);
  }
  if (context.relationships.length > 0) {
    sections.push(`Relationships:\n${context.relationships.join('\n')}`);
  }
  if (context.documents.length > 0) {
    sections.push(`Documents:\n${context.documents.join('\n')}`);
  }

  return sections.join('\n\n');
}

export function buildAnswerPrompt(question: string, context: StructuredContext): string {
  return `You are a university tutor.

Answer using this structure:
1. Definition
2. Objectives
3. Components / Tools
4. Integration Levels
5. Benefits
6. Example

ONLY use the context below.

Context:
${formatContext(context)}

Question: ${question}`;
}

export class AnswerSynthesizer {
  private completion: CompletionService;

  constructor(completion: CompletionService) {
    this.completion = completion;
  }

  async synthesize(question: string, context: StructuredContext, signal?: AbortSignal): Promise<string> {
    return this.completion.complete(buildAnswerPrompt(question, context), signal);
  }
}
