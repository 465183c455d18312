/**
 * LLM-based entity and relationship extraction for study material
 *
 * One completion call per chunk with a fixed instructional prompt. The model
 * is asked for strict JSON, but the reply is treated as untrusted text:
 * code fences are stripped, the outermost object is parsed and every field
 * goes through the sanitizer.
 *
 * A reply that cannot be parsed is a soft failure. The chunk yields nothing
 * and ingestion carries on.
 */

import type { ExtractionResult } from '../core/types.js';
import { ENTITY_TYPES, RELATIONSHIP_TYPES } from '../core/types.js';
import type { CompletionService } from '../services/completion-service.js';
import { sanitizeExtraction } from './sanitizer.js';
import { ErrorHandler, ErrorCategory, ErrorSeverity, toError } from '../utils/error-handler.js';

export interface KnowledgeExtractorConfig {
  /** Longest raw reply included in the failure log */
  maxLoggedResponseChars: number;
}

/**
 * Build the extraction prompt for one chunk
 */
export function buildExtractionPrompt(chunk: string): string {
  return `You are an academic knowledge graph extractor for university-level learning materials.

Extract ONLY study-relevant knowledge. Ignore:
- Copyright notices
- Slide numbers
- Repeated headings
- URLs
- Decorative text

PRIORITIZE:
1. Core concepts and definitions
2. Frameworks and models
3. Components or steps
4. Learning objectives
5. Case studies and examples
6. Cause-effect or purpose relationships

Text:
"""${chunk}"""

ENTITY TYPES:
${ENTITY_TYPES.map(type => `- ${type}`).join('\n')}

RELATIONSHIP TYPES:
${RELATIONSHIP_TYPES.map(type => `- ${type}`).join('\n')}

RULES:
- Entity names: 2-6 words
- No duplicates
- Canonical academic terms only

Return ONLY valid JSON:
{
  "entities": [
    {"name": "Integrated Marketing Communications", "type": "concept"}
  ],
  "relationships": [
    {"from": "Promotion Mix", "to": "Advertising", "type": "has_component"}
  ]
}`;
}

/**
 * Strip markdown fences and cut the reply down to its outermost `{...}` span
 */
export function extractJsonObject(response: string): string {
  const unfenced = response
    .trim()
    .replace(/```json\s*/gi, '')
    .replace(/\s*```/g, '');

  const start = unfenced.indexOf('{');
  const end = unfenced.lastIndexOf('}');

  return start !== -1 && end > start ? unfenced.slice(start, end + 1) : unfenced;
}

export class KnowledgeExtractor {
  private completion: CompletionService;
  private config: KnowledgeExtractorConfig;

  constructor(completion: CompletionService, config: Partial<KnowledgeExtractorConfig> = {}) {
    this.completion = completion;
    this.config = {
      maxLoggedResponseChars: config.maxLoggedResponseChars ?? 2000
    };
  }

  /**
   * Extract entities and relationships from a single chunk.
   *
   * Never throws for a bad reply or a failed call; only cancellation
   * propagates.
   */
  async extract(chunk: string, userId: string, signal?: AbortSignal): Promise<ExtractionResult> {
    let response = '';

    try {
      response = await this.completion.complete(buildExtractionPrompt(chunk), signal);
      const payload: unknown = JSON.parse(extractJsonObject(response));
      return sanitizeExtraction(payload);
    } catch (error) {
      if (signal?.aborted) {
        throw toError(error);
      }

      ErrorHandler.handle(
        ErrorCategory.EXTRACTION,
        ErrorSeverity.LOW,
        'Knowledge extraction failed for chunk, skipping',
        toError(error),
        {
          userId,
          chunkLength: chunk.length,
          rawResponse: response.slice(0, this.config.maxLoggedResponseChars)
        }
      );
      return { entities: [], relationships: [] };
    }
  }
}
