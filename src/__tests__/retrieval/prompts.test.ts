/**
 * Prompt assembly tests: context structuring, answer prompt and concept replies
 */

import { structureContext, MAX_DOCUMENT_CHARS } from '../../retrieval/context-structurer.js';
import { formatContext, buildAnswerPrompt, AnswerSynthesizer } from '../../retrieval/answer-synthesizer.js';
import { normalizeConcept, buildConceptPrompt, ConceptExtractor } from '../../retrieval/concept-extractor.js';
import { FakeCompletionService } from '../setup.js';

describe('structureContext', () => {
  test('should name concepts, render relationships and clip documents', () => {
    const longText = 'x'.repeat(MAX_DOCUMENT_CHARS + 100);

    const structured = structureContext(
      {
        entities: [{ name: 'Marketing Mix', type: 'framework' }, { name: 'Product', type: 'concept' }],
        relationships: [{ from: 'Marketing Mix', to: 'Product', type: 'has_component' }]
      },
      [{ chunk: { id: 'c1', text: longText }, similarity: 0.9 }]
    );

    expect(structured.concepts).toEqual(['Marketing Mix', 'Product']);
    expect(structured.relationships).toEqual(['Marketing Mix has_component Product']);
    expect(structured.documents).toEqual(['x'.repeat(500)]);
  });
});

describe('formatContext', () => {
  test('should join sections with blank lines', () => {
    expect(formatContext({
      concepts: ['Price', 'Perceived Value'],
      relationships: ['Price defines Perceived Value'],
      documents: ['Price reflects value.', 'Discounts shift demand.']
    })).toBe(
      'Concepts:\nPrice, Perceived Value\n\n' +
      'Relationships:\nPrice defines Perceived Value\n\n' +
      'Documents:\nPrice reflects value.\nDiscounts shift demand.'
    );
  });

  test('should omit empty sections', () => {
    expect(formatContext({ concepts: ['Price'], relationships: [], documents: [] })).toBe('Concepts:\nPrice');
    expect(formatContext({ concepts: [], relationships: [], documents: [] })).toBe('');
  });
});

describe('AnswerSynthesizer', () => {
  test('should send the structured prompt and return the reply unchanged', async () => {
    const completion = new FakeCompletionService(() => '  1. Definition: price is value.  ');
    const context = { concepts: ['Price'], relationships: [], documents: [] };

    const answer = await new AnswerSynthesizer(completion).synthesize('What is price?', context);

    expect(answer).toBe('  1. Definition: price is value.  ');
    expect(completion.prompts).toEqual([buildAnswerPrompt('What is price?', context)]);
    expect(completion.prompts[0]).toContain('ONLY use the context below.\n\nContext:\nConcepts:\nPrice\n\nQuestion: What is price?');
    expect(completion.prompts[0]).not.toContain('Documents:');
  });
});

describe('normalizeConcept', () => {
  test.each([
    ['Marketing Mix', 'Marketing Mix'],
    ['  Marketing Mix.\n', 'Marketing Mix'],
    ['"Marketing Mix"', 'Marketing Mix'],
    ["'Price.'", 'Price'],
    ['`Place`', 'Place'],
    ['"Promotion', '"Promotion'],
    ['', '']
  ])('should normalize %j to %j', (reply, expected) => {
    expect(normalizeConcept(reply)).toBe(expected);
  });
});

describe('ConceptExtractor', () => {
  test('should ask for the main concept and normalize the reply', async () => {
    const completion = new FakeCompletionService(() => '"Marketing Mix."');

    const concept = await new ConceptExtractor(completion).extract('Explain the marketing mix');

    expect(concept).toBe('Marketing Mix');
    expect(completion.prompts).toEqual([buildConceptPrompt('Explain the marketing mix')]);
    expect(completion.prompts[0]).toBe(
      'Extract the main academic concept from this question.\nReturn ONLY the concept name.\n\nQuestion: Explain the marketing mix'
    );
  });
});
