/**
 * Text extraction collaborator
 *
 * Decoding binary formats (PDF, PPTX, OCR) lives outside this package; the
 * plain-text implementation handles text and markdown uploads and reports the
 * detected type for everything else with empty text, which the workflow
 * treats as a failed extraction.
 */

import { extname } from 'path';

export interface TextExtractionResult {
  text: string;
  detectedType: string;
}

export interface TextExtractionService {
  extract(fileData: Uint8Array, filename: string): Promise<TextExtractionResult>;
}

const TYPE_BY_EXTENSION: Record<string, string> = {
  pdf: 'pdf',
  pptx: 'powerpoint',
  txt: 'text',
  md: 'text',
  png: 'image',
  jpg: 'image',
  jpeg: 'image',
  bmp: 'image',
  tiff: 'image'
};

export function detectFileType(filename: string): string {
  const extension = extname(filename).slice(1).toLowerCase();
  return TYPE_BY_EXTENSION[extension] ?? 'unsupported';
}

/**
 * Normalize extracted text: collapse whitespace inside each line and drop
 * lines of two characters or fewer (typical OCR and slide noise). Line
 * breaks are kept because the chunker detects headings per line.
 */
export function cleanExtractedText(text: string): string {
  return text
    .split(/\r?\n/)
    .map(line => line.split(/\s+/).filter(Boolean).join(' '))
    .filter(line => line.length > 2)
    .join('\n');
}

export class PlainTextExtractionService implements TextExtractionService {
  private decoder = new TextDecoder('utf-8');

  async extract(fileData: Uint8Array, filename: string): Promise<TextExtractionResult> {
    const detectedType = detectFileType(filename);

    if (detectedType !== 'text') {
      console.warn(`⚠️ No text extractor available for ${filename} (${detectedType})`);
      return { text: '', detectedType };
    }

    return {
      text: cleanExtractedText(this.decoder.decode(fileData)),
      detectedType
    };
  }
}
