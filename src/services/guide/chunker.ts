import type { ChunkDraft } from './types';
import { charWidth, normalizeText, visualLength } from './textUtils';

export interface ChunkerOptions {
  /** Visual-length budget per chunk. */
  chunkSize?: number;
  /** Visual length carried from the end of one chunk into the next. */
  overlap?: number;
}

const HEADING_SPLIT_REGEX = /(?=(?:^|\n)(?:【|#{1,3}\s))/;
const SENTENCE_SPLIT_REGEX = /([。！？!?；;])/;
const SENTENCE_END_REGEX = /^[。！？!?；;]$/;
const TAIL_BOUNDARIES = ['\n\n', '\n', '。', '！', '？', '；', '. ', '! ', '? '];
const OVERLAP_PREFIX_LENGTH = 20;
const OVERLAP_MARKER = '...';

export class Chunker {
  readonly chunkSize: number;
  readonly overlap: number;

  constructor(options: ChunkerOptions = {}) {
    this.chunkSize = options.chunkSize ?? 800;
    this.overlap = options.overlap ?? 120;
  }

  splitIntoChunks(text: string): string[] {
    if (!text.trim()) {
      return [];
    }

    const normalized = normalizeText(text);
    const chunks = this.splitByHeadings(normalized).flatMap((section) => this.splitSection(section));

    if (this.overlap > 0 && chunks.length > 1) {
      return this.applyOverlap(chunks);
    }
    return chunks;
  }

  processDocument(text: string, docName = ''): ChunkDraft[] {
    return this.splitIntoChunks(text).map((content, index) => ({
      content,
      index,
      docName,
      charCount: visualLength(content),
    }));
  }

  private splitByHeadings(text: string): string[] {
    const parts = text
      .split(HEADING_SPLIT_REGEX)
      .map((part) => part.trim())
      .filter(Boolean);
    return parts.length ? parts : [text];
  }

  private splitSection(section: string): string[] {
    if (visualLength(section) <= this.chunkSize) {
      return [section];
    }

    const chunks: string[] = [];
    let current = '';

    for (const rawParagraph of section.split('\n\n')) {
      const paragraph = rawParagraph.trim();
      if (!paragraph) {
        continue;
      }

      if (visualLength(paragraph) > this.chunkSize) {
        if (current) {
          chunks.push(current.trim());
          current = '';
        }
        chunks.push(...this.splitBySentences(paragraph));
        continue;
      }

      const candidate = current ? `${current}\n\n${paragraph}` : paragraph;
      if (current && visualLength(candidate) > this.chunkSize) {
        chunks.push(current.trim());
        current = paragraph;
      } else {
        current = candidate;
      }
    }

    if (current) {
      chunks.push(current.trim());
    }
    return chunks;
  }

  private splitBySentences(paragraph: string): string[] {
    const parts = paragraph.split(SENTENCE_SPLIT_REGEX);
    const sentences: string[] = [];

    for (let i = 0; i < parts.length; ) {
      let sentence = parts[i];
      const next = parts[i + 1];
      if (next !== undefined && SENTENCE_END_REGEX.test(next)) {
        sentence += next;
        i += 2;
      } else {
        i += 1;
      }
      if (sentence.trim()) {
        sentences.push(sentence.trim());
      }
    }

    const chunks: string[] = [];
    let current = '';

    for (const sentence of sentences) {
      if (current && visualLength(current + sentence) > this.chunkSize) {
        chunks.push(current.trim());
        current = sentence;
      } else {
        current += sentence;
      }
    }

    if (current) {
      chunks.push(current.trim());
    }
    return chunks;
  }

  private applyOverlap(chunks: string[]): string[] {
    return chunks.map((chunk, i) => {
      if (i === 0) {
        return chunk;
      }
      const tail = this.tailText(chunks[i - 1]);
      const tailHead = Array.from(tail).slice(0, OVERLAP_PREFIX_LENGTH).join('');
      if (tail && !chunk.startsWith(tailHead)) {
        return `${OVERLAP_MARKER}${tail}\n\n${chunk}`;
      }
      return chunk;
    });
  }

  /** End of `text` worth roughly `overlap` visual units, cut forward to a natural boundary. */
  tailText(text: string): string {
    if (visualLength(text) <= this.overlap) {
      return text;
    }

    const chars = Array.from(text);
    let pos = chars.length;
    let width = 0;
    while (pos > 0 && width < this.overlap) {
      pos -= 1;
      width += charWidth(chars[pos]);
    }

    let tail = chars.slice(pos).join('');
    const halfLength = Math.floor(tail.length / 2);
    for (const boundary of TAIL_BOUNDARIES) {
      const idx = tail.indexOf(boundary);
      if (idx !== -1 && idx < halfLength) {
        tail = tail.slice(idx + boundary.length);
        break;
      }
    }
    return tail.trim();
  }
}
