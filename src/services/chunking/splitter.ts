import type { TextChunk } from "../../schemas/memory";
import { ChunkingError } from "../errors";
import type { TextSplitter } from "../types";

export interface SentenceSplitterOptions {
  /** Upper bound per chunk, in estimated tokens. */
  chunkSize: number;
  /** Characters carried from the tail of one chunk into the next. */
  overlap: number;
  minSentencesPerChunk: number;
}

export interface Sentence {
  text: string;
  start: number;
  end: number;
}

const SENTENCE_TERMINATORS = new Set([".", "!", "?"]);

/**
 * Splits after every `.`, `!` or `?`; the trailing remainder becomes a final sentence.
 */
export function splitSentences(text: string): Sentence[] {
  const sentences: Sentence[] = [];
  let segmentStart = 0;

  const pushSegment = (end: number) => {
    const raw = text.slice(segmentStart, end);
    const trimmed = raw.trim();
    if (trimmed) {
      const leading = raw.length - raw.trimStart().length;
      const start = segmentStart + leading;
      sentences.push({ text: trimmed, start, end: start + trimmed.length });
    }
    segmentStart = end;
  };

  for (let index = 0; index < text.length; index += 1) {
    if (SENTENCE_TERMINATORS.has(text[index] ?? "")) {
      pushSegment(index + 1);
    }
  }
  pushSegment(text.length);

  return sentences;
}

export function estimateTokens(text: string): number {
  const words = text.split(/\s+/).filter(Boolean).length;
  return Math.floor(words / 0.75);
}

export class SentenceSplitter implements TextSplitter {
  #options: SentenceSplitterOptions;

  constructor(options: SentenceSplitterOptions) {
    this.#options = options;
  }

  split(text: string): TextChunk[] {
    const sentences = splitSentences(text);
    if (sentences.length === 0) {
      throw new ChunkingError("content_too_short", "No sentences found in content");
    }

    const { chunkSize, overlap, minSentencesPerChunk } = this.#options;
    const chunks: TextChunk[] = [];

    let current = "";
    let currentTokens = 0;
    let sentenceCount = 0;
    let chunkStart = sentences[0]?.start ?? 0;
    let chunkEnd = chunkStart;

    for (const sentence of sentences) {
      const sentenceTokens = estimateTokens(sentence.text);

      if (
        currentTokens + sentenceTokens > chunkSize &&
        sentenceCount >= minSentencesPerChunk
      ) {
        chunks.push({
          text: current.trim(),
          tokenCount: currentTokens,
          startPos: chunkStart,
          endPos: chunkEnd,
        });

        const carried = overlap > 0 ? current.slice(-overlap) : "";
        current = carried;
        currentTokens = estimateTokens(carried);
        sentenceCount = 0;
        chunkStart = Math.max(0, sentence.start - carried.length);
      }

      current = current ? `${current} ${sentence.text}` : sentence.text;
      currentTokens += sentenceTokens;
      sentenceCount += 1;
      chunkEnd = sentence.end;
    }

    if (current.trim()) {
      chunks.push({
        text: current.trim(),
        tokenCount: currentTokens,
        startPos: chunkStart,
        endPos: chunkEnd,
      });
    }

    return chunks;
  }
}

/**
 * Boundary detection by embedding similarity is not implemented; this strategy
 * currently splits on sentences.
 */
export class SemanticSplitter implements TextSplitter {
  #delegate: SentenceSplitter;

  constructor(options: SentenceSplitterOptions) {
    this.#delegate = new SentenceSplitter(options);
  }

  split(text: string): TextChunk[] {
    return this.#delegate.split(text);
  }
}

export function createSplitter(
  strategy: "sentence" | "semantic",
  options: SentenceSplitterOptions,
): TextSplitter {
  return strategy === "semantic"
    ? new SemanticSplitter(options)
    : new SentenceSplitter(options);
}
