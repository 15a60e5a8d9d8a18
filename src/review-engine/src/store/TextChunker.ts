/**
 * TextChunker - Line-aware splitting of file content into bounded chunks.
 *
 * A chunk never exceeds `chunkSize` characters. Consecutive chunks share up
 * to `chunkOverlap` characters of whole trailing lines; a single line longer
 * than `chunkSize` is hard-split.
 */

export interface ChunkMetadata {
  sourceFile: string;
  chunkIndex: number;
}

export interface TextChunk {
  content: string;
  metadata: ChunkMetadata;
}

export interface ChunkerOptions {
  chunkSize: number;
  chunkOverlap: number;
}

export class TextChunker {
  constructor(private options: ChunkerOptions) {}

  split(content: string): string[] {
    const { chunkSize, chunkOverlap } = this.options;
    const pieces: string[] = [];
    for (const line of content.split(/(?<=\n)/)) {
      for (let i = 0; i < line.length; i += chunkSize) {
        pieces.push(line.slice(i, i + chunkSize));
      }
    }

    const chunks: string[] = [];
    let window: string[] = [];
    let windowLength = 0;

    for (const piece of pieces) {
      if (windowLength + piece.length > chunkSize && window.length > 0) {
        chunks.push(window.join(''));
        // Carry trailing pieces forward as overlap
        const carried: string[] = [];
        let carriedLength = 0;
        for (let i = window.length - 1; i >= 0; i--) {
          const previous = window[i] ?? '';
          if (carriedLength + previous.length > chunkOverlap) break;
          if (carriedLength + previous.length + piece.length > chunkSize) break;
          carried.unshift(previous);
          carriedLength += previous.length;
        }
        window = carried;
        windowLength = carriedLength;
      }
      window.push(piece);
      windowLength += piece.length;
    }

    if (window.length > 0) {
      chunks.push(window.join(''));
    }
    return chunks.filter(chunk => chunk.trim() !== '');
  }

  chunkFile(sourceFile: string, content: string): TextChunk[] {
    return this.split(content).map((chunk, chunkIndex) => ({
      content: chunk,
      metadata: { sourceFile, chunkIndex },
    }));
  }
}
