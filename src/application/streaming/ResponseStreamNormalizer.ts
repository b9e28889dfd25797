import { ChunkMessage, StreamChunk, classifyChunk } from '../../core/entities/StreamChunk.js';
import { Logger } from '../../utils/logger.js';

export const SEARCH_INDICATOR = '\n\n🔍 *Searching the web...*\n\n';

export interface NormalizedPiece {
  kind: 'indicator' | 'text';
  text: string;
}

/**
 * Turns heterogeneous backend chunks into plain text pieces.
 * One instance per stream: the search indicator is emitted at most once.
 */
export class ResponseStreamNormalizer {
  private indicatorEmitted = false;
  private unrecognizedCount = 0;

  constructor(
    private logger: Logger,
    private indicator: string = SEARCH_INDICATOR
  ) {}

  /**
   * Pieces produced by one raw chunk, in output order
   */
  push(raw: unknown): NormalizedPiece[] {
    const chunk = classifyChunk(raw);
    return this.render(chunk);
  }

  /**
   * Normalize a whole source stream
   */
  async *normalize(source: AsyncIterable<unknown> | Iterable<unknown>): AsyncGenerator<string, void, undefined> {
    for await (const raw of source) {
      for (const piece of this.push(raw)) {
        yield piece.text;
      }
    }
  }

  getUnrecognizedCount(): number {
    return this.unrecognizedCount;
  }

  private render(chunk: StreamChunk): NormalizedPiece[] {
    switch (chunk.kind) {
      case 'agent-model':
      case 'messages':
        return this.fromMessage(chunk.messages[0]);
      case 'agent-tools':
        this.logger.debug(`Tool output received (${chunk.messages.length} message(s))`);
        return [];
      case 'message':
        return this.fromMessage(chunk.message);
      case 'text':
        return chunk.text ? [{ kind: 'text', text: chunk.text }] : [];
      case 'unrecognized':
        this.unrecognizedCount++;
        this.logger.warn('Dropping unrecognized stream chunk', {
          chunk_type: Array.isArray(chunk.raw) ? 'array' : typeof chunk.raw,
          preview: preview(chunk.raw),
        });
        return [];
    }
  }

  private fromMessage(message: ChunkMessage | undefined): NormalizedPiece[] {
    if (!message) {
      return [];
    }

    const output: NormalizedPiece[] = [];
    if (message.hasToolCalls && !this.indicatorEmitted) {
      this.indicatorEmitted = true;
      output.push({ kind: 'indicator', text: this.indicator });
    }
    if (message.content) {
      output.push({ kind: 'text', text: message.content });
    }
    return output;
  }
}

function preview(raw: unknown): string {
  let text: string;
  try {
    text = JSON.stringify(raw) ?? String(raw);
  } catch {
    text = String(raw);
  }
  return text.length > 120 ? `${text.substring(0, 120)}...` : text;
}
