export interface RenderSink {
  write(chunk: string): void;
  end(): void;
}

export class StringSink implements RenderSink {
  private chunks: string[] = [];
  private bufferChunks: string[] = [];
  private bufferLen = 0;

  // Many tiny writes (a tag, an indent, a newline) are batched before they
  // join the chunk list.
  private static readonly FLUSH_THRESHOLD = 8 * 1024;

  write(chunk: string) {
    if (!chunk) return;
    this.bufferChunks.push(chunk);
    this.bufferLen += chunk.length;
    if (this.bufferLen >= StringSink.FLUSH_THRESHOLD) this.flush();
  }

  end() {
    this.flush();
  }

  toString() {
    this.flush();
    return this.chunks.join('');
  }

  private flush() {
    if (!this.bufferLen) return;
    this.chunks.push(this.bufferChunks.join(''));
    this.bufferChunks = [];
    this.bufferLen = 0;
  }
}

export class StreamSink implements RenderSink {
  constructor(
    private readonly onChunk: (chunk: string) => void,
    private readonly onComplete: () => void
  ) {}

  write(chunk: string) {
    if (chunk) this.onChunk(chunk);
  }

  end() {
    this.onComplete();
  }
}
