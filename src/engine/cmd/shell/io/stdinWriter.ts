/**
 * StdinWriter - single-writer queue in front of a process's stdin.
 *
 * Every command is written as one unit, in submission order. The next write
 * starts only after the previous one was accepted by the stream (or, under
 * back-pressure, after 'drain'), so bytes of two commands never interleave.
 */

import type { Writable } from 'node:stream';

interface PendingWrite {
  data: string;
  resolve: (written: boolean) => void;
}

export class StdinWriter {
  private stream: Writable;
  private encoding: BufferEncoding;
  private writeQueue: PendingWrite[] = [];
  private isWriting = false;
  private closed = false;
  private onError?: (err: Error) => void;

  constructor(
    stream: Writable,
    options: { encoding?: BufferEncoding; onError?: (err: Error) => void } = {}
  ) {
    this.stream = stream;
    this.encoding = options.encoding ?? 'utf8';
    this.onError = options.onError;
    this.stream.on('error', this.handleStreamError);
  }

  get pending(): number {
    return this.writeQueue.length + (this.isWriting ? 1 : 0);
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Queue data for writing. Resolves true once the stream accepted it,
   * false when the writer was closed before it could be written.
   */
  write(data: string): Promise<boolean> {
    if (this.closed) return Promise.resolve(false);
    return new Promise(resolve => {
      this.writeQueue.push({ data, resolve });
      this.flushQueue();
    });
  }

  /**
   * Wait for all queued writes to finish
   */
  async flush(): Promise<void> {
    if (this.pending === 0) return;
    await this.write('');
  }

  /**
   * Stop writing. Queued writes resolve false; the stream is ended.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    const dropped = this.writeQueue;
    this.writeQueue = [];
    for (const item of dropped) item.resolve(false);
    if (!this.stream.destroyed && !this.stream.writableEnded) {
      this.stream.end();
    }
  }

  /**
   * Process write queue sequentially
   */
  private flushQueue(): void {
    if (this.isWriting || this.closed || this.writeQueue.length === 0) {
      return;
    }

    const next = this.writeQueue.shift();
    if (!next) return;

    if (next.data === '') {
      next.resolve(true);
      this.flushQueue();
      return;
    }

    if (this.stream.destroyed || this.stream.writableEnded) {
      next.resolve(false);
      this.flushQueue();
      return;
    }

    this.isWriting = true;
    const done = (written: boolean) => {
      this.isWriting = false;
      next.resolve(written);
      this.flushQueue();
    };

    const accepted = this.stream.write(next.data, this.encoding);
    if (accepted) {
      done(true);
    } else {
      // back-pressure: hold the queue until the stream drains or goes away
      const onDrain = () => {
        this.stream.off('close', onClose);
        done(true);
      };
      const onClose = () => {
        this.stream.off('drain', onDrain);
        done(false);
      };
      this.stream.once('drain', onDrain);
      this.stream.once('close', onClose);
    }
  }

  private handleStreamError = (err: Error): void => {
    // EPIPE etc.: the process is gone, nothing more can be written
    this.close();
    this.onError?.(err);
  };
}
