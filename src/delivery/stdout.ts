/**
 * Feedkeeper — Stdout Sink
 */

import type { FeedItem } from '../types';
import type { ItemSink } from './sink';
import { serializeItem } from './sink';
import { SinkError, describeError } from '../lib/errors';

export class StdoutSink implements ItemSink {
  constructor(private readonly stream: NodeJS.WritableStream = process.stdout) {}

  emit(item: FeedItem): Promise<void> {
    return new Promise((resolve, reject) => {
      this.stream.write(serializeItem(item), error => {
        if (error) {
          reject(new SinkError(`Cannot write item to stdout: ${describeError(error)}`, { cause: error }));
        } else {
          resolve();
        }
      });
    });
  }
}
