/**
 * Feedkeeper — Delivery Exports
 */

import type { AppConfig } from '../lib/config';
import { JsonlFileSink } from './jsonl';
import { NullSink } from './sink';
import type { ItemSink } from './sink';
import { StdoutSink } from './stdout';

export type { ItemSink } from './sink';
export { NullSink, serializeItem } from './sink';
export { JsonlFileSink, dailyFileName } from './jsonl';
export { StdoutSink } from './stdout';

export function createSink(output: AppConfig['output'], options: { dryRun?: boolean } = {}): ItemSink {
  if (options.dryRun) return new NullSink();

  switch (output.kind) {
    case 'stdout':
      return new StdoutSink();
    case 'jsonl':
      return new JsonlFileSink(output.dir);
  }
}
