import type { MessageRecord } from '../models/message-record';
import type { RecordSink } from './record-sink';

export interface LineStream {
  write(chunk: string): boolean;
  once(event: 'drain', listener: () => void): unknown;
}

/** Emits one JSON document per line. Diagnostics never share this stream. */
export class StdoutRecordSink implements RecordSink {
  readonly kind = 'stdout';

  constructor(private readonly stream: LineStream = process.stdout) {}

  async write(_peerId: number, record: MessageRecord): Promise<boolean> {
    if (!this.stream.write(`${JSON.stringify(record)}\n`)) {
      await new Promise<void>((resolve) => this.stream.once('drain', resolve));
    }
    return true;
  }
}
