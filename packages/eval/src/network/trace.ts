import { readFileSync } from 'fs';
import { isRecord } from '@webgrade/sdk';
import { ParseFault } from '../errors.js';
import { NetworkEvent } from './event.js';
import { parseHarEntry, parseJsonText, readHarDocument, resourceSnapshotSchema } from './har.js';

export interface NetworkTraceMeta {
  srcFile?: string | null;
  isPlaywright?: boolean;
}

function isResourceSnapshot(record: unknown): boolean {
  return isRecord(record) && record.type === 'resource-snapshot';
}

/**
 * Ordered, immutable sequence of network events from one capture.
 */
export class NetworkTrace {
  readonly events: readonly NetworkEvent[];
  readonly evaluationEvents: readonly NetworkEvent[];
  readonly srcFile: string | null;
  readonly isPlaywright: boolean;

  constructor(events: readonly NetworkEvent[], meta: NetworkTraceMeta = {}) {
    this.events = Object.freeze([...events]);
    this.evaluationEvents = Object.freeze(this.events.filter((event) => event.isEvaluationEvent));
    this.srcFile = meta.srcFile ?? null;
    this.isPlaywright = meta.isPlaywright ?? false;
  }

  /**
   * Load a capture file. HAR documents are read from `log.entries`; a JSON array is read as a
   * list of event records.
   */
  static fromCapture(path: string): NetworkTrace {
    const data = parseJsonText(readFileSync(path, 'utf-8'), path);
    if (Array.isArray(data)) return NetworkTrace.fromEvents(data, path);
    const { entries } = readHarDocument(data, path);
    const events = entries.map((entry, index) => NetworkEvent.fromHarEntry(parseHarEntry(entry, index, path)));
    return new NetworkTrace(events, { srcFile: path, isPlaywright: false });
  }

  /**
   * Build a trace from decoded records: HAR entries, resource snapshots, or events built in
   * process. In a snapshot stream, records of other types are skipped.
   */
  static fromEvents(records: readonly unknown[], srcFile: string | null = null): NetworkTrace {
    const source = srcFile ?? 'event records';
    const isPlaywright = records.some(isResourceSnapshot);
    const events: NetworkEvent[] = [];

    records.forEach((record, index) => {
      if (record instanceof NetworkEvent) {
        events.push(record);
        return;
      }
      if (!isPlaywright) {
        events.push(NetworkEvent.fromHarEntry(parseHarEntry(record, index, source)));
        return;
      }
      if (!isResourceSnapshot(record)) return;
      const parsed = resourceSnapshotSchema.safeParse(record);
      if (!parsed.success) {
        throw new ParseFault(`Malformed resource snapshot ${index} in ${source}: ${parsed.error.issues[0].message}`, source);
      }
      events.push(NetworkEvent.fromHarEntry(parsed.data.snapshot));
    });

    return new NetworkTrace(events, { srcFile, isPlaywright });
  }
}
