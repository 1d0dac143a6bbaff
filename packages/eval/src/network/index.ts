export { NetworkEvent, headersToRecord, type NetworkEventInit } from './event.js';
export { NetworkTrace, type NetworkTraceMeta } from './trace.js';
export { trimHarFile, isSensitiveHeader, type TrimStats } from './trim.js';
export {
  harEntrySchema,
  resourceSnapshotSchema,
  parseJsonText,
  readHarDocument,
  parseHarEntry,
  type HarEntry,
  type HarHeader,
} from './har.js';
