import { mkdirSync, readFileSync, writeFileSync } from 'fs';
import { dirname } from 'path';
import { NetworkEvent } from './event.js';
import { parseHarEntry, parseJsonText, readHarDocument, type HarHeader } from './har.js';

const REDACTED = '[REDACTED]';
const PRESERVED_HEADERS = new Set(['cookie', 'set-cookie']);
const SENSITIVE_NAME = /auth|token|key|secret/;

export interface TrimStats {
  originalEntries: number;
  trimmedEntries: number;
  removedEntries: number;
  originalSize: number;
  trimmedSize: number;
  reductionPercent: number;
  requestHeadersSanitized: number;
  responseHeadersSanitized: number;
}

export function isSensitiveHeader(name: string): boolean {
  const lower = name.toLowerCase();
  if (PRESERVED_HEADERS.has(lower)) return false;
  return SENSITIVE_NAME.test(lower);
}

function redact(headers: readonly HarHeader[]): { headers: HarHeader[]; count: number } {
  let count = 0;
  const redacted = headers.map((header) => {
    if (!isSensitiveHeader(header.name)) return header;
    count++;
    return { ...header, value: REDACTED };
  });
  return { headers: redacted, count };
}

/**
 * Write a copy of a HAR file holding only evaluation events, with credential-bearing header
 * values redacted. Cookies are kept.
 */
export function trimHarFile(inputPath: string, outputPath: string): TrimStats {
  const original = readFileSync(inputPath, 'utf-8');
  const { data, log, entries } = readHarDocument(parseJsonText(original, inputPath), inputPath);

  let requestHeadersSanitized = 0;
  let responseHeadersSanitized = 0;
  const kept = entries
    .map((raw, index) => parseHarEntry(raw, index, inputPath))
    .filter((entry) => NetworkEvent.fromHarEntry(entry).isEvaluationEvent)
    .map((entry) => {
      const request = redact(entry.request.headers);
      const response = redact(entry.response.headers);
      requestHeadersSanitized += request.count;
      responseHeadersSanitized += response.count;
      return {
        ...entry,
        request: { ...entry.request, headers: request.headers },
        response: { ...entry.response, headers: response.headers },
      };
    });

  const trimmed = JSON.stringify({ ...data, log: { ...log, entries: kept } }, null, 2);
  mkdirSync(dirname(outputPath), { recursive: true });
  writeFileSync(outputPath, trimmed, 'utf-8');

  const originalSize = Buffer.byteLength(original, 'utf-8');
  const trimmedSize = Buffer.byteLength(trimmed, 'utf-8');
  return {
    originalEntries: entries.length,
    trimmedEntries: kept.length,
    removedEntries: entries.length - kept.length,
    originalSize,
    trimmedSize,
    reductionPercent: originalSize === 0 ? 0 : Math.round((1 - trimmedSize / originalSize) * 10000) / 100,
    requestHeadersSanitized,
    responseHeadersSanitized,
  };
}
