import { isRecord } from '@webgrade/sdk';
import { z } from 'zod';
import { ParseFault, errorMessage } from '../errors.js';

export const harHeaderSchema = z.object({
  name: z.string(),
  value: z.string(),
});

export const harEntrySchema = z
  .object({
    request: z
      .object({
        url: z.string().min(1),
        method: z.string().min(1),
        headers: z.array(harHeaderSchema).default([]),
        postData: z.object({ mimeType: z.string().optional(), text: z.string().optional() }).passthrough().optional(),
      })
      .passthrough(),
    response: z
      .object({
        status: z.number().int(),
        headers: z.array(harHeaderSchema).default([]),
        redirectURL: z.string().optional(),
      })
      .passthrough(),
  })
  .passthrough();

export const resourceSnapshotSchema = z.object({
  type: z.literal('resource-snapshot'),
  snapshot: harEntrySchema,
});

export type HarHeader = z.infer<typeof harHeaderSchema>;
export type HarEntry = z.infer<typeof harEntrySchema>;

export interface HarDocument {
  data: Record<string, unknown>;
  log: Record<string, unknown>;
  entries: unknown[];
}

export function parseJsonText(content: string, source: string): unknown {
  try {
    return JSON.parse(content);
  } catch (err) {
    throw new ParseFault(`Invalid JSON in ${source}: ${errorMessage(err)}`, source);
  }
}

export function readHarDocument(data: unknown, source: string): HarDocument {
  if (!isRecord(data) || !isRecord(data.log)) {
    throw new ParseFault(`Invalid HAR format in ${source}: missing 'log' field`, source);
  }
  const entries = data.log.entries;
  if (!Array.isArray(entries)) {
    throw new ParseFault(`Invalid HAR format in ${source}: missing 'log.entries' field`, source);
  }
  return { data, log: data.log, entries };
}

export function parseHarEntry(raw: unknown, index: number, source: string): HarEntry {
  const parsed = harEntrySchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ParseFault(
      `Malformed entry ${index} in ${source}: ${issue.path.join('.') || 'entry'} ${issue.message}`,
      source
    );
  }
  return parsed.data;
}
