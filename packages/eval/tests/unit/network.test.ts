import { existsSync, readFileSync } from 'fs';
import { join } from 'path';
import { describe, it, expect, beforeEach } from 'vitest';
import { ParseFault } from '../../src/errors.js';
import { NetworkEvent, NetworkTrace, isSensitiveHeader, trimHarFile } from '../../src/network/index.js';
import { createEvent, createTempDir, harEntry, writeJson } from '../test-utils.js';

describe('network event [unit]', () => {
  it('should build an event from a HAR entry', () => {
    const event = NetworkEvent.fromHarEntry({
      request: {
        url: 'http://shop.test/cart',
        method: 'post',
        headers: [
          { name: 'Accept', value: 'text/html' },
          { name: 'accept', value: 'application/json' },
        ],
        postData: { text: 'qty=2' },
      },
      response: { status: 201, headers: [{ name: 'Content-Type', value: 'text/html' }] },
    });
    expect(event.method).toBe('POST');
    expect(event.requestHeaders).toEqual({ accept: 'text/html, application/json' });
    expect(event.responseHeaders).toEqual({ 'content-type': 'text/html' });
    expect(event.postData).toBe('qty=2');
    expect(event.redirectUrl).toBeNull();
    expect(event.header('ACCEPT')).toBe('text/html, application/json');
  });

  it('should take the redirect target from redirectURL or the location header', () => {
    const fromField = createEvent({ url: 'http://shop.test/a', responseStatus: 302, redirectUrl: 'http://shop.test/b' });
    const fromHeader = createEvent({
      url: 'http://shop.test/a',
      responseStatus: 301,
      responseHeaders: { Location: '/c' },
    });
    expect(fromField.isRedirect).toBe(true);
    expect(fromField.redirectUrl).toBe('http://shop.test/b');
    expect(fromHeader.redirectUrl).toBe('/c');
  });

  it('should ignore redirect targets on non-3xx responses', () => {
    const event = createEvent({ url: 'http://shop.test/a', responseStatus: 200, redirectUrl: 'http://shop.test/b' });
    expect(event.redirectUrl).toBeNull();
    expect(event.isRedirect).toBe(false);
  });

  it('should classify request success by status', () => {
    expect(createEvent({ url: 'http://x.test/', responseStatus: 399 }).isRequestSuccess).toBe(true);
    expect(createEvent({ url: 'http://x.test/', responseStatus: 404 }).isRequestSuccess).toBe(false);
    expect(createEvent({ url: 'http://x.test/', responseStatus: 0 }).isRequestSuccess).toBe(false);
  });

  it('should exclude static assets from evaluation events', () => {
    expect(createEvent({ url: 'http://shop.test/static/app.JS?v=3' }).isEvaluationEvent).toBe(false);
    expect(createEvent({ url: 'http://shop.test/logo.png' }).isEvaluationEvent).toBe(false);
    expect(createEvent({ url: 'http://shop.test/api/cart.json' }).isEvaluationEvent).toBe(true);
    expect(createEvent({ url: 'http://shop.test' }).path).toBe('/');
  });

  it('should be immutable', () => {
    const event = createEvent({ url: 'http://shop.test/' });
    expect(Object.isFrozen(event)).toBe(true);
    expect(Object.isFrozen(event.requestHeaders)).toBe(true);
  });
});

describe('network trace [unit]', () => {
  let dir: string;

  beforeEach(() => {
    dir = createTempDir();
  });

  it('should load a HAR file in capture order', () => {
    const path = writeJson(dir, 'trace.har', {
      log: {
        entries: [
          harEntry('http://shop.test/', { status: 302 }),
          harEntry('http://shop.test/style.css'),
          harEntry('http://shop.test/home'),
        ],
      },
    });
    const trace = NetworkTrace.fromCapture(path);
    expect(trace.srcFile).toBe(path);
    expect(trace.isPlaywright).toBe(false);
    expect(trace.events.map((e) => e.url)).toEqual([
      'http://shop.test/',
      'http://shop.test/style.css',
      'http://shop.test/home',
    ]);
    expect(trace.evaluationEvents.map((e) => e.url)).toEqual(['http://shop.test/', 'http://shop.test/home']);
    expect(trace.events[0].responseStatus).toBe(302);
    expect(trace.events[0].redirectUrl).toBeNull();
    expect(trace.events[0].isRedirect).toBe(false);
  });

  it('should take the redirect target from the Location header', () => {
    const path = writeJson(dir, 'redirect.har', {
      log: {
        entries: [
          harEntry('http://shop.test/login', {
            method: 'POST',
            status: 302,
            responseHeaders: [{ name: 'Location', value: 'http://shop.test/account' }],
          }),
        ],
      },
    });
    const [event] = NetworkTrace.fromCapture(path).events;
    expect(event.redirectUrl).toBe('http://shop.test/account');
    expect(event.isRedirect).toBe(true);
  });

  it('should reject invalid JSON', () => {
    const path = writeJson(dir, 'broken.har', '{not json');
    expect(() => NetworkTrace.fromCapture(path)).toThrow(ParseFault);
    expect(() => NetworkTrace.fromCapture(path)).toThrow(`Invalid JSON in ${path}`);
  });

  it('should reject HAR documents without log or entries', () => {
    const noLog = writeJson(dir, 'nolog.har', { version: '1.2' });
    const noEntries = writeJson(dir, 'noentries.har', { log: { version: '1.2' } });
    expect(() => NetworkTrace.fromCapture(noLog)).toThrow("missing 'log' field");
    expect(() => NetworkTrace.fromCapture(noEntries)).toThrow("missing 'log.entries' field");
  });

  it('should name the malformed entry', () => {
    const path = writeJson(dir, 'bad.har', { log: { entries: [harEntry('http://shop.test/'), { request: {} }] } });
    expect(() => NetworkTrace.fromCapture(path)).toThrow(`Malformed entry 1 in ${path}`);
  });

  it('should read resource snapshots and skip other records', () => {
    const trace = NetworkTrace.fromEvents([
      { type: 'context-options' },
      { type: 'resource-snapshot', snapshot: harEntry('http://shop.test/a') },
      { type: 'frame-snapshot' },
      { type: 'resource-snapshot', snapshot: harEntry('http://shop.test/b') },
    ]);
    expect(trace.isPlaywright).toBe(true);
    expect(trace.srcFile).toBeNull();
    expect(trace.events.map((e) => e.url)).toEqual(['http://shop.test/a', 'http://shop.test/b']);
  });

  it('should load a JSON array capture as event records', () => {
    const path = writeJson(dir, 'events.json', [harEntry('http://shop.test/a'), harEntry('http://shop.test/b')]);
    const trace = NetworkTrace.fromCapture(path);
    expect(trace.events).toHaveLength(2);
    expect(trace.srcFile).toBe(path);
  });

  it('should keep chained redirects as distinct events', () => {
    const trace = NetworkTrace.fromEvents([
      createEvent({ url: 'http://shop.test/a', responseStatus: 302, redirectUrl: 'http://shop.test/b' }),
      createEvent({ url: 'http://shop.test/b', responseStatus: 302, redirectUrl: 'http://shop.test/c' }),
      createEvent({ url: 'http://shop.test/c' }),
    ]);
    expect(trace.events.filter((e) => e.isRedirect)).toHaveLength(2);
    expect(trace.events).toHaveLength(3);
  });
});

describe('HAR trimming [unit]', () => {
  it('should flag credential headers but keep cookies', () => {
    expect(isSensitiveHeader('Authorization')).toBe(true);
    expect(isSensitiveHeader('X-Api-Key')).toBe(true);
    expect(isSensitiveHeader('x-csrf-token')).toBe(true);
    expect(isSensitiveHeader('Cookie')).toBe(false);
    expect(isSensitiveHeader('Set-Cookie')).toBe(false);
    expect(isSensitiveHeader('Accept')).toBe(false);
  });

  it('should keep evaluation events and redact sensitive values', () => {
    const dir = createTempDir();
    const input = writeJson(dir, 'full.har', {
      log: {
        version: '1.2',
        entries: [
          harEntry('http://shop.test/api/cart', {
            requestHeaders: [
              { name: 'Authorization', value: 'Bearer test-secret' },
              { name: 'Cookie', value: 'session=test' },
            ],
            responseHeaders: [{ name: 'X-Auth-Token', value: 'test-token' }],
          }),
          harEntry('http://shop.test/app.js'),
          harEntry('http://shop.test/logo.svg'),
        ],
      },
    });
    const output = join(dir, 'out', 'trimmed.har');

    const stats = trimHarFile(input, output);

    expect(existsSync(output)).toBe(true);
    const written = JSON.parse(readFileSync(output, 'utf-8'));
    expect(written.log.version).toBe('1.2');
    expect(written.log.entries).toHaveLength(1);
    expect(written.log.entries[0].request.headers).toEqual([
      { name: 'Authorization', value: '[REDACTED]' },
      { name: 'Cookie', value: 'session=test' },
    ]);
    expect(written.log.entries[0].response.headers).toEqual([{ name: 'X-Auth-Token', value: '[REDACTED]' }]);
    expect(stats).toMatchObject({
      originalEntries: 3,
      trimmedEntries: 1,
      removedEntries: 2,
      requestHeadersSanitized: 1,
      responseHeadersSanitized: 1,
    });
    expect(stats.trimmedSize).toBe(Buffer.byteLength(readFileSync(output, 'utf-8'), 'utf-8'));
    expect(stats.reductionPercent).toBe(
      Math.round((1 - stats.trimmedSize / stats.originalSize) * 10000) / 100
    );
  });

  it('should raise the file system error for a missing input', () => {
    const dir = createTempDir();
    expect(() => trimHarFile(join(dir, 'missing.har'), join(dir, 'out.har'))).toThrow(/ENOENT/);
  });
});
