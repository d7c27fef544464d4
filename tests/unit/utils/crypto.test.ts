import { describe, it, expect } from 'vitest';
import { createHmac } from 'crypto';
import {
  computeWebhookSignature,
  parseSignatureHeader,
  verifyWebhookSignature,
} from '@/utils/crypto';
import { WebhookAuthenticationError } from '@/errors/webhook';

const SECRET = 'test-secret';
const NOW = new Date('2026-03-20T12:00:00Z');
const TS = String(NOW.getTime() / 1000);
const BODY = new TextEncoder().encode('{"event_id":"evt_1","event_type":"subscription.updated","data":{}}');

function sign(body: Uint8Array = BODY, timestamp: string = TS, secret: string = SECRET): string {
  return createHmac('sha256', secret)
    .update(`${timestamp}.${new TextDecoder().decode(body)}`)
    .digest('hex');
}

function verify(overrides: Partial<Parameters<typeof verifyWebhookSignature>[0]> = {}) {
  verifyWebhookSignature({
    secret: SECRET,
    rawBody: BODY,
    signatureHeader: `ts=${TS};h1=${sign()}`,
    timestampHeader: TS,
    toleranceSeconds: 300,
    now: NOW,
    ...overrides,
  });
}

function rejection(overrides: Partial<Parameters<typeof verifyWebhookSignature>[0]>): string | null {
  try {
    verify(overrides);
    return null;
  } catch (err) {
    return err instanceof WebhookAuthenticationError ? err.reason : 'unexpected error';
  }
}

describe('parseSignatureHeader', () => {
  it('reads the timestamp and every h1 entry', () => {
    expect(parseSignatureHeader('ts=1700000000;h1=aaa;h1=bbb')).toEqual({
      timestamp: '1700000000',
      signatures: ['aaa', 'bbb'],
    });
  });

  it('accepts comma separators and ignores unknown keys', () => {
    expect(parseSignatureHeader('ts=1, v0=zzz, h1=abc')).toEqual({
      timestamp: '1',
      signatures: ['abc'],
    });
  });
});

describe('computeWebhookSignature', () => {
  it('signs timestamp, dot, then the raw bytes', () => {
    expect(computeWebhookSignature(SECRET, TS, BODY)).toBe(sign());
  });
});

describe('verifyWebhookSignature', () => {
  it('accepts a valid signature', () => {
    expect(() => verify()).not.toThrow();
  });

  it('accepts when any of several h1 values matches', () => {
    expect(() =>
      verify({ signatureHeader: `ts=${TS};h1=${sign(BODY, TS, 'old-secret')};h1=${sign()}` })
    ).not.toThrow();
  });

  it('rejects a body with one byte changed', () => {
    const tampered = Uint8Array.from(BODY);
    tampered[10] = tampered[10] ^ 0x01;
    expect(rejection({ rawBody: tampered })).toBe('signature mismatch');
  });

  it('rejects a signature made with another secret', () => {
    expect(rejection({ signatureHeader: `ts=${TS};h1=${sign(BODY, TS, 'wrong-secret')}` })).toBe(
      'signature mismatch'
    );
  });

  it('rejects non-hex or truncated signatures without throwing a RangeError', () => {
    expect(rejection({ signatureHeader: `ts=${TS};h1=not-hex` })).toBe('signature mismatch');
    expect(rejection({ signatureHeader: `ts=${TS};h1=${sign().slice(0, 40)}` })).toBe('signature mismatch');
  });

  it('rejects a header without h1', () => {
    expect(rejection({ signatureHeader: `ts=${TS}` })).toBe('no h1 signature present');
  });

  it('rejects mismatched timestamps between headers', () => {
    const other = String(Number(TS) - 1);
    expect(rejection({ signatureHeader: `ts=${other};h1=${sign()}` })).toBe(
      'timestamp mismatch between headers'
    );
  });

  it('rejects timestamps outside the tolerance in either direction', () => {
    const old = String(Number(TS) - 301);
    const future = String(Number(TS) + 301);
    expect(
      rejection({ signatureHeader: `ts=${old};h1=${sign(BODY, old)}`, timestampHeader: old })
    ).toBe('timestamp outside tolerance');
    expect(
      rejection({ signatureHeader: `ts=${future};h1=${sign(BODY, future)}`, timestampHeader: future })
    ).toBe('timestamp outside tolerance');
  });

  it('accepts a timestamp at the tolerance edge', () => {
    const edge = String(Number(TS) - 300);
    expect(
      rejection({ signatureHeader: `ts=${edge};h1=${sign(BODY, edge)}`, timestampHeader: edge })
    ).toBeNull();
  });

  it('rejects a non-numeric timestamp', () => {
    expect(rejection({ timestampHeader: 'yesterday' })).toBe('timestamp is not an integer');
  });
});
