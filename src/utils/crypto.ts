/**
 * Webhook Signature Utilities
 *
 * The billing provider signs `${timestamp}.${rawBody}` with HMAC-SHA256 and
 * sends it as `ts=<unix seconds>;h1=<hex digest>` (several h1 entries may be
 * present during secret rotation), plus the timestamp in its own header.
 */

import crypto from 'crypto';
import { WebhookAuthenticationError } from '@/errors/webhook';

const HEX_SHA256 = /^[0-9a-f]{64}$/i;

export interface ParsedSignatureHeader {
  timestamp: string | null;
  signatures: string[];
}

export function parseSignatureHeader(header: string): ParsedSignatureHeader {
  const parsed: ParsedSignatureHeader = { timestamp: null, signatures: [] };

  for (const part of header.split(/[;,]/)) {
    const separator = part.indexOf('=');
    if (separator === -1) continue;
    const key = part.slice(0, separator).trim();
    const value = part.slice(separator + 1).trim();
    if (key === 'ts') {
      parsed.timestamp = value;
    } else if (key === 'h1' && value) {
      parsed.signatures.push(value);
    }
  }

  return parsed;
}

export function computeWebhookSignature(
  secret: string,
  timestamp: string,
  rawBody: Uint8Array
): string {
  return crypto
    .createHmac('sha256', secret)
    .update(Buffer.concat([Buffer.from(`${timestamp}.`, 'utf8'), Buffer.from(rawBody)]))
    .digest('hex');
}

export interface VerifyWebhookSignatureInput {
  secret: string;
  rawBody: Uint8Array;
  signatureHeader: string;
  timestampHeader: string;
  toleranceSeconds: number;
  now: Date;
}

/**
 * Throws WebhookAuthenticationError unless the body carries a valid signature
 * within the replay tolerance. Comparison is constant-time per candidate.
 */
export function verifyWebhookSignature(input: VerifyWebhookSignatureInput): void {
  const { timestamp: signedTimestamp, signatures } = parseSignatureHeader(input.signatureHeader);
  const timestamp = input.timestampHeader.trim();

  if (signatures.length === 0) {
    throw new WebhookAuthenticationError('no h1 signature present');
  }
  if (!/^\d+$/.test(timestamp)) {
    throw new WebhookAuthenticationError('timestamp is not an integer');
  }
  if (signedTimestamp !== null && signedTimestamp !== timestamp) {
    throw new WebhookAuthenticationError('timestamp mismatch between headers');
  }

  const ageSeconds = Math.abs(Math.floor(input.now.getTime() / 1000) - Number(timestamp));
  if (ageSeconds > input.toleranceSeconds) {
    throw new WebhookAuthenticationError('timestamp outside tolerance');
  }

  const expected = Buffer.from(
    computeWebhookSignature(input.secret, timestamp, input.rawBody),
    'hex'
  );
  const matched = signatures.some(
    (candidate) =>
      HEX_SHA256.test(candidate) &&
      crypto.timingSafeEqual(expected, Buffer.from(candidate, 'hex'))
  );

  if (!matched) {
    throw new WebhookAuthenticationError('signature mismatch');
  }
}
