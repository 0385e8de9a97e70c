import crypto from 'crypto';

export type SignablePayload = Buffer | string;

export function generateWebhookSignature(payload: SignablePayload, secret: string): string {
  return crypto.createHmac('sha256', secret).update(payload).digest('hex');
}

export function verifyWebhookSignature(
  payload: SignablePayload,
  signature: string,
  secret: string
): boolean {
  if (!signature) {
    return false;
  }

  const receivedHash = Buffer.from(signature, 'utf8');
  const expectedHash = Buffer.from(generateWebhookSignature(payload, secret), 'utf8');

  // LENGTH ALONE LEAKS NO HASH CONTENT
  if (receivedHash.length !== expectedHash.length) {
    return false;
  }

  // CONSTANT-TIME COMPARISON TO PREVENT TIMING ATTACKS
  return crypto.timingSafeEqual(receivedHash, expectedHash);
}
