import { createHmac } from 'crypto';
import { signWebhookBody, verifyOAuthQuery, verifyWebhookSignature } from './signature';

const SECRET = 'test-secret';

describe('verifyWebhookSignature', () => {
  const body = Buffer.from('{"shop_domain":"demo.example.com","customer":{"id":42}}');

  it('accepts the platform signature of the exact bytes', () => {
    expect(verifyWebhookSignature(body, signWebhookBody(body, SECRET), SECRET)).toBe(true);
  });

  it('rejects the signature once a single byte of the body changes', () => {
    const signature = signWebhookBody(body, SECRET);
    const tampered = Buffer.from(body);
    tampered[10] = tampered[10] ^ 0x01;

    expect(verifyWebhookSignature(tampered, signature, SECRET)).toBe(false);
  });

  it('rejects a signature made with another secret', () => {
    expect(verifyWebhookSignature(body, signWebhookBody(body, 'other-secret'), SECRET)).toBe(false);
  });

  it('rejects a missing header, body or secret', () => {
    const signature = signWebhookBody(body, SECRET);
    expect(verifyWebhookSignature(body, undefined, SECRET)).toBe(false);
    expect(verifyWebhookSignature(undefined, signature, SECRET)).toBe(false);
    expect(verifyWebhookSignature(body, signature, '')).toBe(false);
  });

  it('rejects a truncated signature without throwing', () => {
    const signature = signWebhookBody(body, SECRET);
    expect(verifyWebhookSignature(body, signature.slice(0, 10), SECRET)).toBe(false);
  });
});

describe('verifyOAuthQuery', () => {
  const params = {
    shop: 'demo.myshopify.com',
    code: 'test-code',
    state: 'test-state',
    timestamp: '1700000000',
  };
  const sign = (message: string) => createHmac('sha256', SECRET).update(message).digest('hex');
  const hmac = sign('code=test-code&shop=demo.myshopify.com&state=test-state&timestamp=1700000000');

  it('accepts params signed in sorted order', () => {
    expect(verifyOAuthQuery({ ...params, hmac }, SECRET)).toBe(true);
  });

  it('rejects when a signed param was altered', () => {
    expect(verifyOAuthQuery({ ...params, shop: 'other.myshopify.com', hmac }, SECRET)).toBe(false);
  });

  it('rejects a query without hmac', () => {
    expect(verifyOAuthQuery(params, SECRET)).toBe(false);
  });

  it('signs array params in bracket notation', () => {
    const withIds = sign('code=test-code&ids=["1", "2"]');
    expect(verifyOAuthQuery({ code: 'test-code', ids: ['1', '2'], hmac: withIds }, SECRET)).toBe(true);
  });
});
