import { ClientRequestLike, extractClientMeta } from './client-meta.decorator';

function fakeRequest(headers: Record<string, string>, remoteAddress = '127.0.0.1'): ClientRequestLike {
  return { headers, socket: { remoteAddress } };
}

describe('extractClientMeta', () => {
  it('takes the first X-Forwarded-For address', () => {
    const meta = extractClientMeta(fakeRequest({ 'x-forwarded-for': '203.0.113.7, 10.0.0.1', 'user-agent': 'jest' }));
    expect(meta).toEqual({ ipAddress: '203.0.113.7', userAgent: 'jest' });
  });

  it('falls back to the socket address', () => {
    const meta = extractClientMeta(fakeRequest({}, '192.168.1.20'));
    expect(meta).toEqual({ ipAddress: '192.168.1.20', userAgent: null });
  });
});
