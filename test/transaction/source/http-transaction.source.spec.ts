import { isValidChecksumAddress } from '@ethereumjs/util';
import { CryptoService } from '../../../src/common/crypto/crypto.service';
import { ExternalSourceError } from '../../../src/common/errors/simulator.errors';
import { SeededRandomSource } from '../../../src/common/random/random-source';
import { HttpTransactionSource } from '../../../src/transaction/source/http-transaction.source';

/**
 * HttpTransactionSource 테스트
 *
 * 네트워크 대신 fetch 함수를 주입
 */
describe('HttpTransactionSource', () => {
  const url = 'http://feed.test/posts';
  const cryptoService = new CryptoService();

  let fetchMock: jest.Mock<Promise<Response>, Parameters<typeof fetch>>;
  let source: HttpTransactionSource;

  beforeEach(() => {
    fetchMock = jest.fn<Promise<Response>, Parameters<typeof fetch>>();
    source = new HttpTransactionSource(
      { url, timeoutMs: 1000 },
      new SeededRandomSource(1),
      cryptoService,
      fetchMock,
    );
  });

  function respondWith(body: string, status = 200): void {
    fetchMock.mockResolvedValue(new Response(body, { status }));
  }

  it('_limit 파라미터와 타임아웃 signal로 요청해야 함', async () => {
    respondWith('[]');

    await source.fetch(3);

    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(fetchMock.mock.calls[0][0]).toBe('http://feed.test/posts?_limit=3');
    expect(fetchMock.mock.calls[0][1]).toEqual({
      signal: expect.any(AbortSignal),
    });
  });

  it('게시글마다 트랜잭션 레코드를 만들어야 함', async () => {
    respondWith(
      JSON.stringify([
        { userId: 1, id: 1, title: 'first post', body: '...' },
        { id: 2 },
      ]),
    );

    const records = await source.fetch(2);

    expect(records).toHaveLength(2);
    expect(records[0].metadata).toEqual({ api_title: 'first post' });
    expect(records[1].metadata).toEqual({ api_title: 'N/A' });

    for (const record of records) {
      expect(isValidChecksumAddress(record.sender)).toBe(true);
      expect(isValidChecksumAddress(record.receiver)).toBe(true);
      expect(record.sender).not.toBe(record.receiver);
      expect(record.amount).toBeGreaterThanOrEqual(0.1);
      expect(record.amount).toBeLessThanOrEqual(10);
    }
  });

  it('요청이 실패하면 ExternalSourceError를 던져야 함', async () => {
    const cause = new Error('timeout');
    fetchMock.mockRejectedValue(cause);

    const error = await source.fetch(3).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ExternalSourceError);
    expect(error).toMatchObject({
      message: 'Request to http://feed.test/posts?_limit=3 failed: timeout',
      cause,
    });
  });

  it('HTTP 에러 상태면 ExternalSourceError를 던져야 함', async () => {
    respondWith('server error', 500);

    await expect(source.fetch(3)).rejects.toThrow(
      new ExternalSourceError(
        'Request to http://feed.test/posts?_limit=3 failed with status 500',
      ),
    );
  });

  it('JSON이 아니면 ExternalSourceError를 던져야 함', async () => {
    respondWith('not json');

    await expect(source.fetch(3)).rejects.toThrow(ExternalSourceError);
  });

  it('배열이 아니면 ExternalSourceError를 던져야 함', async () => {
    respondWith(JSON.stringify({ id: 1 }));

    await expect(source.fetch(3)).rejects.toThrow(
      'Response from http://feed.test/posts?_limit=3 is not an array',
    );
  });

  it('객체가 아닌 항목이 있으면 ExternalSourceError를 던져야 함', async () => {
    respondWith(JSON.stringify([{ id: 1 }, 7]));

    await expect(source.fetch(3)).rejects.toThrow(
      'Response from http://feed.test/posts?_limit=3 contains a non-object item',
    );
  });

  it('title이 문자열이 아니면 ExternalSourceError를 던져야 함', async () => {
    respondWith(JSON.stringify([{ id: 1, title: 42 }]));

    await expect(source.fetch(1)).rejects.toThrow(ExternalSourceError);
  });
});
