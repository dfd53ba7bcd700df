import { Logger } from '@nestjs/common';
import { plainToInstance } from 'class-transformer';
import { validateSync } from 'class-validator';
import { CryptoService } from '../../common/crypto/crypto.service';
import {
  describeError,
  ExternalSourceError,
} from '../../common/errors/simulator.errors';
import { RandomSource } from '../../common/random/random-source';
import { FeedPostDto } from './dto/feed-post.dto';
import { randomAmount } from './synthetic-transaction.source';
import { TransactionRecord, TransactionSource } from './transaction-source.interface';

export interface HttpTransactionSourceOptions {
  /**
   * 게시글 목록 엔드포인트 (예: https://jsonplaceholder.typicode.com/posts)
   */
  url: string;

  /**
   * 요청 타임아웃 (milliseconds)
   */
  timeoutMs: number;
}

/**
 * HTTP Transaction Source
 *
 * 공개 mock API에서 게시글을 가져와 트랜잭션 레코드로 변환
 * - GET <url>?_limit=<count>
 * - 게시글 하나 = 트랜잭션 하나
 * - title → metadata.api_title
 * - 발신자/수신자/금액은 로컬에서 생성
 *
 * 실패 (네트워크, 타임아웃, HTTP 상태, 응답 형식) → ExternalSourceError
 */
export class HttpTransactionSource implements TransactionSource {
  readonly name = 'remote';

  private readonly logger = new Logger(HttpTransactionSource.name);

  constructor(
    private readonly options: HttpTransactionSourceOptions,
    private readonly random: RandomSource,
    private readonly cryptoService: CryptoService,
    private readonly fetchFn: typeof fetch = fetch,
  ) {}

  async fetch(count: number): Promise<TransactionRecord[]> {
    const url = `${this.options.url}?_limit=${count}`;
    this.logger.log(`Fetching ${count} mock transactions from ${url}`);

    const posts = await this.requestPosts(url);

    return posts.map((post) => ({
      sender: this.cryptoService.generateAddress(this.random),
      receiver: this.cryptoService.generateAddress(this.random),
      amount: randomAmount(this.random),
      metadata: { api_title: post.title ?? 'N/A' },
    }));
  }

  private async requestPosts(url: string): Promise<FeedPostDto[]> {
    let response: Response;
    try {
      response = await this.fetchFn(url, {
        signal: AbortSignal.timeout(this.options.timeoutMs),
      });
    } catch (error: unknown) {
      throw new ExternalSourceError(
        `Request to ${url} failed: ${describeError(error)}`,
        { cause: error },
      );
    }

    if (!response.ok) {
      throw new ExternalSourceError(
        `Request to ${url} failed with status ${response.status}`,
      );
    }

    let payload: unknown;
    try {
      payload = await response.json();
    } catch (error: unknown) {
      throw new ExternalSourceError(
        `Response from ${url} is not valid JSON: ${describeError(error)}`,
        { cause: error },
      );
    }

    if (!Array.isArray(payload)) {
      throw new ExternalSourceError(`Response from ${url} is not an array`);
    }

    const posts = payload.map((item: unknown) => {
      if (typeof item !== 'object' || item === null) {
        throw new ExternalSourceError(
          `Response from ${url} contains a non-object item`,
        );
      }
      return plainToInstance(FeedPostDto, item);
    });

    for (const post of posts) {
      const errors = validateSync(post);
      if (errors.length > 0) {
        throw new ExternalSourceError(
          `Response from ${url} has an invalid post: ${errors
            .map((e) => e.toString())
            .join('; ')}`,
        );
      }
    }

    return posts;
  }
}
