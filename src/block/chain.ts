import { Logger } from '@nestjs/common';
import {
  GENESIS_PARENT_HASH,
  GENESIS_PROPOSER,
} from '../common/constants/blockchain.constants';
import { Clock, Hash, systemClock } from '../common/types/common.types';
import { Block } from './entities/block.entity';

/**
 * 블록 검증 실패 사유
 *
 * 검사 순서대로:
 * - INVALID_INDEX: index !== previous.index + 1
 * - INVALID_PREVIOUS_HASH: previousHash !== previous.hash
 * - INVALID_HASH: hash !== 재계산한 해시 (변조)
 */
export type BlockValidationFailure =
  | 'INVALID_INDEX'
  | 'INVALID_PREVIOUS_HASH'
  | 'INVALID_HASH';

export type BlockValidationResult =
  | { valid: true }
  | { valid: false; reason: BlockValidationFailure; message: string };

export interface ChainVerification {
  valid: boolean;
  length: number;
  failedAt?: number;
  reason?: BlockValidationFailure | 'INVALID_GENESIS';
}

/**
 * Chain
 *
 * 블록의 append-only 순서 목록
 * - Genesis Block 하나로 시작
 * - append()만이 체인을 변경하는 유일한 경로
 * - 줄어들거나 재정렬되거나 기존 블록이 바뀌지 않음 (포크 처리 없음)
 *
 * 불변식 (모든 인접 블록 쌍):
 * 1. block[i+1].index === block[i].index + 1
 * 2. block[i+1].previousHash === block[i].hash
 * 3. block[i].hash === 재계산 해시
 *
 * 검증 로직은 여기 하나뿐
 * - Validator.validate()도 isValid()에 위임
 * - 합의 전 검증과 append 시점 검증이 어긋날 수 없음
 */
export class Chain {
  private readonly logger = new Logger(Chain.name);

  private readonly blocks: Block[] = [];

  constructor(clock: Clock = systemClock) {
    this.blocks.push(Chain.genesis(clock));
  }

  /**
   * Genesis Block 생성
   *
   * - index: 0
   * - 트랜잭션 없음
   * - previousHash: 0x0000...0000
   * - proposer: SYSTEM_GENESIS
   */
  static genesis(clock: Clock = systemClock): Block {
    return new Block(0, clock(), [], GENESIS_PARENT_HASH, GENESIS_PROPOSER);
  }

  /**
   * 최신 블록 (Tip)
   */
  tip(): Block {
    const tip = this.blocks[this.blocks.length - 1];
    if (!tip) {
      throw new Error('Chain is empty');
    }
    return tip;
  }

  /**
   * 블록 검증 (사유 포함)
   *
   * 첫 번째 실패에서 멈춤
   *
   * @param candidate - 검증할 블록
   * @param previous - 기준이 되는 이전 블록
   */
  checkBlock(candidate: Block, previous: Block): BlockValidationResult {
    if (candidate.index !== previous.index + 1) {
      return {
        valid: false,
        reason: 'INVALID_INDEX',
        message: `Invalid index: Expected ${previous.index + 1}, got ${candidate.index}`,
      };
    }

    if (candidate.previousHash !== previous.hash) {
      return {
        valid: false,
        reason: 'INVALID_PREVIOUS_HASH',
        message: `Invalid previous hash for block #${candidate.index}`,
      };
    }

    if (candidate.hash !== candidate.calculateHash()) {
      return {
        valid: false,
        reason: 'INVALID_HASH',
        message: `Invalid block hash for block #${candidate.index}`,
      };
    }

    return { valid: true };
  }

  /**
   * 블록 유효성 (boolean)
   *
   * 실패 사유는 로그로 남기고 false 반환 (throw 하지 않음)
   */
  isValid(candidate: Block, previous: Block): boolean {
    const result = this.checkBlock(candidate, previous);
    if (!result.valid) {
      this.logger.warn(result.message);
    }
    return result.valid;
  }

  /**
   * 블록 추가
   *
   * - Tip 기준으로 재검증
   * - 성공: 추가 후 true
   * - 실패: 체인 변경 없이 false
   */
  append(candidate: Block): boolean {
    if (!this.isValid(candidate, this.tip())) {
      return false;
    }

    this.blocks.push(candidate);
    return true;
  }

  /**
   * 체인 길이 (Genesis 포함)
   */
  get length(): number {
    return this.blocks.length;
  }

  /**
   * 번호로 블록 조회
   */
  getBlock(index: number): Block | null {
    return this.blocks[index] ?? null;
  }

  getBlockByHash(hash: Hash): Block | null {
    return this.blocks.find((block) => block.hash === hash) ?? null;
  }

  /**
   * 읽기 전용 스냅샷 (복사본)
   */
  getBlocks(): readonly Block[] {
    return Object.freeze([...this.blocks]);
  }

  /**
   * 전체 체인 재검증
   *
   * Genesis 해시 + 모든 인접 블록 쌍
   */
  verify(): ChainVerification {
    const genesis = this.blocks[0];
    if (
      !genesis ||
      !genesis.isGenesis() ||
      genesis.previousHash !== GENESIS_PARENT_HASH ||
      genesis.hash !== genesis.calculateHash()
    ) {
      return {
        valid: false,
        length: this.blocks.length,
        failedAt: 0,
        reason: 'INVALID_GENESIS',
      };
    }

    for (let i = 1; i < this.blocks.length; i++) {
      const result = this.checkBlock(this.blocks[i], this.blocks[i - 1]);
      if (!result.valid) {
        return {
          valid: false,
          length: this.blocks.length,
          failedAt: i,
          reason: result.reason,
        };
      }
    }

    return { valid: true, length: this.blocks.length };
  }

  /**
   * 사람이 읽을 수 있는 블록 요약 (블록당 한 줄)
   */
  getSummary(): string[] {
    return this.blocks.map((block) => block.toString());
  }
}
