import { Logger } from '@nestjs/common';
import { Block } from '../../block/entities/block.entity';
import { Chain } from '../../block/chain';
import { InvalidValidatorError } from '../../common/errors/simulator.errors';
import { Address, Clock, systemClock } from '../../common/types/common.types';
import { Transaction } from '../../transaction/entities/transaction.entity';

/**
 * Validator Entity
 *
 * POS Validator:
 * - 블록 제안 (Leader로 선택된 경우)
 * - 블록 검증 (다른 Validator의 제안에 투표)
 *
 * 현재 구현:
 * - 스테이크는 생성 시 고정 (동적 변경 없음)
 * - 보상/슬래싱 없음
 * - 모든 Validator가 같은 Chain을 읽음 (쓰기는 ConsensusRound만)
 */
export class Validator {
  private readonly logger = new Logger(Validator.name);

  /**
   * Validator 주소
   */
  readonly address: Address;

  /**
   * 스테이크 (투표 가중치 + Leader 선택 확률)
   *
   * 항상 0보다 커야 함
   */
  readonly stake: number;

  constructor(
    address: Address,
    stake: number,
    private readonly chain: Chain,
    private readonly clock: Clock = systemClock,
  ) {
    if (!Number.isFinite(stake) || stake <= 0) {
      throw new InvalidValidatorError(
        `Validator stake must be a positive number, got ${stake}`,
      );
    }

    this.address = address;
    this.stake = stake;
  }

  /**
   * 블록 제안
   *
   * 현재 Tip 위에 새 블록 생성:
   * - index = tip.index + 1
   * - previousHash = tip.hash
   * - proposer = 자기 주소
   * - transactions = 받은 배치 그대로 (재정렬/필터링 없음)
   *
   * 체인은 건드리지 않음
   */
  propose(transactions: readonly Transaction[]): Block {
    const tip = this.chain.tip();
    const block = new Block(
      tip.index + 1,
      this.clock(),
      transactions,
      tip.hash,
      this.address,
    );

    this.logger.log(`Validator ${this.shortAddress()} PROPOSES ${block}`);
    return block;
  }

  /**
   * 블록 검증 (투표)
   *
   * 제안 시점의 Tip이 아니라 지금의 Tip 기준으로 검증
   * - 그 사이 체인이 진행됐다면 거부됨 (안전성)
   */
  validate(candidate: Block): boolean {
    const isValid = this.chain.isValid(candidate, this.chain.tip());

    if (isValid) {
      this.logger.debug(
        `Validator ${this.shortAddress()} votes YES for block #${candidate.index}`,
      );
    } else {
      this.logger.warn(
        `Validator ${this.shortAddress()} votes NO for block #${candidate.index}`,
      );
    }

    return isValid;
  }

  shortAddress(): string {
    return this.address.slice(-8);
  }

  /**
   * JSON 직렬화
   */
  toJSON() {
    return {
      address: this.address,
      stake: this.stake,
    };
  }
}
