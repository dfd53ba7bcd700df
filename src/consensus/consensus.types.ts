import { Block } from '../block/entities/block.entity';
import { Address } from '../common/types/common.types';

/**
 * 라운드 상태
 *
 * POOLING → LEADER_SELECTED → PROPOSED → VOTED → COMMITTED | REJECTED
 * (Mempool이 비어 있으면 POOLING → REJECTED)
 */
export enum RoundState {
  POOLING = 'POOLING',
  LEADER_SELECTED = 'LEADER_SELECTED',
  PROPOSED = 'PROPOSED',
  VOTED = 'VOTED',
  COMMITTED = 'COMMITTED',
  REJECTED = 'REJECTED',
}

/**
 * 거부 사유
 *
 * - EMPTY_POOL: 보충 후에도 Mempool이 비어 있음 (no-op 라운드)
 * - CONSENSUS_NOT_REACHED: 찬성 스테이크 < 2/3
 */
export type RejectionReason = 'EMPTY_POOL' | 'CONSENSUS_NOT_REACHED';

export interface VoteTally {
  approvingStake: number;
  totalStake: number;
  ratio: number;
  approvals: Address[];
  rejections: Address[];
}

export interface RoundResult {
  round: number;
  state: RoundState.COMMITTED | RoundState.REJECTED;
  reason?: RejectionReason;
  blockIndex: number;
  leader?: Address;
  block?: Block;
  tally?: VoteTally;
  transitions: RoundState[];
}
