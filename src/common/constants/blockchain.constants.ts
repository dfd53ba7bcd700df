/**
 * 시뮬레이터 전역 상수 정의
 * 단순화된 POS 합의 파라미터
 */

/**
 * GENESIS_PARENT_HASH: Genesis Block의 이전 블록 해시
 *
 * 이더리움:
 * - Genesis Block의 parentHash = 0x0000...0000
 */
export const GENESIS_PARENT_HASH = '0x' + '0'.repeat(64);

/**
 * GENESIS_PROPOSER: Genesis Block 생성자 (sentinel)
 *
 * Genesis Block은 어떤 Validator도 제안하지 않음
 */
export const GENESIS_PROPOSER = 'SYSTEM_GENESIS';

/**
 * BLOCK_BATCH_SIZE: 블록 하나에 포함되는 최대 트랜잭션 수
 *
 * - Leader는 Mempool 앞에서부터 최대 5개를 가져감
 * - 5개보다 적으면 있는 만큼만 제안 (대기하지 않음)
 */
export const BLOCK_BATCH_SIZE = 5;

/**
 * POOL_LOW_WATERMARK: Mempool 보충 기준
 *
 * 라운드 시작 시 Mempool이 이 값보다 작으면 외부 피드에서 트랜잭션을 가져옴
 */
export const POOL_LOW_WATERMARK = 5;

/**
 * 한 번에 보충하는 트랜잭션 수 범위 (양끝 포함)
 */
export const REFILL_MIN_COUNT = 5;
export const REFILL_MAX_COUNT = 10;

/**
 * CONSENSUS_THRESHOLD: 블록 확정에 필요한 찬성 스테이크 비율
 *
 * 이더리움:
 * - Supermajority (2/3 이상)
 *
 * 분수로 보관해서 부동소수점 비교 오차를 피함
 * - approving * 3 >= total * 2 이면 확정
 * - 정확히 2/3 도 확정 (>=)
 */
export interface StakeThreshold {
  numerator: number;
  denominator: number;
}

export const CONSENSUS_THRESHOLD: StakeThreshold = {
  numerator: 2,
  denominator: 3,
};

/**
 * 합성(synthetic) 트랜잭션 금액 범위
 *
 * - [0.1, 10.0] 균등 분포
 * - 소수점 4자리 반올림
 */
export const SYNTHETIC_AMOUNT_MIN = 0.1;
export const SYNTHETIC_AMOUNT_MAX = 10.0;
export const AMOUNT_DECIMALS = 4;

/**
 * Validator 초기 스테이크 변동 범위
 *
 * - stake = baseStake × uniform(0.8, 1.5)
 * - Leader 선택 확률에 차이를 두기 위함
 */
export const STAKE_VARIANCE_MIN = 0.8;
export const STAKE_VARIANCE_MAX = 1.5;

/**
 * ADDRESS_BYTE_LENGTH: 주소 길이 (20 bytes)
 */
export const ADDRESS_BYTE_LENGTH = 20;

/**
 * 시뮬레이션 기본값 (환경변수로 덮어쓰기 가능)
 */
export const DEFAULT_PORT = 3000;
export const DEFAULT_VALIDATOR_COUNT = 10;
export const DEFAULT_BASE_STAKE = 1000;
export const DEFAULT_ROUND_COUNT = 5;
export const DEFAULT_ROUND_DELAY = 2000; // milliseconds
export const DEFAULT_FEED_URL = 'https://jsonplaceholder.typicode.com/posts';
export const DEFAULT_FEED_TIMEOUT = 5000; // milliseconds

/**
 * 보관하는 최근 라운드 결과 수 (조회용)
 */
export const ROUND_HISTORY_LIMIT = 100;
