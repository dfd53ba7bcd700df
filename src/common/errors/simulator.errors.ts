/**
 * 시뮬레이터 에러 정의
 *
 * 예상 가능한 결과는 에러가 아님:
 * - 블록 검증 실패 → BlockValidationResult (값)
 * - 합의 실패 (2/3 미달) → RoundResult.reason (값)
 *
 * 여기 정의된 에러만 throw 됨:
 * - 잘못된 외부 입력 (음수 금액, 잘못된 설정)
 * - 외부 피드 실패 (TransactionFeed 안에서 처리됨)
 * - 체인 일관성 위반 (치명적)
 */
export class SimulatorError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * 잘못된 트랜잭션 입력 (예: 음수 금액)
 */
export class InvalidTransactionError extends SimulatorError {}

/**
 * 잘못된 Validator 입력 (예: 0 이하 스테이크)
 */
export class InvalidValidatorError extends SimulatorError {}

/**
 * 잘못된 시뮬레이션 설정값
 */
export class InvalidSimulationConfigError extends SimulatorError {}

/**
 * 외부 트랜잭션 피드 실패
 *
 * TransactionFeed가 잡아서 로컬 생성으로 대체함
 * 라운드 밖으로 전파되지 않음
 */
export class ExternalSourceError extends SimulatorError {}

/**
 * 체인 일관성 위반 (치명적)
 *
 * 합의 전 검증을 통과한 블록이 append 시점의 재검증에서 실패한 경우
 * 두 검증 경로가 달라졌다는 의미 → 조용히 넘어가지 않고 라운드를 중단
 */
export class ChainConsistencyViolationError extends SimulatorError {
  constructor(
    readonly blockIndex: number,
    readonly blockHash: string,
  ) {
    super(
      `Block #${blockIndex} (${blockHash}) failed final validation despite consensus`,
    );
  }
}

/**
 * unknown 에러에서 메시지 추출
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
