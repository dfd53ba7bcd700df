import { Block } from '../entities/block.entity';

/**
 * 체인 요약 출력 형식
 *
 * --- Blockchain State ---
 *   -> Block(#0 | Val: ENESIS | Txs: 0 | Hash: ...)
 *   -> ...
 * ------------------------
 */
export function formatChainSummary(blocks: readonly Block[]): string {
  return [
    '--- Blockchain State ---',
    ...blocks.map((block) => `  -> ${block}`),
    '------------------------',
  ].join('\n');
}
