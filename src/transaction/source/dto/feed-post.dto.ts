import { IsInt, IsOptional, IsString } from 'class-validator';

/**
 * 원격 피드 응답 항목 (게시글)
 *
 * 예: { userId: 1, id: 1, title: '...', body: '...' }
 * - title만 메타데이터로 사용
 */
export class FeedPostDto {
  @IsOptional()
  @IsInt()
  id?: number;

  @IsOptional()
  @IsString()
  title?: string;
}
