import { z } from 'zod';
import { DIRECTIONS, MIN_GRID_SIZE } from './constants.js';
import { ConfigError } from './errors.js';
import type { Direction } from './types.js';

/** 방향 스키마 */
export const DirectionSchema = z.enum(DIRECTIONS);

/** 좌표 스키마 */
export const PositionSchema = z.object({
  x: z.number().int(),
  y: z.number().int(),
});

/** 그리드 크기 스키마 */
export const GridSizeSchema = z
  .number()
  .int()
  .min(MIN_GRID_SIZE, { message: `size는 ${String(MIN_GRID_SIZE)} 이상이어야 합니다` });

/** 단일 에피소드 설정 스키마 */
export const EpisodeConfigSchema = z.object({
  size: GridSizeSchema,
  maxSteps: z.number().int().positive({ message: 'maxSteps는 양수여야 합니다' }),
  seed: z.number().int(),
});

/** 배치 설정 스키마 */
export const BatchConfigSchema = z.object({
  episodes: z.number().int().positive({ message: 'episodes는 양수여야 합니다' }),
  size: GridSizeSchema,
  maxSteps: z.number().int().positive({ message: 'maxSteps는 양수여야 합니다' }),
  seedBase: z.number().int(),
});

/**
 * 스키마 검증 후 실패 시 ConfigError로 변환
 *
 * @param schema 검증 스키마
 * @param input 검증할 값
 * @returns 파싱된 값
 */
export function parseConfig<T extends z.ZodTypeAny>(schema: T, input: unknown): z.infer<T> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => `${issue.path.join('.') || 'config'}: ${issue.message}`),
    );
  }
  return result.data;
}

/**
 * 닫힌 행동 공간 소속 여부 확인
 *
 * @param value 검사할 값
 * @returns 4방향 중 하나이면 true
 */
export function isDirection(value: unknown): value is Direction {
  return DirectionSchema.safeParse(value).success;
}
