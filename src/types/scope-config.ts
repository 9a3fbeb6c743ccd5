import { z } from 'zod';

/**
 * EnableDocumentRootLayers の値
 *
 * 大文字小文字を区別する。"on" や "OFF" は受け付けない。
 */
export const EnableFlagSchema = z.enum(['On', 'Off']);

export type EnableFlag = z.infer<typeof EnableFlagSchema>;

/**
 * スコープ（サーバー / バーチャルホスト / Location）で宣言された設定
 *
 * - enabled: 未宣言なら undefined（親から継承）
 * - layers: 宣言順。空配列は未宣言を意味する
 */
export interface ScopeConfig {
  readonly enabled?: boolean;
  readonly layers: readonly string[];
}

/**
 * リクエストのスコープに実際に適用される設定
 */
export const EffectiveConfigSchema = z.object({
  enabled: z.boolean().default(false),
  layers: z.array(z.string()).readonly().default([]),
});

export type EffectiveConfig = z.infer<typeof EffectiveConfigSchema>;

const parsedDefault = EffectiveConfigSchema.parse({});

export const DEFAULT_EFFECTIVE_CONFIG: EffectiveConfig = Object.freeze({
  ...parsedDefault,
  layers: Object.freeze([...parsedDefault.layers]),
});
