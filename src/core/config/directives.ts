/**
 * Layer Directives
 *
 * DocumentRootLayers / EnableDocumentRootLayers のハンドラ。
 *
 * 処理順: コンテキスト検証 → 引数個数の検証 → 値の検証 → スコープへの反映
 */

import { createOk, createErr, isErr, type Result } from 'option-t/plain_result';
import type { DirectiveOccurrence } from '../../types/directive.ts';
import type { ConfigError } from '../../types/errors.ts';
import { directiveSyntaxError, invalidDirectiveValue } from '../../types/errors.ts';
import { EnableFlagSchema, type ScopeConfig } from '../../types/scope-config.ts';
import { validateDirectiveContext } from './context-validator.ts';

/**
 * 読み込み中のスコープ設定（読み込み完了後に ScopeConfig として凍結する）
 */
export interface ScopeConfigBuilder {
  enabled?: boolean;
  layers: string[];
}

export const createScopeConfigBuilder = (): ScopeConfigBuilder => ({ layers: [] });

export const freezeScopeConfig = (builder: ScopeConfigBuilder): ScopeConfig =>
  Object.freeze(
    builder.enabled === undefined
      ? { layers: Object.freeze([...builder.layers]) }
      : { enabled: builder.enabled, layers: Object.freeze([...builder.layers]) },
  );

/**
 * 引数の取り方
 *
 * - take1: ちょうど1個
 * - iterate: 1個以上（各引数に同じ処理を繰り返す）
 */
export type DirectiveArity = 'take1' | 'iterate';

export interface LayerDirective {
  readonly name: string;
  readonly arity: DirectiveArity;
  /** 引数エラー時に表示する書式 */
  readonly usage: string;
  readonly apply: (
    scope: ScopeConfigBuilder,
    occurrence: DirectiveOccurrence,
  ) => Result<void, ConfigError>;
}

const DOCUMENT_ROOT_LAYERS: LayerDirective = {
  name: 'DocumentRootLayers',
  arity: 'iterate',
  usage: 'DocumentRootLayers DirPath1 [DirPath2 ... [DirPathN]]',
  apply: (scope, occurrence) => {
    // 同一スコープ内の複数宣言は追記
    scope.layers.push(...occurrence.args);
    return createOk(undefined);
  },
};

const ENABLE_DOCUMENT_ROOT_LAYERS: LayerDirective = {
  name: 'EnableDocumentRootLayers',
  arity: 'take1',
  usage: 'EnableDocumentRootLayers On|Off',
  apply: (scope, occurrence) => {
    const value = occurrence.args[0] ?? '';
    const parsed = EnableFlagSchema.safeParse(value);
    if (!parsed.success) {
      return createErr(
        invalidDirectiveValue(ENABLE_DOCUMENT_ROOT_LAYERS.name, ENABLE_DOCUMENT_ROOT_LAYERS.usage, value, occurrence.location),
      );
    }

    scope.enabled = parsed.data === 'On';
    return createOk(undefined);
  },
};

export const LAYER_DIRECTIVES: readonly LayerDirective[] = [DOCUMENT_ROOT_LAYERS, ENABLE_DOCUMENT_ROOT_LAYERS];

const directivesByLowerName = new Map<string, LayerDirective>(
  LAYER_DIRECTIVES.map((directive) => [directive.name.toLowerCase(), directive]),
);

/**
 * ディレクティブ名からレイヤー用ディレクティブを引く（大文字小文字は区別しない）
 */
export function findLayerDirective(name: string): LayerDirective | undefined {
  return directivesByLowerName.get(name.toLowerCase());
}

function checkArity(directive: LayerDirective, occurrence: DirectiveOccurrence): Result<void, ConfigError> {
  const count = occurrence.args.length;
  const valid = directive.arity === 'take1' ? count === 1 : count >= 1;

  if (!valid) {
    return createErr(directiveSyntaxError(directive.name, directive.usage, occurrence.location));
  }
  return createOk(undefined);
}

/**
 * ディレクティブの出現を1件処理する
 *
 * @param directive - findLayerDirective で引いた定義
 * @param scope - 出現が属するスコープ
 * @param occurrence - ディレクティブの出現（親参照付き）
 */
export function applyLayerDirective(
  directive: LayerDirective,
  scope: ScopeConfigBuilder,
  occurrence: DirectiveOccurrence,
): Result<void, ConfigError> {
  const contextResult = validateDirectiveContext(occurrence);
  if (isErr(contextResult)) {
    return contextResult;
  }

  const arityResult = checkArity(directive, occurrence);
  if (isErr(arityResult)) {
    return arityResult;
  }

  return directive.apply(scope, occurrence);
}
