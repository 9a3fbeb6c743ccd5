/**
 * Scope Configuration Merge
 *
 * 親スコープの実効設定と子スコープのローカル設定をマージする。
 *
 * マージ仕様:
 * - enabled: 子で宣言されていれば子の値、なければ親を継承
 * - layers: 子で宣言されていれば（空でなければ）子のリストで完全置換。連結はしない
 *
 * 同一スコープ内での DocumentRootLayers の複数宣言は追記（directives.ts 側）であり、
 * スコープ間の置換とは別の振る舞いになる。
 */

import type { EffectiveConfig, ScopeConfig } from '../../types/scope-config.ts';

export function mergeScopeConfig(parent: EffectiveConfig, child: ScopeConfig): EffectiveConfig {
  return {
    enabled: child.enabled ?? parent.enabled,
    layers: child.layers.length > 0 ? child.layers : parent.layers,
  };
}

/**
 * 外側から内側の順にローカル設定を畳み込む
 *
 * @param base - 最も外側の実効設定
 * @param chain - 外側から内側へ並んだローカル設定
 */
export function mergeScopeChain(base: EffectiveConfig, chain: readonly ScopeConfig[]): EffectiveConfig {
  return chain.reduce<EffectiveConfig>(mergeScopeConfig, base);
}
