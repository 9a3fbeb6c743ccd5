import type { SourceLocation } from './directive.ts';
import type { EffectiveConfig, ScopeConfig } from './scope-config.ts';

/**
 * Location セクションのマッチ方法
 *
 * - prefix: <Location /path>
 * - regex: <Location ~ re> / <LocationMatch re>
 */
export type LocationMatcher =
  | { readonly type: 'prefix'; readonly prefix: string }
  | { readonly type: 'regex'; readonly pattern: RegExp };

export interface LocationSection {
  readonly match: LocationMatcher;
  /** このセクション内で宣言された設定 */
  readonly local: ScopeConfig;
  readonly location: SourceLocation;
}

/**
 * メインサーバーまたはバーチャルホスト
 */
export interface ServerScope {
  /** メインサーバーの場合は null になりうる */
  readonly serverName: string | null;
  readonly serverAliases: readonly string[];
  readonly documentRoot: string;
  readonly local: ScopeConfig;
  /** 読み込み完了時に計算済みの実効設定（Locationは未適用） */
  readonly effective: EffectiveConfig;
  readonly locations: readonly LocationSection[];
  readonly location: SourceLocation | null;
}

export interface ServerConfig {
  readonly sourcePath: string;
  readonly main: ServerScope;
  readonly virtualHosts: readonly ServerScope[];
}
