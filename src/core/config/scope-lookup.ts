/**
 * Scope Lookup
 *
 * リクエストのホスト名とURIから、適用するサーバースコープと実効設定を求める。
 */

import type { EffectiveConfig } from '../../types/scope-config.ts';
import type { LocationSection, ServerConfig, ServerScope } from '../../types/server-config.ts';
import { stripPort } from './loader.ts';
import { mergeScopeChain } from './merge.ts';

/**
 * ホスト名に対応するサーバーを選ぶ
 *
 * - バーチャルホストが無ければメインサーバー
 * - ServerName / ServerAlias が一致する最初のバーチャルホスト
 * - どれにも一致しなければ最初のバーチャルホスト
 */
export function selectServer(config: ServerConfig, hostname: string | undefined): ServerScope {
  const [firstHost] = config.virtualHosts;
  if (firstHost === undefined) {
    return config.main;
  }

  if (hostname !== undefined && hostname !== '') {
    const wanted = stripPort(hostname).toLowerCase();
    const matched = config.virtualHosts.find((vhost) =>
      [vhost.serverName, ...vhost.serverAliases].some((name) => name !== null && name.toLowerCase() === wanted),
    );
    if (matched !== undefined) {
      return matched;
    }
  }

  return firstHost;
}

/**
 * Location セクションがURIにマッチするか
 *
 * "/p" は "/p" と "/p/..." にマッチし、"/pq" にはマッチしない。
 * "/" で終わるプレフィックスはそれで始まるURIすべてにマッチする。
 */
export function locationMatches(section: LocationSection, uri: string): boolean {
  const { match } = section;

  if (match.type === 'regex') {
    return match.pattern.test(uri);
  }

  const { prefix } = match;
  if (prefix.endsWith('/')) {
    return uri.startsWith(prefix);
  }
  return uri === prefix || uri.startsWith(`${prefix}/`);
}

/**
 * サーバーに適用される Location セクション（メインサーバー分が先）
 */
export function locationsFor(config: ServerConfig, server: ServerScope): readonly LocationSection[] {
  return server === config.main ? config.main.locations : [...config.main.locations, ...server.locations];
}

/**
 * リクエストの実効設定を求める
 *
 * サーバースコープの実効設定に、マッチした Location を宣言順にマージする。
 */
export function effectiveConfigFor(config: ServerConfig, server: ServerScope, uri: string): EffectiveConfig {
  const matching = locationsFor(config, server)
    .filter((section) => locationMatches(section, uri))
    .map((section) => section.local);

  return mergeScopeChain(server.effective, matching);
}
