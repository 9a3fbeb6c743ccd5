import * as path from 'node:path';

/**
 * パスを字句的に正規化する
 *
 * 連続する区切り、"." と ".." を畳み、末尾の区切りを落とす（"/" を除く）。
 * シンボリックリンクは解決しない。
 */
export function canonicalizePath(target: string): string {
  const normalized = path.posix.normalize(target);
  return normalized.length > 1 && normalized.endsWith('/') ? normalized.slice(0, -1) : normalized;
}

/**
 * レイヤーディレクトリとリクエストパスから候補パスを作る
 *
 * 相対パスのレイヤーはリクエストのスコープの DocumentRoot を基準にする。
 * requestPath はそのまま連結する（トラバーサル対策はホスト側の責務）。
 */
export function joinCandidatePath(layerDir: string, documentRoot: string, requestPath: string): string {
  const base = path.posix.isAbsolute(layerDir) ? layerDir : `${documentRoot}/${layerDir}`;
  return canonicalizePath(`${base}/${requestPath}`);
}
