/**
 * FileProber インターフェース
 *
 * 候補パスの存在確認（stat）を抽象化する。テスト時にはモックで置き換え可能。
 */

import type { Result } from 'option-t/plain_result';
import type { FileMetadata, ProbeMiss } from '../../types/resolution.ts';

export interface FileProber {
  /**
   * パスをstatする
   *
   * 例外は投げない。存在しない・権限が無い・I/Oエラーはすべて ProbeMiss になる。
   */
  probe(path: string): Promise<Result<FileMetadata, ProbeMiss>>;
}
