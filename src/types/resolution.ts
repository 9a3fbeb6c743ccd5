/**
 * Layer Resolution Types
 */

/**
 * statで得たファイル情報
 *
 * ホスト側が再statせずに配信判断できる程度の情報を持つ。
 */
export interface FileMetadata {
  readonly kind: 'file' | 'directory' | 'other';
  readonly size: number;
  readonly mtimeMs: number;
  readonly mode: number;
  readonly ino: number;
  readonly dev: number;
}

/**
 * 候補パスにエントリが無かった（またはstatできなかった）ことを表す
 *
 * ENOENT / EACCES / EIO などは区別せず「このレイヤーはスキップ」として扱う。
 */
export interface ProbeMiss {
  readonly path: string;
  /** errnoコード（取得できない場合は 'UNKNOWN'） */
  readonly code: string;
}

export interface OverrideOutcome {
  readonly type: 'Override';
  readonly path: string;
  readonly metadata: FileMetadata;
}

export interface NoOverrideOutcome {
  readonly type: 'NoOverride';
}

export type ResolutionOutcome = OverrideOutcome | NoOverrideOutcome;

export const override = (path: string, metadata: FileMetadata): OverrideOutcome => ({
  type: 'Override',
  path,
  metadata,
});

export const NO_OVERRIDE: NoOverrideOutcome = Object.freeze({ type: 'NoOverride' });
