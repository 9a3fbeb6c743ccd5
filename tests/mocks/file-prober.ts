import { createOk, createErr } from 'option-t/plain_result';
import type { FileProber } from '../../src/core/layers/file-prober.ts';
import type { FileMetadata } from '../../src/types/resolution.ts';

/**
 * テスト用のファイルメタデータ
 */
export const fileMeta = (size = 0, kind: FileMetadata['kind'] = 'file'): FileMetadata => ({
  kind,
  size,
  mtimeMs: 0,
  mode: kind === 'directory' ? 0o40755 : 0o100644,
  ino: size,
  dev: 1,
});

export interface MockFileProber extends FileProber {
  /** probe された順のパス */
  readonly probed: string[];
}

/**
 * テスト用のモックFileProber
 *
 * entries の値が文字列の場合はそのerrnoコードで失敗する。
 * 登録されていないパスは ENOENT。
 */
export const createMockFileProber = (entries: Record<string, FileMetadata | string> = {}): MockFileProber => {
  const probed: string[] = [];

  return {
    probed,
    probe: async (path) => {
      probed.push(path);
      const entry = entries[path];

      if (entry === undefined) {
        return createErr({ path, code: 'ENOENT' });
      }
      if (typeof entry === 'string') {
        return createErr({ path, code: entry });
      }
      return createOk(entry);
    },
  };
};
