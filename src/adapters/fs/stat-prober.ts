/**
 * StatProber - fs.promises.stat を使った FileProber 実装
 */

import * as fs from 'node:fs/promises';
import type { Stats } from 'node:fs';
import { createOk, createErr, isErr } from 'option-t/plain_result';
import { tryCatchIntoResultAsync } from 'option-t/plain_result/try_catch_async';
import type { FileProber } from '../../core/layers/file-prober.ts';
import type { FileMetadata } from '../../types/resolution.ts';

export const toFileMetadata = (stats: Stats): FileMetadata => ({
  kind: stats.isFile() ? 'file' : stats.isDirectory() ? 'directory' : 'other',
  size: stats.size,
  mtimeMs: stats.mtimeMs,
  mode: stats.mode,
  ino: stats.ino,
  dev: stats.dev,
});

const errnoCode = (error: unknown): string =>
  error instanceof Error && 'code' in error && typeof error.code === 'string' ? error.code : 'UNKNOWN';

export const createStatProber = (): FileProber => ({
  probe: async (path) => {
    const result = await tryCatchIntoResultAsync(() => fs.stat(path));

    if (isErr(result)) {
      return createErr({ path, code: errnoCode(result.err) });
    }
    return createOk(toFileMetadata(result.val));
  },
});
