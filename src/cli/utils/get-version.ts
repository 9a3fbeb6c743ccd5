import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { dirname, join } from 'node:path';

/**
 * バージョン情報を取得する
 *
 * package.json の version を返す。読み取れない場合は開発用の値。
 */
export function getVersion(): string {
  try {
    const currentFile = fileURLToPath(import.meta.url);
    const projectRoot = join(dirname(currentFile), '..', '..', '..');
    const packageJson: unknown = JSON.parse(readFileSync(join(projectRoot, 'package.json'), 'utf-8'));

    if (typeof packageJson === 'object' && packageJson !== null && 'version' in packageJson) {
      const { version } = packageJson;
      if (typeof version === 'string') {
        return version;
      }
    }
  } catch {
    // package.jsonの読み取りに失敗した場合はフォールバック
  }
  return '0.1.0-dev';
}
