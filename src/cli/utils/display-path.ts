import path from 'node:path';

/**
 * 表示用のパスを返す
 *
 * baseDir 配下なら相対パス、外側なら絶対パスのまま。
 */
export const toDisplayPath = (targetPath: string, baseDir: string = process.cwd()): string => {
  const absolutePath = path.resolve(targetPath);
  const relativePath = path.relative(baseDir, absolutePath);
  if (relativePath === '') {
    return '.';
  }
  return relativePath.startsWith('..') || path.isAbsolute(relativePath) ? absolutePath : relativePath;
};
