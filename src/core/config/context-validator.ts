/**
 * Directive Context Validator
 *
 * DocumentRootLayers / EnableDocumentRootLayers が
 * ファイルシステムパス単位のブロック内に書かれていないことを確認する。
 */

import { createOk, createErr, type Result } from 'option-t/plain_result';
import type { DirectiveOccurrence } from '../../types/directive.ts';
import { directiveContextError, type DirectiveContextError } from '../../types/errors.ts';

/**
 * 祖先に来てはいけないブロック名
 *
 * httpdのディレクティブ名は大文字小文字を区別しないため、比較も小文字で行う。
 */
export const FORBIDDEN_ANCESTORS = ['<Directory', '<DirectoryMatch', '<Files', '<FilesMatch'] as const;

const forbiddenByLowerName = new Map<string, string>(
  FORBIDDEN_ANCESTORS.map((name) => [name.toLowerCase(), name]),
);

export function validateDirectiveContext(
  occurrence: DirectiveOccurrence,
): Result<void, DirectiveContextError> {
  let parent = occurrence.parent;

  while (parent !== null) {
    const forbidden = forbiddenByLowerName.get(parent.name.toLowerCase());
    if (forbidden !== undefined) {
      return createErr(directiveContextError(occurrence.name, forbidden, occurrence.location));
    }
    parent = parent.parent;
  }

  return createOk(undefined);
}
