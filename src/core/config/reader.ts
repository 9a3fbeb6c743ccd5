/**
 * Config Reader
 *
 * httpd形式の設定テキストをディレクティブのツリーに変換する。
 *
 * - 空行と "#" で始まる行は無視
 * - 行末の "\" で次の行と連結
 * - 引数は空白区切り。"..." / '...' で囲むと空白を含められる
 * - <Name args> でブロック開始、</Name> で終了（名前は大文字小文字を区別しない）
 */

import * as fs from 'node:fs/promises';
import { createOk, createErr, isErr, type Result } from 'option-t/plain_result';
import { tryCatchIntoResultAsync } from 'option-t/plain_result/try_catch_async';
import type { ConfigNode, SourceLocation } from '../../types/directive.ts';
import type { ConfigFileNotFoundError, ConfigReadError, ConfigSyntaxError } from '../../types/errors.ts';
import { configFileNotFound, configReadError, configSyntaxError } from '../../types/errors.ts';

interface LogicalLine {
  readonly text: string;
  readonly location: SourceLocation;
}

interface OpenBlock {
  readonly name: string;
  readonly args: readonly string[];
  readonly location: SourceLocation;
  readonly children: ConfigNode[];
}

/**
 * 物理行を論理行にまとめる（継続行の連結とコメント除去）
 */
function toLogicalLines(text: string, file: string): LogicalLine[] {
  const physical = text.split(/\r?\n/);
  const lines: LogicalLine[] = [];

  let pending: { text: string; line: number } | null = null;

  for (let index = 0; index < physical.length; index++) {
    const raw = physical[index] ?? '';
    const lineNumber = index + 1;
    const joined: string = pending ? pending.text + raw : raw;
    const startLine: number = pending ? pending.line : lineNumber;

    if (joined.trimEnd().endsWith('\\')) {
      pending = { text: joined.trimEnd().slice(0, -1), line: startLine };
      continue;
    }
    pending = null;

    const content = joined.trim();
    if (content === '' || content.startsWith('#')) {
      continue;
    }
    lines.push({ text: content, location: { file, line: startLine } });
  }

  // ファイル末尾が継続行で終わった場合はそのまま1行として扱う
  if (pending !== null) {
    const content = pending.text.trim();
    if (content !== '' && !content.startsWith('#')) {
      lines.push({ text: content, location: { file, line: pending.line } });
    }
  }

  return lines;
}

/**
 * 1行分の引数を切り出す
 *
 * @returns 成功時はトークン列、失敗時はエラー詳細
 */
export function tokenizeArgs(text: string): Result<string[], string> {
  const tokens: string[] = [];
  let i = 0;

  while (i < text.length) {
    const ch = text.charAt(i);

    if (/\s/.test(ch)) {
      i++;
      continue;
    }

    if (ch === '"' || ch === "'") {
      const quote = ch;
      let token = '';
      i++;
      let closed = false;

      while (i < text.length) {
        const c = text.charAt(i);
        if (c === '\\' && text.charAt(i + 1) === quote) {
          token += quote;
          i += 2;
          continue;
        }
        if (c === quote) {
          closed = true;
          i++;
          break;
        }
        token += c;
        i++;
      }

      if (!closed) {
        return createErr(`Unterminated quoted argument: ${quote}${token}`);
      }
      tokens.push(token);
      continue;
    }

    let token = '';
    while (i < text.length && !/\s/.test(text.charAt(i))) {
      token += text.charAt(i);
      i++;
    }
    tokens.push(token);
  }

  return createOk(tokens);
}

/**
 * 設定テキストをパースする
 *
 * @param text - 設定ファイルの内容
 * @param file - エラーメッセージに使うファイルパス
 */
export function parseConfigText(text: string, file: string): Result<ConfigNode[], ConfigSyntaxError> {
  const root: ConfigNode[] = [];
  const stack: OpenBlock[] = [];

  const currentChildren = (): ConfigNode[] => stack[stack.length - 1]?.children ?? root;

  for (const { text: line, location } of toLogicalLines(text, file)) {
    // ブロック終了
    if (line.startsWith('</')) {
      if (!line.endsWith('>')) {
        return createErr(configSyntaxError(location, `${line} directive missing closing '>'`));
      }
      const closingName = line.slice(2, -1).trim();
      const open = stack.pop();

      if (open === undefined) {
        return createErr(configSyntaxError(location, `</${closingName}> without matching <${closingName}> section`));
      }
      if (open.name.slice(1).toLowerCase() !== closingName.toLowerCase()) {
        return createErr(configSyntaxError(location, `Expected </${open.name.slice(1)}> but saw </${closingName}>`));
      }

      currentChildren().push({
        name: open.name,
        args: open.args,
        location: open.location,
        children: open.children,
      });
      continue;
    }

    // ブロック開始
    if (line.startsWith('<')) {
      if (!line.endsWith('>')) {
        const name = line.split(/\s/, 1)[0] ?? line;
        return createErr(configSyntaxError(location, `${name}> directive missing closing '>'`));
      }

      const tokensResult = tokenizeArgs(line.slice(1, -1));
      if (isErr(tokensResult)) {
        return createErr(configSyntaxError(location, tokensResult.err));
      }
      const [name, ...args] = tokensResult.val;
      if (name === undefined || name === '') {
        return createErr(configSyntaxError(location, 'Empty section name'));
      }

      stack.push({ name: `<${name}`, args, location, children: [] });
      continue;
    }

    // 通常のディレクティブ
    const tokensResult = tokenizeArgs(line);
    if (isErr(tokensResult)) {
      return createErr(configSyntaxError(location, tokensResult.err));
    }
    const [name, ...args] = tokensResult.val;
    if (name === undefined) {
      continue;
    }

    currentChildren().push({ name, args, location, children: [] });
  }

  const unclosed = stack.pop();
  if (unclosed !== undefined) {
    return createErr(configSyntaxError(unclosed.location, `${unclosed.name}> was not closed.`));
  }

  return createOk(root);
}

/**
 * 設定ファイルを読み込んでパースする
 */
export async function readConfigFile(
  filePath: string,
): Promise<Result<ConfigNode[], ConfigFileNotFoundError | ConfigReadError | ConfigSyntaxError>> {
  const contentResult = await tryCatchIntoResultAsync(() => fs.readFile(filePath, 'utf-8'));

  if (isErr(contentResult)) {
    const error = contentResult.err;
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      return createErr(configFileNotFound(filePath));
    }
    return createErr(configReadError(filePath, error instanceof Error ? error.message : String(error)));
  }

  return parseConfigText(contentResult.val, filePath);
}
