/**
 * Directive Types
 *
 * 設定ファイル中のディレクティブ出現を表す型定義。
 */

/**
 * ソース上の位置
 */
export interface SourceLocation {
  /** 設定ファイルのパス */
  readonly file: string;
  /** 1始まりの行番号 */
  readonly line: number;
}

/**
 * 設定ツリーのノード
 *
 * ブロックの場合は name が "<" 付き（例: "<VirtualHost"）で children を持つ。
 */
export interface ConfigNode {
  readonly name: string;
  readonly args: readonly string[];
  readonly location: SourceLocation;
  readonly children: readonly ConfigNode[];
}

/**
 * ディレクティブの出現
 *
 * parent は囲んでいるブロックへの読み取り専用参照（ルートではnull）。
 * コンテキスト検証でのみ辿り、変更はしない。
 */
export interface DirectiveOccurrence {
  readonly name: string;
  readonly args: readonly string[];
  readonly location: SourceLocation;
  readonly parent: DirectiveOccurrence | null;
}

/**
 * ConfigNodeから出現を作る
 */
export const toOccurrence = (node: ConfigNode, parent: DirectiveOccurrence | null): DirectiveOccurrence => ({
  name: node.name,
  args: node.args,
  location: node.location,
  parent,
});
