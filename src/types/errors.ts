/**
 * Domain Error Types
 *
 * 設定読み込み時のエラー型定義。option-tのResult型と組み合わせて使用する。
 * タグ付きユニオン型により、エラーの種類を型安全に区別できる。
 *
 * リクエスト処理時のエラーチャネルは存在しない（stat失敗はProbeMissとして吸収される）。
 */

import type { SourceLocation } from './directive.ts';

const formatLocation = (location: SourceLocation | undefined): string =>
  location ? `${location.file}:${location.line}: ` : '';

// ===== Config Errors =====

export type ConfigError =
  | ConfigFileNotFoundError
  | ConfigReadError
  | ConfigSyntaxError
  | DirectiveSyntaxError
  | DirectiveContextError
  | InvalidDirectiveValueError;

export interface ConfigFileNotFoundError {
  readonly type: 'ConfigFileNotFoundError';
  readonly filePath: string;
  readonly message: string;
}

export interface ConfigReadError {
  readonly type: 'ConfigReadError';
  readonly filePath: string;
  readonly details: string;
  readonly message: string;
}

export interface ConfigSyntaxError {
  readonly type: 'ConfigSyntaxError';
  readonly location: SourceLocation;
  readonly details: string;
  readonly message: string;
}

export interface DirectiveSyntaxError {
  readonly type: 'DirectiveSyntaxError';
  readonly directive: string;
  readonly details: string;
  readonly location?: SourceLocation;
  readonly message: string;
}

export interface DirectiveContextError {
  readonly type: 'DirectiveContextError';
  readonly directive: string;
  /** 禁止されている祖先ブロック名（例: "<Directory"） */
  readonly ancestor: string;
  readonly location?: SourceLocation;
  readonly message: string;
}

export interface InvalidDirectiveValueError {
  readonly type: 'InvalidDirectiveValueError';
  readonly directive: string;
  readonly value: string;
  readonly location?: SourceLocation;
  readonly message: string;
}

// ConfigError コンストラクタ
export const configFileNotFound = (filePath: string): ConfigFileNotFoundError => ({
  type: 'ConfigFileNotFoundError',
  filePath,
  message: `Configuration file not found: ${filePath}`,
});

export const configReadError = (filePath: string, details: string): ConfigReadError => ({
  type: 'ConfigReadError',
  filePath,
  details,
  message: `Could not read configuration file ${filePath}: ${details}`,
});

export const configSyntaxError = (location: SourceLocation, details: string): ConfigSyntaxError => ({
  type: 'ConfigSyntaxError',
  location,
  details,
  message: `${formatLocation(location)}${details}`,
});

export const directiveSyntaxError = (
  directive: string,
  details: string,
  location?: SourceLocation,
): DirectiveSyntaxError => ({
  type: 'DirectiveSyntaxError',
  directive,
  details,
  location,
  message: `${formatLocation(location)}${details}`,
});

export const directiveContextError = (
  directive: string,
  ancestor: string,
  location?: SourceLocation,
): DirectiveContextError => ({
  type: 'DirectiveContextError',
  directive,
  ancestor,
  location,
  message: `${formatLocation(location)}${directive} not allowed within ${ancestor} ...>`,
});

export const invalidDirectiveValue = (
  directive: string,
  usage: string,
  value: string,
  location?: SourceLocation,
): InvalidDirectiveValueError => ({
  type: 'InvalidDirectiveValueError',
  directive,
  value,
  location,
  message: `${formatLocation(location)}${usage}, not ${value}`,
});
