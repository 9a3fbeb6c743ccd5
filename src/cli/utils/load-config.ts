import * as path from 'node:path';
import type { Result } from 'option-t/plain_result';
import { loadServerConfig, type LoadServerConfigOptions } from '../../core/config/loader.ts';
import type { ConfigError } from '../../types/errors.ts';
import type { ServerConfig } from '../../types/server-config.ts';

export const CONFIG_PATH_ENV = 'DOCROOT_LAYERS_CONFIG';
export const DEFAULT_CONFIG_FILE = 'httpd.conf';

/**
 * 設定ファイルのパスを決める
 *
 * 優先度: --config > 環境変数 DOCROOT_LAYERS_CONFIG > ./httpd.conf
 */
export function resolveConfigPath(explicitPath?: string): string {
  const envPath = process.env[CONFIG_PATH_ENV];
  const chosen = explicitPath ?? (envPath !== undefined && envPath !== '' ? envPath : DEFAULT_CONFIG_FILE);
  return path.resolve(chosen);
}

/**
 * 設定ファイルを読み込む
 *
 * @param configPath - 設定ファイルのパス（省略時は resolveConfigPath の規則で決定）
 */
export async function loadConfig(
  configPath?: string,
  options: LoadServerConfigOptions = {},
): Promise<Result<ServerConfig, ConfigError>> {
  return loadServerConfig(resolveConfigPath(configPath), options);
}
