/**
 * check command
 *
 * 設定ファイルを読み込み、ディレクティブの配置と値を検証する。
 */

import { Command } from 'commander';
import { isErr } from 'option-t/plain_result';
import { loadConfig, resolveConfigPath } from '../utils/load-config.ts';
import { toDisplayPath } from '../utils/display-path.ts';
import { consoleOutput, type CommandOutput } from '../utils/output.ts';

export interface CheckParams {
  readonly configPath?: string;
}

/**
 * @returns 終了コード
 */
export async function runCheck(params: CheckParams, output: CommandOutput = consoleOutput): Promise<number> {
  const configPath = resolveConfigPath(params.configPath);
  const result = await loadConfig(configPath, { onWarning: (message) => output.error(`Warning: ${message}`) });

  if (isErr(result)) {
    output.error(`Error: ${result.err.message}`);
    return 1;
  }

  const config = result.val;
  output.log('Syntax OK');
  output.log(`Config: ${toDisplayPath(configPath)}`);
  output.log(`Virtual hosts: ${config.virtualHosts.length}`);
  return 0;
}

export function createCheckCommand(): Command {
  return new Command('check')
    .description('Validate the server configuration and layer directives')
    .option('--config <path>', 'Path to the httpd-style configuration file')
    .action(async (options: { config?: string }) => {
      process.exitCode = await runCheck({ configPath: options.config });
    });
}
