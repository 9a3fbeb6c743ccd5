/**
 * show command
 *
 * 選択されたサーバー（と URI）に適用される実効設定を表示する。
 */

import { Command } from 'commander';
import { isErr } from 'option-t/plain_result';
import { effectiveConfigFor, selectServer } from '../../core/config/scope-lookup.ts';
import type { EffectiveConfig } from '../../types/scope-config.ts';
import type { ServerScope } from '../../types/server-config.ts';
import { loadConfig } from '../utils/load-config.ts';
import { consoleOutput, type CommandOutput } from '../utils/output.ts';

export interface ShowParams {
  readonly configPath?: string;
  readonly host?: string;
  readonly uri?: string;
  readonly json?: boolean;
}

export const describeServer = (server: ServerScope): string => server.serverName ?? '(main server)';

/**
 * 実効設定を人間が読みやすい行に変換する
 */
export function formatEffectiveConfig(server: ServerScope, effective: EffectiveConfig, uri?: string): string[] {
  const lines = [`Server: ${describeServer(server)}`, `DocumentRoot: ${server.documentRoot}`];
  if (uri !== undefined) {
    lines.push(`URI: ${uri}`);
  }
  lines.push(`EnableDocumentRootLayers: ${effective.enabled ? 'On' : 'Off'}`);
  lines.push(`DocumentRootLayers: ${effective.layers.length > 0 ? effective.layers.join(' ') : '(none)'}`);
  return lines;
}

export async function runShow(params: ShowParams, output: CommandOutput = consoleOutput): Promise<number> {
  const result = await loadConfig(params.configPath, { onWarning: (message) => output.error(`Warning: ${message}`) });

  if (isErr(result)) {
    output.error(`Error: ${result.err.message}`);
    return 1;
  }

  const config = result.val;
  const server = selectServer(config, params.host);
  const effective = params.uri === undefined ? server.effective : effectiveConfigFor(config, server, params.uri);

  if (params.json) {
    output.log(
      JSON.stringify(
        {
          server: server.serverName,
          documentRoot: server.documentRoot,
          ...(params.uri === undefined ? {} : { uri: params.uri }),
          enabled: effective.enabled,
          layers: effective.layers,
        },
        null,
        2,
      ),
    );
    return 0;
  }

  for (const line of formatEffectiveConfig(server, effective, params.uri)) {
    output.log(line);
  }
  return 0;
}

export function createShowCommand(): Command {
  return new Command('show')
    .description('Show the effective layer configuration for a host (and URI)')
    .option('--config <path>', 'Path to the httpd-style configuration file')
    .option('--host <name>', 'Host name used to select the virtual host')
    .option('--uri <path>', 'Apply matching <Location> sections for this URI')
    .option('--json', 'Output as JSON')
    .action(async (options: { config?: string; host?: string; uri?: string; json?: boolean }) => {
      process.exitCode = await runShow({
        configPath: options.config,
        host: options.host,
        uri: options.uri,
        json: options.json,
      });
    });
}
