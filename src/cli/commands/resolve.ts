/**
 * resolve command
 *
 * レイヤーモジュールを組み込んだパイプラインでリクエストを処理し、
 * 最終的に採用されるファイルを表示する。
 */

import { Command } from 'commander';
import { isErr } from 'option-t/plain_result';
import type { FileProber } from '../../core/layers/file-prober.ts';
import type { ProbeStep } from '../../core/layers/resolver.ts';
import { createStatProber } from '../../adapters/fs/stat-prober.ts';
import { registerDocumentRootLayers } from '../../adapters/host/layer-module.ts';
import { RequestPipeline } from '../../adapters/host/pipeline.ts';
import { createRequest } from '../../adapters/host/request.ts';
import { loadConfig } from '../utils/load-config.ts';
import { consoleOutput, type CommandOutput } from '../utils/output.ts';
import { describeServer } from './show.ts';

export interface ResolveParams {
  readonly uri: string;
  readonly configPath?: string;
  readonly host?: string;
  readonly explain?: boolean;
}

export const formatProbeStep = (step: ProbeStep): string =>
  step.hit ? `  hit   ${step.candidate}` : `  miss  ${step.candidate} (${step.code ?? 'UNKNOWN'})`;

export async function runResolve(
  params: ResolveParams,
  output: CommandOutput = consoleOutput,
  prober: FileProber = createStatProber(),
): Promise<number> {
  const result = await loadConfig(params.configPath, { onWarning: (message) => output.error(`Warning: ${message}`) });

  if (isErr(result)) {
    output.error(`Error: ${result.err.message}`);
    return 1;
  }

  const steps: ProbeStep[] = [];
  const pipeline = new RequestPipeline({ prober });
  registerDocumentRootLayers(pipeline, { prober, onProbe: (step) => steps.push(step) });

  const request = createRequest(result.val, { hostname: params.host, uri: params.uri });
  const mapped = await pipeline.process(request);
  const overridden = steps.some((step) => step.hit);

  if (params.explain) {
    output.log(`Server: ${describeServer(request.server)}`);
    if (!request.perDirConfig.enabled) {
      output.log('Layers disabled for this scope');
    }
    for (const step of steps) {
      output.log(formatProbeStep(step));
    }
  }

  output.log(`Filename: ${mapped.filename}`);
  output.log(`Source: ${overridden ? 'layer' : 'document root'}`);
  output.log(
    mapped.finfo === null ? 'Status: not found' : `Status: found (${mapped.finfo.kind}, ${mapped.finfo.size} bytes)`,
  );
  return 0;
}

export function createResolveCommand(): Command {
  return new Command('resolve')
    .description('Show which file a request would be mapped to')
    .argument('<uri>', 'Request URI path (e.g. /banner.png)')
    .option('--config <path>', 'Path to the httpd-style configuration file')
    .option('--host <name>', 'Host name used to select the virtual host')
    .option('--explain', 'Print every probed layer candidate')
    .action(async (uri: string, options: { config?: string; host?: string; explain?: boolean }) => {
      process.exitCode = await runResolve({
        uri,
        configPath: options.config,
        host: options.host,
        explain: options.explain,
      });
    });
}
